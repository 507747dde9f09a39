/**
 * Alert Pipeline
 *
 * RECEIVED -> ENRICHED -> RETRIEVED -> GENERATED -> DISPATCHED
 *
 * Enrichment and retrieval degrade instead of failing. Generation is the
 * only stage that fails a request (state FAILED, PipelineError to the
 * caller). Dispatch starts after the checklist is returned and only feeds
 * the log.
 */

import type { ChecklistDispatcher } from "../notifications/dispatcher";
import type { ContextEnrichmentService } from "../enrichment/service";
import type { RunbookRetriever } from "../rag/retriever";
import type { RetrievedChunk } from "../rag/types";
import { AlertSchema, type Alert } from "../types/alert";
import {
  DynamicChecklistSchema,
  GenerationConfigSchema,
  type DynamicChecklist,
  type GenerationConfig,
} from "../types/checklist";
import {
  AlertValidationError,
  PipelineError,
  errorMessage,
  type PipelineStage,
} from "../types/errors";
import type { ChecklistGenerator } from "./generator";

export type StateChangeListener = (alertId: string, from: PipelineStage, to: PipelineStage) => void;

export interface AlertPipelineConfig {
  enrichment: ContextEnrichmentService;
  retriever: RunbookRetriever;
  generator: ChecklistGenerator;
  dispatcher: ChecklistDispatcher;
  generationConfig: GenerationConfig;
  onStateChange?: StateChangeListener;
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * Distinct source paths in retrieval order
 */
export function sourceRunbooks(chunks: RetrievedChunk[]): string[] {
  return [...new Set(chunks.map(({ chunk }) => chunk.sourcePath))];
}

export class AlertPipeline {
  private enrichment: ContextEnrichmentService;
  private retriever: RunbookRetriever;
  private generator: ChecklistGenerator;
  private dispatcher: ChecklistDispatcher;
  private generationConfig: GenerationConfig;
  private onStateChange?: StateChangeListener;
  private now: () => Date;
  private pending = new Set<Promise<void>>();

  constructor(config: AlertPipelineConfig) {
    this.enrichment = config.enrichment;
    this.retriever = config.retriever;
    this.generator = config.generator;
    this.dispatcher = config.dispatcher;
    this.generationConfig = GenerationConfigSchema.parse(config.generationConfig);
    this.onStateChange = config.onStateChange;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Validate an alert and produce its checklist. Rejects with
   * AlertValidationError for a malformed alert and PipelineError when
   * generation fails.
   */
  async processAlert(input: unknown): Promise<DynamicChecklist> {
    const alert = this.validate(input);
    let state: PipelineStage = "RECEIVED";
    const advance = (to: PipelineStage) => {
      this.notify(alert.id, state, to);
      state = to;
    };

    console.log(`[AlertPipeline] Processing alert ${alert.id} (${alert.severity}): ${alert.title}`);

    const context = await this.enrichment.enrich(alert);
    advance("ENRICHED");

    const chunks = await this.retriever.retrieve(alert, context, this.generationConfig.topK);
    advance("RETRIEVED");

    let checklist: DynamicChecklist;
    try {
      const generated = await this.generator.generate({
        context,
        chunks,
        config: this.generationConfig,
      });

      checklist = DynamicChecklistSchema.parse({
        alertId: alert.id,
        alertTitle: alert.title,
        severity: alert.severity,
        labels: alert.labels,
        summary: generated.summary,
        steps: generated.steps,
        sourceRunbooks: sourceRunbooks(chunks),
        generatedAt: this.now().toISOString(),
        llmProvider: this.generator.providerId,
      });
    } catch (error) {
      const failedAt = state;
      advance("FAILED");
      console.error(`[AlertPipeline] Generation failed for alert ${alert.id}: ${errorMessage(error)}`);
      throw new PipelineError(
        `Checklist generation failed for alert ${alert.id}: ${errorMessage(error)}`,
        alert.id,
        failedAt,
        { cause: error }
      );
    }
    advance("GENERATED");

    console.log(
      `[AlertPipeline] Generated ${checklist.steps.length} steps for alert ${alert.id} ` +
        `from ${chunks.length} runbook chunks`
    );

    this.dispatchInBackground(checklist, () => advance("DISPATCHED"));

    return checklist;
  }

  /**
   * Wait for every dispatch started so far
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  private validate(input: unknown): Alert {
    const result = AlertSchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "alert"}: ${issue.message}`);
      throw new AlertValidationError(`Invalid alert: ${issues.join("; ")}`, issues);
    }
    return result.data;
  }

  private dispatchInBackground(checklist: DynamicChecklist, onSettled: () => void): void {
    const task = this.dispatcher
      .dispatch(checklist)
      .then(
        (results) => {
          const failed = results.filter((result) => !result.success).length;
          if (results.length > 0) {
            console.log(
              `[AlertPipeline] Dispatch for ${checklist.alertId}: ` +
                `${results.length - failed}/${results.length} destinations succeeded`
            );
          }
        },
        (error: unknown) => {
          console.error(`[AlertPipeline] Dispatch for ${checklist.alertId} failed:`, error);
        }
      )
      .finally(() => {
        onSettled();
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  private notify(alertId: string, from: PipelineStage, to: PipelineStage): void {
    if (!this.onStateChange) return;
    try {
      this.onStateChange(alertId, from, to);
    } catch (error) {
      console.warn(`[AlertPipeline] State listener failed: ${errorMessage(error)}`);
    }
  }
}
