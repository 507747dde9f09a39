/**
 * Checklist Generator
 *
 * Prompts the LLM with the enriched context and retrieved runbook sections
 * and parses the reply into checklist steps. The reply is expected as JSON;
 * a reply that is not valid JSON is read as a markdown list instead.
 */

import { z } from "zod";
import { complete, extractJson } from "../llm/client";
import { buildChecklistPrompt } from "../llm/prompts/checklist";
import type { LLMProvider } from "../llm/providers/types";
import type { RetrievedChunk } from "../rag/types";
import { StepPrioritySchema, type ChecklistStep, type GenerationConfig, type StepPriority } from "../types/checklist";
import type { EnrichedContext } from "../types/context";
import { GenerationError, errorMessage } from "../types/errors";
import { withTimeout } from "../utils/timeout";

export interface GenerationInput {
  context: EnrichedContext;
  chunks: RetrievedChunk[];
  config: GenerationConfig;
}

export interface GeneratedChecklist {
  summary: string;
  steps: ChecklistStep[];
}

/**
 * Generation port: anything that turns context plus runbook sections into
 * checklist steps. Rejects on failure.
 */
export interface ChecklistGenerator {
  /** Provider id recorded on the checklist */
  readonly providerId: string;
  generate(input: GenerationInput): Promise<GeneratedChecklist>;
}

const MAX_SUMMARY_LENGTH = 200;

const LlmStepSchema = z.object({
  description: z.string().trim().min(1),
  priority: z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
      StepPrioritySchema
    )
    .catch("MEDIUM"),
  rationale: z.string().optional(),
  commands: z.array(z.string()).optional(),
  sourceChunkId: z.string().optional(),
});

const LlmChecklistSchema = z.object({
  summary: z.string().default(""),
  // Malformed steps are dropped, not the whole reply
  steps: z.array(LlmStepSchema.nullable().catch(null)),
});

type LlmStep = z.infer<typeof LlmStepSchema>;

const MARKDOWN_STEP_PATTERN = /^\s*(?:Step\s+\d+:|[-*]|\d+[.)])\s*(.*)$/i;

function markdownPriority(text: string): StepPriority {
  const lower = text.toLowerCase();
  return lower.includes("critical") || lower.includes("urgent") ? "HIGH" : "MEDIUM";
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Read a markdown list ("1.", "-", "*", "Step N:") as checklist steps.
 * The first non-step line becomes the summary.
 */
export function parseMarkdownChecklist(markdown: string): GeneratedChecklist {
  const steps: ChecklistStep[] = [];
  let summary = "";

  for (const line of markdown.split("\n")) {
    const match = line.match(MARKDOWN_STEP_PATTERN);
    if (!match) {
      const text = line.replace(/^#+\s*/, "").trim();
      if (!summary && text) {
        summary = text;
      }
      continue;
    }

    const description = match[1].replace(/^\[[ xX]?\]\s*/, "").trim();
    if (!description) continue;

    steps.push({
      order: steps.length + 1,
      description,
      priority: markdownPriority(description),
      commands: [],
    });
  }

  return { summary: truncate(summary, MAX_SUMMARY_LENGTH), steps };
}

function toSteps(llmSteps: Array<LlmStep | null>, knownChunkIds: Set<string>): ChecklistStep[] {
  const valid = llmSteps.filter((step): step is LlmStep => step !== null);
  return valid.map((step, index) => {
    const result: ChecklistStep = {
      order: index + 1,
      description: step.description,
      priority: step.priority,
      commands: (step.commands ?? []).filter((command) => command.trim()),
    };
    if (step.rationale?.trim()) {
      result.rationale = step.rationale.trim();
    }
    if (step.sourceChunkId && knownChunkIds.has(step.sourceChunkId)) {
      result.sourceChunkId = step.sourceChunkId;
    }
    return result;
  });
}

/**
 * Parse a model reply. JSON first, markdown list as the fallback.
 */
export function parseChecklistResponse(
  response: string,
  knownChunkIds: Set<string>
): GeneratedChecklist {
  const json = extractJson(response);
  if (json !== undefined) {
    const parsed = LlmChecklistSchema.safeParse(json);
    if (parsed.success) {
      return {
        summary: truncate(parsed.data.summary.trim(), MAX_SUMMARY_LENGTH),
        steps: toSteps(parsed.data.steps, knownChunkIds),
      };
    }
    console.warn(
      `[ChecklistGenerator] Reply JSON did not match the checklist schema: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }

  return parseMarkdownChecklist(response);
}

export interface LlmChecklistGeneratorConfig {
  provider: LLMProvider;
  /** Bound on the whole generation call, retries included (default: 60000) */
  timeoutMs?: number;
  /** Retries on 429/5xx/network errors (default: 2) */
  maxRetries?: number;
}

export class LlmChecklistGenerator implements ChecklistGenerator {
  readonly providerId: string;

  private provider: LLMProvider;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(config: LlmChecklistGeneratorConfig) {
    this.provider = config.provider;
    this.providerId = config.provider.name;
    this.timeoutMs = config.timeoutMs ?? 60000;
    this.maxRetries = config.maxRetries ?? 2;
  }

  async generate(input: GenerationInput): Promise<GeneratedChecklist> {
    const chunks = input.chunks.slice(0, input.config.topK);
    const messages = buildChecklistPrompt({ context: input.context, chunks });

    let response: string;
    try {
      response = await withTimeout(
        complete(this.provider, messages, {
          model: input.config.model,
          temperature: input.config.temperature,
          maxTokens: input.config.maxTokens,
          retry: { maxRetries: this.maxRetries },
        }),
        this.timeoutMs,
        `Generation timed out after ${this.timeoutMs}ms`
      );
    } catch (error) {
      throw new GenerationError(`LLM generation failed: ${errorMessage(error)}`, { cause: error });
    }

    const result = parseChecklistResponse(
      response,
      new Set(chunks.map(({ chunk }) => chunk.id))
    );

    if (result.steps.length === 0) {
      throw new GenerationError("LLM reply contained no checklist steps");
    }

    return result;
  }
}
