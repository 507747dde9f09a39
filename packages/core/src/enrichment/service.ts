/**
 * Context Enrichment
 *
 * Gathers resource metadata, recent metrics and recent logs for an alert.
 * The three fetches run concurrently, each under its own timeout; a source
 * that fails or times out contributes its empty value and is listed in
 * `degradedSources`. `enrich` never rejects because of a source.
 */

import type { ComputeMetadataPort, LogsPort, MetricsPort } from "../adapters/types";
import { extractResourceId, type Alert } from "../types/alert";
import {
  lookbackWindow,
  type EnrichedContext,
  type EnrichmentSource,
  type LogEntry,
  type MetricSnapshot,
  type ResourceMetadata,
} from "../types/context";
import { errorMessage } from "../types/errors";
import { withTimeout } from "../utils/timeout";

export interface ContextEnrichmentConfig {
  metadata: ComputeMetadataPort;
  metrics: MetricsPort;
  logs: LogsPort;
  /** Metrics and logs window (default: 15) */
  lookbackMinutes?: number;
  /** Per-source timeout (default: 10000) */
  timeoutMs?: number;
  /** Logs filter passed to the logs port */
  logQuery?: string;
  /** Clock, for tests */
  now?: () => Date;
}

export class ContextEnrichmentService {
  private metadata: ComputeMetadataPort;
  private metrics: MetricsPort;
  private logs: LogsPort;
  private lookbackMinutes: number;
  private timeoutMs: number;
  private logQuery?: string;
  private now: () => Date;

  constructor(config: ContextEnrichmentConfig) {
    this.metadata = config.metadata;
    this.metrics = config.metrics;
    this.logs = config.logs;
    this.lookbackMinutes = config.lookbackMinutes ?? 15;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.logQuery = config.logQuery;
    this.now = config.now ?? (() => new Date());
  }

  async enrich(alert: Alert): Promise<EnrichedContext> {
    const resourceId = extractResourceId(alert);

    if (!resourceId) {
      console.log(`[ContextEnrichment] Alert ${alert.id} has no resource id, skipping enrichment`);
      return { alert, resource: null, metrics: [], logs: [], degradedSources: [] };
    }

    const window = lookbackWindow(this.lookbackMinutes, this.now());
    const degradedSources: EnrichmentSource[] = [];

    const [resource, metrics, logs] = await Promise.all([
      this.fetchSource<ResourceMetadata | null>(
        "metadata",
        () => this.metadata.get(resourceId),
        null,
        degradedSources
      ),
      this.fetchSource<MetricSnapshot[]>(
        "metrics",
        () => this.metrics.fetch(resourceId, window),
        [],
        degradedSources
      ),
      this.fetchSource<LogEntry[]>(
        "logs",
        () => this.logs.fetch(resourceId, window, this.logQuery),
        [],
        degradedSources
      ),
    ]);

    console.log(
      `[ContextEnrichment] Alert ${alert.id}: resource=${resource ? resource.id : "none"}, ` +
        `metrics=${metrics.length}, logs=${logs.length}` +
        (degradedSources.length > 0 ? `, degraded=${degradedSources.join(",")}` : "")
    );

    return {
      alert,
      resource,
      metrics: [...metrics].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp)),
      logs,
      degradedSources: (["metadata", "metrics", "logs"] as const).filter((source) =>
        degradedSources.includes(source)
      ),
    };
  }

  /**
   * Run one source under the timeout; failure yields `fallback`
   */
  private async fetchSource<T>(
    source: EnrichmentSource,
    fetch: () => Promise<T>,
    fallback: T,
    degraded: EnrichmentSource[]
  ): Promise<T> {
    try {
      const value = await withTimeout(
        fetch(),
        this.timeoutMs,
        `${source} fetch timed out after ${this.timeoutMs}ms`
      );
      return value ?? fallback;
    } catch (error) {
      degraded.push(source);
      console.warn(`[ContextEnrichment] ${source} unavailable: ${errorMessage(error)}`);
      return fallback;
    }
  }
}
