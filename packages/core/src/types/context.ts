import type { Alert } from "./alert";

export interface ResourceMetadata {
  id: string;
  displayName: string;
  /** Instance shape or type, e.g. "t3.large" or "VM.Standard.E4.Flex" */
  shape?: string;
  /** Availability zone or placement domain */
  availabilityZone?: string;
  tags: Record<string, string>;
}

export interface MetricSnapshot {
  metricName: string;
  namespace?: string;
  /** ISO 8601 */
  timestamp: string;
  value: number;
  unit: string;
}

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  message: string;
  source: string;
  severity: string;
}

export type EnrichmentSource = "metadata" | "metrics" | "logs";

export interface EnrichedContext {
  alert: Alert;
  resource: ResourceMetadata | null;
  /** Ascending by timestamp */
  metrics: MetricSnapshot[];
  logs: LogEntry[];
  /** Sources that failed or timed out and were replaced by their empty value */
  degradedSources: EnrichmentSource[];
}

/** Time window ending now */
export interface LookbackWindow {
  start: Date;
  end: Date;
}

export function lookbackWindow(minutes: number, now: Date = new Date()): LookbackWindow {
  return {
    start: new Date(now.getTime() - minutes * 60 * 1000),
    end: now,
  };
}
