/**
 * Sources for running without a cloud account: no metadata, no metrics,
 * no logs. Enrichment then yields an alert-only context.
 */

import type { ComputeMetadataPort, LogsPort, MetricsPort } from "../types";
import type { LogEntry, MetricSnapshot, ResourceMetadata } from "../../types/context";

export class NoComputeMetadata implements ComputeMetadataPort {
  async get(_resourceId: string): Promise<ResourceMetadata | null> {
    return null;
  }
}

export class NoMetrics implements MetricsPort {
  async fetch(): Promise<MetricSnapshot[]> {
    return [];
  }
}

export class NoLogs implements LogsPort {
  async fetch(): Promise<LogEntry[]> {
    return [];
  }
}
