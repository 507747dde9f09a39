/**
 * Port interfaces for the external systems the pipeline reads from.
 *
 * Each port has an AWS variant and a local variant; `createServices`
 * picks one per port from configuration.
 */

import type {
  LogEntry,
  LookbackWindow,
  MetricSnapshot,
  ResourceMetadata,
} from "../types/context";

/**
 * Runbook source (object storage or a local directory)
 */
export interface StoragePort {
  /** Paths under a prefix */
  list(prefix: string): Promise<string[]>;
  /** Raw content, or null when the path does not exist */
  read(path: string): Promise<string | null>;
}

export interface ComputeMetadataPort {
  /** Null when the resource does not exist */
  get(resourceId: string): Promise<ResourceMetadata | null>;
}

export interface MetricsPort {
  /** Never null; empty when there is no data */
  fetch(resourceId: string, window: LookbackWindow): Promise<MetricSnapshot[]>;
}

export interface LogsPort {
  fetch(resourceId: string, window: LookbackWindow, query?: string): Promise<LogEntry[]>;
}

/**
 * Error name check that works across SDK error classes
 */
export function hasErrorName(error: unknown, ...names: string[]): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    typeof error.name === "string" &&
    names.includes(error.name)
  );
}
