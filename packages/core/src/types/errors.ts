/**
 * Error taxonomy shared across the pipeline.
 *
 * Degraded-data failures (enrichment sources, retrieval) never surface as
 * errors; everything here is either a hard failure or a configuration problem.
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class AlertValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "AlertValidationError";
  }
}

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IngestionError";
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export type PipelineStage =
  | "RECEIVED"
  | "ENRICHED"
  | "RETRIEVED"
  | "GENERATED"
  | "DISPATCHED"
  | "FAILED";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly alertId: string,
    public readonly stage: PipelineStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
