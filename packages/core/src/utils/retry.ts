/**
 * Retry utility with exponential backoff for LLM calls and webhook delivery
 */

import { sleep } from "./timeout";

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add jitter to prevent thundering herd (default: true) */
  jitter?: boolean;
  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback fired before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

type BackoffOptions = Required<Omit<RetryOptions, "isRetryable" | "onRetry">>;

const DEFAULT_OPTIONS: BackoffOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Errors that should trigger a retry
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "RetryableError";
  }
}

/**
 * Check if an error is retryable based on common patterns
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RetryableError) {
    return true;
  }

  // Network errors
  if (error instanceof TypeError && error.message.includes("fetch")) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("etimedout") ||
      message.includes("socket hang up") ||
      message.includes("network")
    ) {
      return true;
    }

    // HTTP status code patterns, e.g. "Ollama API error: 503 - ..."
    const statusMatch = error.message.match(/API error: (\d{3})/);
    if (statusMatch) {
      const status = parseInt(statusMatch[1], 10);
      return status === 429 || (status >= 500 && status < 600);
    }
  }

  return false;
}

/**
 * Calculate delay for the next retry attempt with exponential backoff
 */
export function calculateDelay(
  attempt: number,
  options: BackoffOptions,
  retryAfterMs?: number
): number {
  if (retryAfterMs) {
    return Math.min(retryAfterMs, options.maxDelayMs);
  }

  let delay =
    options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);
  delay = Math.min(delay, options.maxDelayMs);

  // ±25%
  if (options.jitter) {
    const jitterFactor = 0.75 + Math.random() * 0.5;
    delay = Math.floor(delay * jitterFactor);
  }

  return delay;
}

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const checkRetryable = opts.isRetryable ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries || !checkRetryable(error)) {
        throw error;
      }

      const retryAfterMs =
        error instanceof RetryableError ? error.retryAfterMs : undefined;
      const delayMs = calculateDelay(attempt, opts, retryAfterMs);

      opts.onRetry?.(error, attempt + 1, delayMs);

      await sleep(delayMs);
    }
  }
}

/**
 * Throw RetryableError on 429/5xx responses and a plain Error on other failures
 */
export async function ensureOk(response: Response, label: string): Promise<Response> {
  if (response.ok) {
    return response;
  }

  const errorText = await response.text();

  if (response.status === 429 || response.status >= 500) {
    const retryAfter = response.headers.get("retry-after");
    let retryAfterMs: number | undefined;

    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        retryAfterMs = seconds * 1000;
      }
    }

    throw new RetryableError(
      `${label} API error: ${response.status} - ${errorText}`,
      response.status,
      retryAfterMs
    );
  }

  throw new Error(`${label} API error: ${response.status} - ${errorText}`);
}
