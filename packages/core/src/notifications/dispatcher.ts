/**
 * Checklist Dispatcher
 *
 * Delivers a checklist to every enabled destination whose filter matches.
 * Destinations are independent: each gets its own bounded retry, and one
 * failing never affects the others. `dispatch` never rejects.
 */

import type { DynamicChecklist } from "../types/checklist";
import { errorMessage } from "../types/errors";
import { isRetryableError, RetryableError, withRetry } from "../utils/retry";
import { matchesWebhookFilter } from "./filter";
import type { WebhookDestination, WebhookResult } from "./types";

export interface ChecklistDispatcher {
  dispatch(checklist: DynamicChecklist): Promise<WebhookResult[]>;
}

/**
 * 5xx and network failures are retried; 4xx (including 429) are not
 */
export function isDeliveryRetryable(error: unknown): boolean {
  if (error instanceof RetryableError) {
    return error.statusCode === undefined || error.statusCode >= 500;
  }
  return isRetryableError(error);
}

function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof RetryableError) {
    return error.statusCode;
  }
  const match = error instanceof Error ? error.message.match(/API error: (\d{3})/) : null;
  return match ? parseInt(match[1], 10) : undefined;
}

export class WebhookDispatcher implements ChecklistDispatcher {
  constructor(private destinations: WebhookDestination[] = []) {}

  get destinationNames(): string[] {
    return this.destinations.map((destination) => destination.config.name);
  }

  async dispatch(
    checklist: DynamicChecklist,
    destinations: WebhookDestination[] = this.destinations
  ): Promise<WebhookResult[]> {
    const targets = destinations.filter((destination) => {
      const { config } = destination;
      if (!config.enabled) {
        return false;
      }
      if (!matchesWebhookFilter(config.filter, checklist)) {
        console.log(`[Dispatcher] ${config.name}: filter does not match alert ${checklist.alertId}`);
        return false;
      }
      return true;
    });

    const settled = await Promise.allSettled(
      targets.map((destination) => this.deliver(destination, checklist))
    );

    return settled.map((outcome, index) => {
      if (outcome.status === "fulfilled") {
        return outcome.value;
      }
      // deliver() reports failures as results; this is a defect in a destination
      const name = targets[index].config.name;
      console.error(`[Dispatcher] ${name}: unexpected failure:`, outcome.reason);
      return { destination: name, success: false, error: errorMessage(outcome.reason), attempts: 0 };
    });
  }

  private async deliver(
    destination: WebhookDestination,
    checklist: DynamicChecklist
  ): Promise<WebhookResult> {
    const { config } = destination;
    let attempts = 0;

    try {
      await withRetry(
        () => {
          attempts++;
          return destination.send(checklist);
        },
        {
          maxRetries: config.retryCount,
          initialDelayMs: config.retryDelayMs,
          isRetryable: isDeliveryRetryable,
          onRetry: (error, attempt, delayMs) => {
            console.warn(
              `[Dispatcher] ${config.name}: delivery failed, retry ${attempt}/${config.retryCount} in ${delayMs}ms: ${errorMessage(error)}`
            );
          },
        }
      );

      console.log(`[Dispatcher] Delivered checklist for ${checklist.alertId} to ${config.name}`);
      return { destination: config.name, success: true, attempts };
    } catch (error) {
      console.error(
        `[Dispatcher] ${config.name}: delivery failed after ${attempts} attempts: ${errorMessage(error)}`
      );
      return {
        destination: config.name,
        success: false,
        statusCode: statusCodeOf(error),
        error: errorMessage(error),
        attempts,
      };
    }
  }
}
