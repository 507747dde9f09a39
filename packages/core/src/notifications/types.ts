/**
 * Webhook destination types
 */

import type { DynamicChecklist } from "../types/checklist";
import type { AlertSeverity } from "../types/alert";

export type WebhookDestinationType =
  | "generic"
  | "slack"
  | "teams"
  | "pagerduty"
  | "email"
  | "file";

/**
 * Which checklists a destination receives. Empty matches everything.
 */
export interface WebhookFilter {
  /** Alert severities to deliver; empty or absent means all */
  severities?: AlertSeverity[];
  /** Labels the alert must carry with these exact values */
  requiredLabels?: Record<string, string>;
}

export interface WebhookConfig {
  name: string;
  type: WebhookDestinationType;
  /** Endpoint for HTTP destinations, output directory for "file" */
  url?: string;
  enabled: boolean;
  headers: Record<string, string>;
  filter: WebhookFilter;
  /** Retries after the first attempt (5xx and network errors only) */
  retryCount: number;
  /** Backoff base delay */
  retryDelayMs: number;
  /** PagerDuty Events v2 routing key */
  routingKey?: string;
  /** Email recipients */
  to?: string[];
  /** Email sender */
  from?: string;
}

/**
 * One delivery channel. `send` rejects on failure.
 */
export interface WebhookDestination {
  readonly config: WebhookConfig;
  send(checklist: DynamicChecklist): Promise<void>;
}

export interface WebhookResult {
  destination: string;
  success: boolean;
  /** HTTP status of the final attempt, when there was one */
  statusCode?: number;
  error?: string;
  attempts: number;
}
