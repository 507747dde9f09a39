import type { AlertSeverity } from "../types/alert";
import type { DynamicChecklist } from "../types/checklist";
import { formatStepLine } from "./format";
import { postJson } from "./http";
import type { WebhookConfig, WebhookDestination } from "./types";

export const PAGERDUTY_EVENTS_URL = "https://events.pagerduty.com/v2/enqueue";

/** PagerDuty caps the summary at 1024 characters */
const MAX_SUMMARY = 1024;

export interface PagerDutyEvent {
  routing_key: string;
  event_action: "trigger";
  dedup_key: string;
  payload: {
    summary: string;
    source: string;
    severity: "critical" | "error" | "warning" | "info";
    timestamp: string;
    custom_details: Record<string, unknown>;
  };
}

function toPagerDutySeverity(severity: AlertSeverity): PagerDutyEvent["payload"]["severity"] {
  switch (severity) {
    case "CRITICAL":
      return "critical";
    case "WARNING":
      return "warning";
    case "INFO":
      return "info";
  }
}

export function formatPagerDutyEvent(
  checklist: DynamicChecklist,
  routingKey: string
): PagerDutyEvent {
  const summary = checklist.summary
    ? `${checklist.alertTitle}: ${checklist.summary}`
    : checklist.alertTitle;

  return {
    routing_key: routingKey,
    event_action: "trigger",
    dedup_key: checklist.alertId,
    payload: {
      summary: summary.length > MAX_SUMMARY ? `${summary.slice(0, MAX_SUMMARY - 3)}...` : summary,
      source: "runbook-synthesizer",
      severity: toPagerDutySeverity(checklist.severity),
      timestamp: checklist.generatedAt,
      custom_details: {
        checklist: checklist.steps.map(formatStepLine),
        source_runbooks: checklist.sourceRunbooks,
        llm_provider: checklist.llmProvider,
      },
    },
  };
}

/**
 * PagerDuty Events API v2 trigger
 */
export class PagerDutyDestination implements WebhookDestination {
  private url: string;
  private routingKey: string;

  constructor(readonly config: WebhookConfig) {
    if (!config.routingKey) {
      throw new Error(`PagerDuty destination ${config.name} requires a routingKey`);
    }
    this.routingKey = config.routingKey;
    this.url = config.url || PAGERDUTY_EVENTS_URL;
  }

  async send(checklist: DynamicChecklist): Promise<void> {
    await postJson(
      this.url,
      formatPagerDutyEvent(checklist, this.routingKey),
      `PagerDuty ${this.config.name}`,
      this.config.headers
    );
  }
}
