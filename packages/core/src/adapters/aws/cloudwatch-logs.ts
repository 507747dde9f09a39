/**
 * CloudWatch Logs Insights source for recent log lines mentioning a resource
 */

import {
  CloudWatchLogsClient,
  StartQueryCommand,
  GetQueryResultsCommand,
  QueryStatus,
} from "@aws-sdk/client-cloudwatch-logs";
import type { LogsPort } from "../types";
import type { LogEntry, LookbackWindow } from "../../types/context";
import { sleep } from "../../utils/timeout";

const MAX_RESULTS = 100;
const POLL_INTERVAL_MS = 1000;
const MAX_POLLS = 30;

export interface CloudWatchLogsConfig {
  logGroupName: string;
  region?: string;
  client?: CloudWatchLogsClient;
  pollIntervalMs?: number;
}

type ResultField = { field?: string; value?: string };

export function buildInsightsQuery(resourceId: string, query?: string): string {
  const escaped = resourceId.replace(/["\\]/g, "\\$&");
  const parts = [
    "fields @timestamp, @message, @logStream",
    `filter @message like "${escaped}" or @logStream like "${escaped}"`,
  ];
  if (query && query.trim()) {
    parts.push(query.trim());
  }
  parts.push("sort @timestamp asc", `limit ${MAX_RESULTS}`);
  return parts.join(" | ");
}

/**
 * Logs Insights timestamps look like "2024-05-01 12:00:00.000" (UTC)
 */
function toIsoTimestamp(value: string | undefined): string {
  if (!value) {
    return new Date(0).toISOString();
  }
  const normalized = /[zZ]|[+-]\d{2}:?\d{2}$/.test(value)
    ? value.replace(" ", "T")
    : `${value.replace(" ", "T")}Z`;
  const parsed = new Date(normalized);
  return isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

export function detectSeverity(message: string): string {
  const match = message.match(/\b(FATAL|CRITICAL|ERROR|WARN(?:ING)?|INFO|DEBUG|TRACE)\b/i);
  if (!match) {
    return "INFO";
  }
  const level = match[1].toUpperCase();
  if (level.startsWith("WARN")) return "WARN";
  if (level === "CRITICAL") return "FATAL";
  return level;
}

export class CloudWatchLogsSource implements LogsPort {
  private client: CloudWatchLogsClient;
  private logGroupName: string;
  private pollIntervalMs: number;

  constructor(config: CloudWatchLogsConfig) {
    this.logGroupName = config.logGroupName;
    this.client = config.client ?? new CloudWatchLogsClient({ region: config.region });
    this.pollIntervalMs = config.pollIntervalMs ?? POLL_INTERVAL_MS;
  }

  async fetch(resourceId: string, window: LookbackWindow, query?: string): Promise<LogEntry[]> {
    const start = await this.client.send(
      new StartQueryCommand({
        logGroupName: this.logGroupName,
        startTime: Math.floor(window.start.getTime() / 1000),
        endTime: Math.floor(window.end.getTime() / 1000),
        queryString: buildInsightsQuery(resourceId, query),
        limit: MAX_RESULTS,
      })
    );

    if (!start.queryId) {
      throw new Error("CloudWatch Logs query returned no query id");
    }

    for (let poll = 0; poll < MAX_POLLS; poll++) {
      await sleep(this.pollIntervalMs);

      const result = await this.client.send(
        new GetQueryResultsCommand({ queryId: start.queryId })
      );
      const status = result.status ?? QueryStatus.Failed;

      if (status === QueryStatus.Running || status === QueryStatus.Scheduled) {
        continue;
      }
      if (status !== QueryStatus.Complete) {
        throw new Error(`CloudWatch Logs query ended with status ${status}`);
      }

      return (result.results || []).map((row) => this.toLogEntry(row));
    }

    throw new Error(`CloudWatch Logs query did not complete after ${MAX_POLLS} polls`);
  }

  private toLogEntry(row: ResultField[]): LogEntry {
    const fields: Record<string, string> = {};
    for (const field of row) {
      if (field.field && field.value !== undefined) {
        fields[field.field] = field.value;
      }
    }

    const message = fields["@message"] ?? "";
    return {
      timestamp: toIsoTimestamp(fields["@timestamp"]),
      message,
      source: fields["@logStream"] ?? this.logGroupName,
      severity: detectSeverity(message),
    };
  }
}
