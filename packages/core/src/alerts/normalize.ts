/**
 * Alert normalization
 *
 * Turns a CloudWatch alarm (SNS-wrapped or direct) or a generic alert
 * request into an Alert. CloudWatch OK (recovery) notifications yield null.
 */

import { createHash, randomUUID } from "crypto";
import { z } from "zod";
import { AlertSchema, AlertSeveritySchema, type Alert, type AlertSeverity } from "../types/alert";
import { AlertValidationError } from "../types/errors";

export const CLOUDWATCH_SOURCE = "aws-cloudwatch-sns";
export const GENERIC_SOURCE = "generic";

/**
 * CloudWatch Alarm SNS Message format
 * https://docs.aws.amazon.com/AmazonCloudWatch/latest/monitoring/AlarmThatSendsEmail.html
 */
const CloudWatchAlarmSchema = z.object({
  AlarmName: z.string().min(1),
  AlarmDescription: z.string().nullable().optional(),
  NewStateValue: z.enum(["ALARM", "OK", "INSUFFICIENT_DATA"]),
  NewStateReason: z.string().optional(),
  StateChangeTime: z.string().optional(),
  Region: z.string().optional(),
  AlarmArn: z.string().optional(),
  Trigger: z
    .object({
      MetricName: z.string().optional(),
      Namespace: z.string().optional(),
      Dimensions: z
        .array(z.object({ name: z.string().optional(), value: z.string().optional() }))
        .optional(),
    })
    .passthrough()
    .optional(),
});

/**
 * SNS message wrapper format
 */
const SnsNotificationSchema = z.object({
  Type: z.literal("Notification"),
  MessageId: z.string().default(""),
  Message: z.string().min(1),
});

const GenericAlertRequestSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1, "title is required"),
  message: z.string().default(""),
  severity: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
    AlertSeveritySchema
  ),
  sourceService: z.string().min(1).default(GENERIC_SOURCE),
  dimensions: z.record(z.string(), z.string()).default({}),
  labels: z.record(z.string(), z.string()).default({}),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

type CloudWatchAlarm = z.infer<typeof CloudWatchAlarmSchema>;

export type AlertPayloadKind = "cloudwatch-sns" | "cloudwatch" | "generic";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function detectPayloadKind(payload: unknown): AlertPayloadKind | null {
  if (!isRecord(payload)) return null;
  if (payload.Type === "Notification" && typeof payload.Message === "string") {
    return "cloudwatch-sns";
  }
  if (typeof payload.AlarmName === "string" && "NewStateValue" in payload) {
    return "cloudwatch";
  }
  if ("title" in payload && "severity" in payload) {
    return "generic";
  }
  return null;
}

export function mapCloudWatchState(state: CloudWatchAlarm["NewStateValue"]): AlertSeverity | null {
  switch (state) {
    case "ALARM":
      return "CRITICAL";
    case "INSUFFICIENT_DATA":
      return "WARNING";
    case "OK":
      return null;
  }
}

/**
 * `cw-` plus 16 hex chars of sha256("<messageId>:<alarmArn>")
 */
export function cloudWatchAlertId(messageId: string, alarmArn: string): string {
  const digest = createHash("sha256").update(`${messageId}:${alarmArn}`).digest("hex");
  return `cw-${digest.slice(0, 16)}`;
}

/**
 * CloudWatch writes offsets without a colon ("2024-01-15T10:30:00.000+0000")
 */
export function parseCloudWatchTime(value: string | undefined, now: Date): string {
  if (!value) return now.toISOString();
  const parsed = new Date(value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
  return isNaN(parsed.getTime()) ? now.toISOString() : parsed.toISOString();
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`);
}

function fromCloudWatch(
  alarm: CloudWatchAlarm,
  messageId: string,
  rawPayload: string,
  now: Date
): Alert | null {
  const severity = mapCloudWatchState(alarm.NewStateValue);
  if (severity === null) {
    return null;
  }

  const dimensions: Record<string, string> = {};
  const trigger = alarm.Trigger;
  if (trigger?.MetricName) dimensions.MetricName = trigger.MetricName;
  if (trigger?.Namespace) dimensions.Namespace = trigger.Namespace;
  for (const dimension of trigger?.Dimensions ?? []) {
    if (dimension.name && dimension.value !== undefined) {
      dimensions[dimension.name] = dimension.value;
    }
  }

  const labels: Record<string, string> = {};
  if (alarm.Region) labels.region = alarm.Region;

  return AlertSchema.parse({
    id: cloudWatchAlertId(messageId, alarm.AlarmArn ?? ""),
    title: alarm.AlarmName,
    message: alarm.NewStateReason || alarm.AlarmDescription || "No reason provided",
    severity,
    sourceService: CLOUDWATCH_SOURCE,
    dimensions,
    labels,
    timestamp: parseCloudWatchTime(alarm.StateChangeTime, now),
    rawPayload,
  });
}

function parseAlarm(value: unknown): CloudWatchAlarm {
  const result = CloudWatchAlarmSchema.safeParse(value);
  if (!result.success) {
    throw new AlertValidationError("Invalid CloudWatch alarm", issuesOf(result.error));
  }
  return result.data;
}

/**
 * Normalize an incoming payload. Returns null for CloudWatch OK states;
 * throws AlertValidationError for anything unrecognized or malformed.
 */
export function normalizeAlert(payload: unknown, now: Date = new Date()): Alert | null {
  const kind = detectPayloadKind(payload);
  const rawPayload = JSON.stringify(payload);

  switch (kind) {
    case "cloudwatch-sns": {
      const parsed = SnsNotificationSchema.safeParse(payload);
      if (!parsed.success) {
        throw new AlertValidationError("Invalid SNS notification", issuesOf(parsed.error));
      }
      const envelope = parsed.data;
      let message: unknown;
      try {
        message = JSON.parse(envelope.Message);
      } catch (error) {
        throw new AlertValidationError("SNS Message is not a JSON CloudWatch alarm", [
          error instanceof Error ? error.message : String(error),
        ]);
      }
      return fromCloudWatch(parseAlarm(message), envelope.MessageId, rawPayload, now);
    }

    case "cloudwatch":
      return fromCloudWatch(parseAlarm(payload), "", rawPayload, now);

    case "generic": {
      const result = GenericAlertRequestSchema.safeParse(payload);
      if (!result.success) {
        throw new AlertValidationError("Invalid alert request", issuesOf(result.error));
      }
      const request = result.data;
      return AlertSchema.parse({
        id: request.id ?? randomUUID(),
        title: request.title,
        message: request.message,
        severity: request.severity,
        sourceService: request.sourceService,
        dimensions: request.dimensions,
        labels: request.labels,
        timestamp: request.timestamp ?? now.toISOString(),
        rawPayload,
      });
    }

    case null:
      throw new AlertValidationError("Unrecognized alert payload", [
        "expected a CloudWatch alarm or an alert with title and severity",
      ]);
  }
}
