import { describe, it, expect } from "vitest";
import {
  cloudWatchAlertId,
  detectPayloadKind,
  normalizeAlert,
  parseCloudWatchTime,
} from "../alerts/normalize";
import { AlertValidationError } from "../types/errors";

const NOW = new Date("2026-10-18T10:00:00.000Z");
const ALARM_ARN = "arn:aws:cloudwatch:us-east-1:123456789012:alarm:web-01-high-memory";

const alarm = {
  AlarmName: "web-01-high-memory",
  AlarmDescription: "Memory above 90% on web-01",
  NewStateValue: "ALARM",
  NewStateReason: "Threshold Crossed: 1 datapoint [93.1] was greater than the threshold (90.0).",
  StateChangeTime: "2026-10-18T09:45:00.000+0000",
  Region: "US East (N. Virginia)",
  AlarmArn: ALARM_ARN,
  Trigger: {
    MetricName: "mem_used_percent",
    Namespace: "CWAgent",
    Dimensions: [{ name: "InstanceId", value: "i-0abc123def4567890" }],
  },
};

function snsEnvelope(message: unknown) {
  return {
    Type: "Notification",
    MessageId: "msg-1",
    TopicArn: "arn:aws:sns:us-east-1:123456789012:alarms",
    Message: JSON.stringify(message),
  };
}

function rejection(payload: unknown): AlertValidationError {
  try {
    normalizeAlert(payload, NOW);
  } catch (error) {
    if (error instanceof AlertValidationError) return error;
    throw error;
  }
  throw new Error("expected an AlertValidationError");
}

describe("detectPayloadKind", () => {
  it("recognizes each payload shape", () => {
    expect(detectPayloadKind(snsEnvelope(alarm))).toBe("cloudwatch-sns");
    expect(detectPayloadKind(alarm)).toBe("cloudwatch");
    expect(detectPayloadKind({ title: "x", severity: "INFO" })).toBe("generic");
    expect(detectPayloadKind({ hello: "world" })).toBeNull();
    expect(detectPayloadKind([alarm])).toBeNull();
    expect(detectPayloadKind("ALARM")).toBeNull();
  });
});

describe("normalizeAlert", () => {
  it("unwraps an SNS CloudWatch alarm", () => {
    const payload = snsEnvelope(alarm);

    expect(normalizeAlert(payload, NOW)).toEqual({
      id: cloudWatchAlertId("msg-1", ALARM_ARN),
      title: "web-01-high-memory",
      message: "Threshold Crossed: 1 datapoint [93.1] was greater than the threshold (90.0).",
      severity: "CRITICAL",
      sourceService: "aws-cloudwatch-sns",
      dimensions: {
        MetricName: "mem_used_percent",
        Namespace: "CWAgent",
        InstanceId: "i-0abc123def4567890",
      },
      labels: { region: "US East (N. Virginia)" },
      timestamp: "2026-10-18T09:45:00.000Z",
      rawPayload: JSON.stringify(payload),
    });
  });

  it("accepts a direct alarm and maps INSUFFICIENT_DATA to WARNING", () => {
    const alert = normalizeAlert(
      { ...alarm, NewStateValue: "INSUFFICIENT_DATA", NewStateReason: "" },
      NOW
    );

    expect(alert).toMatchObject({
      id: cloudWatchAlertId("", ALARM_ARN),
      severity: "WARNING",
      message: "Memory above 90% on web-01",
    });
  });

  it("ignores recovery notifications", () => {
    expect(normalizeAlert(snsEnvelope({ ...alarm, NewStateValue: "OK" }), NOW)).toBeNull();
    expect(normalizeAlert({ ...alarm, NewStateValue: "OK" }, NOW)).toBeNull();
  });

  it("uses the receive time when the alarm has none", () => {
    expect(normalizeAlert({ ...alarm, StateChangeTime: undefined }, NOW)?.timestamp).toBe("2026-10-18T10:00:00.000Z");
  });

  it("normalizes a generic alert request", () => {
    const payload = {
      id: "deploy-42",
      title: "Checkout latency high",
      severity: " warning ",
      dimensions: { resourceId: "i-123" },
      labels: { team: "payments" },
      timestamp: "2026-10-18T09:00:00+02:00",
    };

    expect(normalizeAlert(payload, NOW)).toEqual({
      id: "deploy-42",
      title: "Checkout latency high",
      message: "",
      severity: "WARNING",
      sourceService: "generic",
      dimensions: { resourceId: "i-123" },
      labels: { team: "payments" },
      timestamp: "2026-10-18T09:00:00+02:00",
      rawPayload: JSON.stringify(payload),
    });
  });

  it("generates an id and timestamp for a generic alert without them", () => {
    const alert = normalizeAlert({ title: "Disk full", severity: "CRITICAL" }, NOW);

    expect(alert?.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(alert?.timestamp).toBe("2026-10-18T10:00:00.000Z");
  });

  it("rejects a generic alert with a bad severity", () => {
    const error = rejection({ title: "Disk full", severity: "LOUD" });

    expect(error.message).toBe("Invalid alert request");
    expect(error.issues).toEqual([
      "severity: Invalid enum value. Expected 'INFO' | 'WARNING' | 'CRITICAL', received 'LOUD'",
    ]);
  });

  it("rejects an SNS message that is not JSON", () => {
    const error = rejection({ Type: "Notification", MessageId: "m", Message: "not json" });

    expect(error.message).toBe("SNS Message is not a JSON CloudWatch alarm");
  });

  it("rejects an SNS message that is not an alarm", () => {
    const error = rejection(snsEnvelope({ AlarmName: "x" }));

    expect(error.message).toBe("Invalid CloudWatch alarm");
    expect(error.issues).toEqual(["NewStateValue: Required"]);
  });

  it("rejects payloads of unknown shape", () => {
    expect(rejection({ hello: "world" }).message).toBe("Unrecognized alert payload");
    expect(rejection(null).message).toBe("Unrecognized alert payload");
  });
});

describe("cloudWatchAlertId", () => {
  it("is stable per message and alarm", () => {
    const id = cloudWatchAlertId("msg-1", ALARM_ARN);

    expect(id).toMatch(/^cw-[0-9a-f]{16}$/);
    expect(cloudWatchAlertId("msg-1", ALARM_ARN)).toBe(id);
    expect(cloudWatchAlertId("msg-2", ALARM_ARN)).not.toBe(id);
  });
});

describe("parseCloudWatchTime", () => {
  it("reads offsets without a colon", () => {
    expect(parseCloudWatchTime("2026-10-18T09:45:00.000+0000", NOW)).toBe("2026-10-18T09:45:00.000Z");
    expect(parseCloudWatchTime("2026-10-18T11:45:00.000+0200", NOW)).toBe("2026-10-18T09:45:00.000Z");
  });

  it("falls back to now for missing or unreadable values", () => {
    expect(parseCloudWatchTime(undefined, NOW)).toBe("2026-10-18T10:00:00.000Z");
    expect(parseCloudWatchTime("yesterday", NOW)).toBe("2026-10-18T10:00:00.000Z");
  });
});
