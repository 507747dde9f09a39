import { describe, it, expect, beforeEach, vi } from "vitest";
import type { ComputeMetadataPort, LogsPort, MetricsPort } from "../adapters/types";
import { ContextEnrichmentService } from "../enrichment/service";
import type { LogEntry, MetricSnapshot, ResourceMetadata } from "../types/context";
import { makeAlert } from "./fixtures";

const NOW = new Date("2026-10-18T10:00:00.000Z");

const resource: ResourceMetadata = {
  id: "i-0abc",
  displayName: "web-01",
  shape: "t3.large",
  availabilityZone: "us-east-1a",
  tags: { Name: "web-01", team: "platform" },
};

function metric(timestamp: string, value: number): MetricSnapshot {
  return { metricName: "CPUUtilization", namespace: "AWS/EC2", timestamp, value, unit: "Percent" };
}

const log: LogEntry = {
  timestamp: "2026-10-18T09:58:00.000Z",
  message: "ERROR out of memory",
  source: "web-01/app",
  severity: "ERROR",
};

describe("ContextEnrichmentService", () => {
  let metadata: { get: ReturnType<typeof vi.fn> } & ComputeMetadataPort;
  let metrics: { fetch: ReturnType<typeof vi.fn> } & MetricsPort;
  let logs: { fetch: ReturnType<typeof vi.fn> } & LogsPort;

  function createService(timeoutMs = 1000) {
    return new ContextEnrichmentService({
      metadata,
      metrics,
      logs,
      lookbackMinutes: 15,
      timeoutMs,
      logQuery: "filter @message like /ERROR/",
      now: () => NOW,
    });
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    metadata = { get: vi.fn().mockResolvedValue(resource) };
    metrics = {
      fetch: vi
        .fn()
        .mockResolvedValue([metric("2026-10-18T09:55:00.000Z", 92), metric("2026-10-18T09:50:00.000Z", 75)]),
    };
    logs = { fetch: vi.fn().mockResolvedValue([log]) };
  });

  it("gathers metadata, metrics and logs for the alert's resource", async () => {
    const alert = makeAlert();

    const context = await createService().enrich(alert);

    expect(context).toEqual({
      alert,
      resource,
      metrics: [metric("2026-10-18T09:50:00.000Z", 75), metric("2026-10-18T09:55:00.000Z", 92)],
      logs: [log],
      degradedSources: [],
    });

    const lookback = { start: new Date("2026-10-18T09:45:00.000Z"), end: NOW };
    expect(metadata.get).toHaveBeenCalledWith("i-0abc");
    expect(metrics.fetch).toHaveBeenCalledWith("i-0abc", lookback);
    expect(logs.fetch).toHaveBeenCalledWith("i-0abc", lookback, "filter @message like /ERROR/");
  });

  it("starts all three fetches before any completes", () => {
    metadata.get.mockReturnValue(new Promise(() => {}));
    metrics.fetch.mockReturnValue(new Promise(() => {}));
    logs.fetch.mockReturnValue(new Promise(() => {}));

    void createService(50).enrich(makeAlert());

    expect(metadata.get).toHaveBeenCalledTimes(1);
    expect(metrics.fetch).toHaveBeenCalledTimes(1);
    expect(logs.fetch).toHaveBeenCalledTimes(1);
  });

  it("skips enrichment when the alert names no resource", async () => {
    const alert = makeAlert({ dimensions: { MetricName: "Errors" } });

    await expect(createService().enrich(alert)).resolves.toEqual({
      alert,
      resource: null,
      metrics: [],
      logs: [],
      degradedSources: [],
    });
    expect(metadata.get).not.toHaveBeenCalled();
    expect(metrics.fetch).not.toHaveBeenCalled();
    expect(logs.fetch).not.toHaveBeenCalled();
  });

  it("degrades failed and timed-out sources to empty values", async () => {
    logs.fetch.mockReturnValue(new Promise(() => {}));
    metrics.fetch.mockRejectedValue(new Error("throttled"));

    const context = await createService(20).enrich(makeAlert());

    expect(context.resource).toEqual(resource);
    expect(context.metrics).toEqual([]);
    expect(context.logs).toEqual([]);
    expect(context.degradedSources).toEqual(["metrics", "logs"]);
    expect(console.warn).toHaveBeenCalledWith("[ContextEnrichment] metrics unavailable: throttled");
    expect(console.warn).toHaveBeenCalledWith(
      "[ContextEnrichment] logs unavailable: logs fetch timed out after 20ms"
    );
  });

  it("keeps metadata and logs when only metrics fails", async () => {
    const alert = makeAlert({ dimensions: { resourceId: "i-123" } });
    metrics.fetch.mockRejectedValue(new Error("GetMetricData denied"));

    const context = await createService().enrich(alert);

    expect(context).toEqual({
      alert,
      resource,
      metrics: [],
      logs: [log],
      degradedSources: ["metrics"],
    });
    expect(metadata.get).toHaveBeenCalledWith("i-123");
  });

  it("lists degraded sources in a fixed order", async () => {
    logs.fetch.mockRejectedValue(new Error("logs down"));
    metadata.get.mockReturnValue(
      new Promise((_, reject) => setTimeout(() => reject(new Error("metadata down")), 10))
    );

    const context = await createService().enrich(makeAlert());

    expect(context.degradedSources).toEqual(["metadata", "logs"]);
    expect(context.resource).toBeNull();
  });

  it("treats a missing resource as absent, not degraded", async () => {
    metadata.get.mockResolvedValue(null);

    const context = await createService().enrich(makeAlert());

    expect(context.resource).toBeNull();
    expect(context.degradedSources).toEqual([]);
  });

  it("finds the resource under any supported dimension key", async () => {
    await createService().enrich(makeAlert({ dimensions: { resourceId: " vm-42 " } }));

    expect(metadata.get).toHaveBeenCalledWith("vm-42");
  });
});
