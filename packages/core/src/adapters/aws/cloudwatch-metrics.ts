/**
 * CloudWatch metrics for the alarming instance
 */

import {
  CloudWatchClient,
  GetMetricStatisticsCommand,
} from "@aws-sdk/client-cloudwatch";
import type { MetricsPort } from "../types";
import type { LookbackWindow, MetricSnapshot } from "../../types/context";

export interface MetricQuery {
  namespace: string;
  metricName: string;
  /** Dimension that carries the resource id */
  dimensionName: string;
}

export const DEFAULT_METRIC_QUERIES: MetricQuery[] = [
  { namespace: "AWS/EC2", metricName: "CPUUtilization", dimensionName: "InstanceId" },
];

export interface CloudWatchMetricsConfig {
  region?: string;
  client?: CloudWatchClient;
  queries?: MetricQuery[];
  /** Datapoint granularity in seconds */
  periodSeconds?: number;
}

export class CloudWatchMetricsSource implements MetricsPort {
  private client: CloudWatchClient;
  private queries: MetricQuery[];
  private period: number;

  constructor(config: CloudWatchMetricsConfig = {}) {
    this.client = config.client ?? new CloudWatchClient({ region: config.region });
    this.queries = config.queries ?? DEFAULT_METRIC_QUERIES;
    this.period = config.periodSeconds ?? 300;
  }

  async fetch(resourceId: string, window: LookbackWindow): Promise<MetricSnapshot[]> {
    const results = await Promise.all(
      this.queries.map((query) => this.fetchOne(query, resourceId, window))
    );

    return results
      .flat()
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  }

  private async fetchOne(
    query: MetricQuery,
    resourceId: string,
    window: LookbackWindow
  ): Promise<MetricSnapshot[]> {
    const result = await this.client.send(
      new GetMetricStatisticsCommand({
        Namespace: query.namespace,
        MetricName: query.metricName,
        Dimensions: [{ Name: query.dimensionName, Value: resourceId }],
        StartTime: window.start,
        EndTime: window.end,
        Period: this.period,
        Statistics: ["Average"],
      })
    );

    const snapshots: MetricSnapshot[] = [];
    for (const point of result.Datapoints || []) {
      if (!point.Timestamp || point.Average === undefined) continue;
      snapshots.push({
        metricName: query.metricName,
        namespace: query.namespace,
        timestamp: point.Timestamp.toISOString(),
        value: point.Average,
        unit: point.Unit ?? "None",
      });
    }
    return snapshots;
  }
}
