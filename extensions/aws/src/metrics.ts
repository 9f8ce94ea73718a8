import { GetMetricStatisticsCommand, type CloudWatchClient, type Datapoint, type Dimension } from "@aws-sdk/client-cloudwatch";

import { formatErrorMessage, withTimeout, type PluginLogger } from "../../../src/plugin-sdk/index.js";

export type MetricQuery = {
  namespace: string;
  metricName: string;
  dimensions: Dimension[];
  start: Date;
  end: Date;
  periodSeconds: number;
};

export type MetricReader = {
  cloudwatch: CloudWatchClient;
  timeoutMs: number;
  logger: PluginLogger;
  /** Once aborted, no further metric calls are issued. */
  signal?: AbortSignal;
};

async function fetchDatapoints(reader: MetricReader, query: MetricQuery): Promise<Datapoint[] | undefined> {
  const label = `${query.namespace} ${query.metricName}`;
  reader.signal?.throwIfAborted();
  try {
    const response = await withTimeout(
      () =>
        reader.cloudwatch.send(
          new GetMetricStatisticsCommand({
            Namespace: query.namespace,
            MetricName: query.metricName,
            Dimensions: query.dimensions,
            StartTime: query.start,
            EndTime: query.end,
            Period: query.periodSeconds,
            Statistics: ["Average"],
          }),
        ),
      reader.timeoutMs,
      label,
    );
    return response.Datapoints ?? [];
  } catch (error) {
    reader.logger.debug?.(`${label} unavailable: ${formatErrorMessage(error)}`);
    return undefined;
  }
}

function averages(datapoints: Datapoint[]): number[] {
  return datapoints.flatMap((dp) => (typeof dp.Average === "number" ? [dp.Average] : []));
}

/** Mean of the datapoint averages; undefined when the metric is missing. */
export async function averageMetric(reader: MetricReader, query: MetricQuery): Promise<number | undefined> {
  const datapoints = await fetchDatapoints(reader, query);
  if (!datapoints) return undefined;
  const values = averages(datapoints);
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Average of the most recent datapoint; undefined when the metric is missing. */
export async function latestMetric(reader: MetricReader, query: MetricQuery): Promise<number | undefined> {
  const datapoints = await fetchDatapoints(reader, query);
  if (!datapoints) return undefined;
  let latest: Datapoint | undefined;
  for (const dp of datapoints) {
    if (typeof dp.Average !== "number") continue;
    if (!latest || (dp.Timestamp?.getTime() ?? 0) > (latest.Timestamp?.getTime() ?? 0)) latest = dp;
  }
  return latest?.Average;
}
