import { z } from "zod";

import { gcpList } from "./api.js";

const MONITORING_BASE = "https://monitoring.googleapis.com/v3";

export const CPU_UTILIZATION_METRIC = "compute.googleapis.com/instance/cpu/utilization";
export const MEMORY_PERCENT_USED_METRIC = "agent.googleapis.com/memory/percent_used";

const timeSeriesSchema = z.object({
  resource: z.object({ labels: z.record(z.string()).optional() }).optional(),
  points: z
    .array(z.object({ value: z.object({ doubleValue: z.number().optional() }) }))
    .optional(),
});

export type MeanQuery = {
  projectId: string;
  token: string;
  /** Monitoring filter, e.g. `metric.type="..."`. */
  filter: string;
  start: Date;
  end: Date;
  /** Multiplier applied to every point (1 for percents, 100 for fractions). */
  scale: number;
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Hourly-aligned means per `instance_id` label across the window.
 * Instances with no points are absent from the map.
 */
export async function meanByInstance(query: MeanQuery): Promise<Map<string, number>> {
  const params = new URLSearchParams({
    filter: query.filter,
    "interval.startTime": query.start.toISOString(),
    "interval.endTime": query.end.toISOString(),
    "aggregation.alignmentPeriod": "3600s",
    "aggregation.perSeriesAligner": "ALIGN_MEAN",
  });
  const url = `${MONITORING_BASE}/projects/${encodeURIComponent(query.projectId)}/timeSeries?${params.toString()}`;
  const series = await gcpList(url, query.token, "timeSeries", timeSeriesSchema, {
    timeout: query.timeoutMs,
    signal: query.signal,
  });

  const sums = new Map<string, { total: number; count: number }>();
  for (const entry of series) {
    const instanceId = entry.resource?.labels?.instance_id;
    if (!instanceId) continue;
    const acc = sums.get(instanceId) ?? { total: 0, count: 0 };
    for (const point of entry.points ?? []) {
      if (typeof point.value.doubleValue !== "number") continue;
      acc.total += point.value.doubleValue * query.scale;
      acc.count += 1;
    }
    sums.set(instanceId, acc);
  }

  const means = new Map<string, number>();
  for (const [instanceId, { total, count }] of sums) {
    if (count > 0) means.set(instanceId, total / count);
  }
  return means;
}
