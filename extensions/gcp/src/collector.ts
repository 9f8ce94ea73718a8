/**
 * GCP collector: Compute Engine instances and persistent disks via aggregated
 * list, utilization from Cloud Monitoring.
 */

import { z } from "zod";

import {
  formatErrorMessage,
  lookupRate,
  storageHourlyCost,
  type CollectContext,
  type CollectionSettings,
  type PluginLogger,
  type ResourceCollector,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import { gcpAggregatedList, shortName } from "./api.js";
import type { AccessTokenProvider } from "./auth.js";
import { CPU_UTILIZATION_METRIC, MEMORY_PERCENT_USED_METRIC, meanByInstance } from "./monitoring.js";
import { DISK_GB_MONTH, MACHINE_HOURLY } from "./pricing.js";

export const COMPUTE_BASE = "https://compute.googleapis.com/compute/v1";

const instanceSchema = z.object({
  id: z.string(),
  name: z.string(),
  zone: z.string(),
  machineType: z.string().optional(),
  status: z.string().optional(),
});

const diskSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  zone: z.string().optional(),
  /** Set instead of `zone` on regional (replicated) disks. */
  region: z.string().optional(),
  sizeGb: z.string().optional(),
  type: z.string().optional(),
  users: z.array(z.string()).optional(),
});

export type GcpInstance = z.infer<typeof instanceSchema>;
export type GcpDisk = z.infer<typeof diskSchema>;

type MetricWindow = { start: Date; end: Date; signal?: AbortSignal };

/** Monitoring means can exceed 100 on bursting shared-core machines. */
function clampPercent(value: number | undefined): number | undefined {
  return value === undefined ? undefined : Math.min(100, value);
}

export type GcpCollectorOptions = {
  projectId: string;
  settings: CollectionSettings;
  getAccessToken: AccessTokenProvider;
  logger: PluginLogger;
};

export class GcpResourceCollector implements ResourceCollector {
  readonly provider = "GCP" as const;

  constructor(private readonly options: GcpCollectorOptions) {}

  private projectUrl(path: string): string {
    return `${COMPUTE_BASE}/projects/${encodeURIComponent(this.options.projectId)}/${path}`;
  }

  async collect(ctx: CollectContext): Promise<ResourceSample[]> {
    const { settings } = this.options;
    ctx.signal?.throwIfAborted();
    const token = await this.options.getAccessToken();
    const list = { timeout: settings.callTimeoutMs, signal: ctx.signal };

    const instances = await gcpAggregatedList(
      this.projectUrl("aggregated/instances"),
      token,
      "instances",
      instanceSchema,
      list,
    );
    const disks = await gcpAggregatedList(this.projectUrl("aggregated/disks"), token, "disks", diskSchema, list);

    const window: MetricWindow = {
      start: new Date(ctx.now.getTime() - settings.lookbackHours * 3_600_000),
      end: ctx.now,
      signal: ctx.signal,
    };
    const running = instances.some((instance) => instance.status === "RUNNING");
    const cpu = running
      ? await this.means(token, `metric.type="${CPU_UTILIZATION_METRIC}"`, window, 100)
      : new Map<string, number>();
    const memory = running
      ? await this.means(
          token,
          `metric.type="${MEMORY_PERCENT_USED_METRIC}" AND metric.labels.state="used"`,
          window,
          1,
        )
      : new Map<string, number>();

    return [
      ...instances.map((instance) => this.instanceSample(instance, cpu, memory)),
      ...disks.map((disk) => this.diskSample(disk)),
    ];
  }

  private async means(
    token: string,
    filter: string,
    window: MetricWindow,
    scale: number,
  ): Promise<Map<string, number>> {
    window.signal?.throwIfAborted();
    try {
      return await meanByInstance({
        projectId: this.options.projectId,
        token,
        filter,
        start: window.start,
        end: window.end,
        scale,
        timeoutMs: this.options.settings.callTimeoutMs,
        signal: window.signal,
      });
    } catch (error) {
      this.options.logger.debug?.(`GCP: monitoring query failed (${filter}): ${formatErrorMessage(error)}`);
      return new Map();
    }
  }

  private instanceSample(
    instance: GcpInstance,
    cpu: Map<string, number>,
    memory: Map<string, number>,
  ): ResourceSample {
    const zone = shortName(instance.zone);
    const machineType = instance.machineType ? shortName(instance.machineType) : undefined;
    const status = instance.status ?? "UNKNOWN";
    const running = status === "RUNNING";

    return {
      resourceId: `${zone}/${instance.name}`,
      provider: "GCP",
      kind: "COMPUTE",
      avgCpuPercent: running ? clampPercent(cpu.get(instance.id)) : undefined,
      avgMemoryPercent: running ? clampPercent(memory.get(instance.id)) : undefined,
      hourlyCost: lookupRate(MACHINE_HOURLY, machineType),
      isAttachedOrRunning: running,
      observationWindowHours: this.options.settings.lookbackHours,
      name: instance.name,
      location: zone,
      attributes: {
        zone,
        instanceName: instance.name,
        instanceId: instance.id,
        machineType: machineType ?? "unknown",
        status,
      },
    };
  }

  private diskSample(disk: GcpDisk): ResourceSample {
    // Zonal disks carry `zone`, regional disks `region`.
    const zone = disk.zone ? shortName(disk.zone) : undefined;
    const region = !zone && disk.region ? shortName(disk.region) : undefined;
    const location = zone ?? region ?? "global";
    const diskType = disk.type ? shortName(disk.type) : undefined;
    const sizeGb = Number(disk.sizeGb ?? 0);
    const users = disk.users ?? [];
    const attributes: Record<string, string> = {
      diskName: disk.name,
      diskType: diskType ?? "unknown",
      sizeGb: String(sizeGb),
    };
    if (zone) attributes.zone = zone;
    if (region) attributes.region = region;

    return {
      resourceId: `${location}/${disk.name}`,
      provider: "GCP",
      kind: "BLOCK_STORAGE",
      hourlyCost: storageHourlyCost(sizeGb, lookupRate(DISK_GB_MONTH, diskType)),
      isAttachedOrRunning: users.length > 0,
      observationWindowHours: this.options.settings.lookbackHours,
      name: disk.name,
      location,
      attributes,
    };
  }
}
