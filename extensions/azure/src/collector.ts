/**
 * Azure collector: virtual machines (power state + "Percentage CPU") and
 * managed disks.
 */

import type { Disk, VirtualMachine } from "@azure/arm-compute";

import {
  formatErrorMessage,
  lookupRate,
  storageHourlyCost,
  withTimeout,
  type CollectContext,
  type CollectionSettings,
  type PluginLogger,
  type ResourceCollector,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import { extractResourceGroup, type AzureClientFactory, type AzureClients } from "./clients.js";
import { DISK_GB_MONTH, VM_HOURLY } from "./pricing.js";

const POWER_STATE_PREFIX = "PowerState/";

export type AzureCollectorOptions = {
  settings: CollectionSettings;
  createClients: AzureClientFactory;
  logger: PluginLogger;
};

type Window = { timespan: string; hours: number; signal?: AbortSignal };

export class AzureResourceCollector implements ResourceCollector {
  readonly provider = "AZURE" as const;

  constructor(private readonly options: AzureCollectorOptions) {}

  async collect(ctx: CollectContext): Promise<ResourceSample[]> {
    const { lookbackHours } = this.options.settings;
    const start = new Date(ctx.now.getTime() - lookbackHours * 3_600_000);
    const window: Window = {
      timespan: `${start.toISOString()}/${ctx.now.toISOString()}`,
      hours: lookbackHours,
      signal: ctx.signal,
    };

    ctx.signal?.throwIfAborted();
    const clients = await this.options.createClients();
    const vms = await this.collectVirtualMachines(clients, window);
    const disks = await this.collectDisks(clients, window);
    return [...vms, ...disks];
  }

  private async powerState(clients: AzureClients, resourceGroup: string, vmName: string): Promise<string> {
    try {
      const view = await withTimeout(
        (signal) => clients.compute.virtualMachines.instanceView(resourceGroup, vmName, { abortSignal: signal }),
        this.options.settings.callTimeoutMs,
        `instanceView ${vmName}`,
      );
      const status = view.statuses?.find((s) => s.code?.startsWith(POWER_STATE_PREFIX));
      return status?.code?.slice(POWER_STATE_PREFIX.length) ?? "unknown";
    } catch (error) {
      this.options.logger.warn(`Azure: power state unavailable for ${vmName}: ${formatErrorMessage(error)}`);
      return "unknown";
    }
  }

  private async averageCpu(clients: AzureClients, resourceUri: string, window: Window): Promise<number | undefined> {
    window.signal?.throwIfAborted();
    try {
      const response = await withTimeout(
        (signal) =>
          clients.monitor.metrics.list(resourceUri, {
            metricnames: "Percentage CPU",
            timespan: window.timespan,
            interval: "PT1H",
            aggregation: "Average",
            abortSignal: signal,
          }),
        this.options.settings.callTimeoutMs,
        "Percentage CPU",
      );
      const values: number[] = [];
      for (const metric of response.value ?? []) {
        for (const series of metric.timeseries ?? []) {
          for (const point of series.data ?? []) {
            if (typeof point.average === "number") values.push(point.average);
          }
        }
      }
      if (values.length === 0) return undefined;
      return values.reduce((sum, v) => sum + v, 0) / values.length;
    } catch (error) {
      this.options.logger.debug?.(`Azure: Percentage CPU unavailable for ${resourceUri}: ${formatErrorMessage(error)}`);
      return undefined;
    }
  }

  private async collectVirtualMachines(clients: AzureClients, window: Window): Promise<ResourceSample[]> {
    const vms: VirtualMachine[] = [];
    for await (const vm of clients.compute.virtualMachines.listAll({ abortSignal: window.signal })) {
      window.signal?.throwIfAborted();
      vms.push(vm);
    }

    const samples: ResourceSample[] = [];
    for (const vm of vms) {
      window.signal?.throwIfAborted();
      const armId = vm.id;
      const resourceGroup = armId ? extractResourceGroup(armId) : undefined;
      if (!armId || !vm.name || !resourceGroup) continue;

      const powerState = await this.powerState(clients, resourceGroup, vm.name);
      const running = powerState === "running";
      const vmSize = vm.hardwareProfile?.vmSize;

      samples.push({
        resourceId: `${resourceGroup}/${vm.name}`,
        provider: "AZURE",
        kind: "COMPUTE",
        avgCpuPercent: running ? await this.averageCpu(clients, armId, window) : undefined,
        hourlyCost: lookupRate(VM_HOURLY, vmSize),
        isAttachedOrRunning: running,
        observationWindowHours: window.hours,
        name: vm.name,
        location: vm.location,
        attributes: {
          resourceGroup,
          vmName: vm.name,
          vmSize: vmSize ?? "unknown",
          powerState,
        },
      });
    }
    return samples;
  }

  private async collectDisks(clients: AzureClients, window: Window): Promise<ResourceSample[]> {
    const disks: Disk[] = [];
    for await (const disk of clients.compute.disks.list({ abortSignal: window.signal })) {
      window.signal?.throwIfAborted();
      disks.push(disk);
    }

    return disks.flatMap((disk): ResourceSample[] => {
      const resourceGroup = disk.id ? extractResourceGroup(disk.id) : undefined;
      if (!disk.name || !resourceGroup) return [];
      const sizeGb = disk.diskSizeGB ?? 0;
      const sku = disk.sku?.name;
      return [
        {
          resourceId: `${resourceGroup}/${disk.name}`,
          provider: "AZURE",
          kind: "BLOCK_STORAGE",
          hourlyCost: storageHourlyCost(sizeGb, lookupRate(DISK_GB_MONTH, sku)),
          isAttachedOrRunning: disk.diskState !== "Unattached",
          observationWindowHours: window.hours,
          name: disk.name,
          location: disk.location,
          attributes: {
            resourceGroup,
            diskName: disk.name,
            sku: sku ?? "unknown",
            sizeGb: String(sizeGb),
            diskState: disk.diskState ?? "unknown",
          },
        },
      ];
    });
  }
}
