import {
  dispatchAction,
  withTimeout,
  type ActionOutcome,
  type ActionRequest,
  type OptimizationActionHandler,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import type { AzureClientFactory } from "./clients.js";

export type AzureActionHandlerOptions = {
  createClients: AzureClientFactory;
  callTimeoutMs: number;
};

function locate(sample: ResourceSample, nameKey: "vmName" | "diskName"): { resourceGroup: string; name: string } {
  const resourceGroup = sample.attributes?.resourceGroup;
  const name = sample.attributes?.[nameKey];
  if (!resourceGroup || !name) {
    throw new Error(`Azure resource ${sample.resourceId} is missing its resource group or name`);
  }
  return { resourceGroup, name };
}

/**
 * Deallocates VMs (compute billing stops) and deletes unattached managed disks.
 * Both return once ARM has accepted the long-running operation; completion is
 * not awaited, so the outcome reports the operation as started.
 */
export class AzureActionHandler implements OptimizationActionHandler {
  readonly provider = "AZURE" as const;

  constructor(private readonly options: AzureActionHandlerOptions) {}

  async apply(request: ActionRequest): Promise<ActionOutcome> {
    return dispatchAction(request, {
      stop: (sample) => this.deallocate(sample),
      delete: (sample) => this.deleteDisk(sample),
    });
  }

  private async deallocate(sample: ResourceSample): Promise<string> {
    const { resourceGroup, name } = locate(sample, "vmName");
    const { compute } = await this.options.createClients();
    await withTimeout(
      (signal) => compute.virtualMachines.beginDeallocate(resourceGroup, name, { abortSignal: signal }),
      this.options.callTimeoutMs,
      `deallocate ${name}`,
    );
    return `Deallocation of Azure VM ${name} in ${resourceGroup} started`;
  }

  private async deleteDisk(sample: ResourceSample): Promise<string> {
    const { resourceGroup, name } = locate(sample, "diskName");
    const { compute } = await this.options.createClients();
    await withTimeout(
      (signal) => compute.disks.beginDelete(resourceGroup, name, { abortSignal: signal }),
      this.options.callTimeoutMs,
      `delete disk ${name}`,
    );
    return `Deletion of Azure disk ${name} in ${resourceGroup} started`;
  }
}
