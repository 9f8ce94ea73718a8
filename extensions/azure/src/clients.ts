import type { ComputeManagementClient } from "@azure/arm-compute";
import type { MonitorClient } from "@azure/arm-monitor";
import type { TokenCredential } from "@azure/identity";

import type { AzureProviderConfig } from "../../../src/plugin-sdk/index.js";

export type AzureClients = {
  compute: ComputeManagementClient;
  monitor: MonitorClient;
};

export type AzureClientFactory = () => Promise<AzureClients>;

/**
 * SDK modules are loaded on first use so a disabled provider never pulls them in.
 * Without an explicit credential, DefaultAzureCredential walks env, managed
 * identity and the Azure CLI.
 */
export function createAzureClientFactory(
  config: AzureProviderConfig,
  credential?: TokenCredential,
): AzureClientFactory {
  return async () => {
    const subscriptionId = config.subscriptionId;
    if (!subscriptionId) {
      throw new Error("Azure subscriptionId is not configured");
    }

    let resolved = credential;
    if (!resolved) {
      const identity = await import("@azure/identity");
      resolved = new identity.DefaultAzureCredential(config.tenantId ? { tenantId: config.tenantId } : undefined);
    }

    const { ComputeManagementClient } = await import("@azure/arm-compute");
    const { MonitorClient } = await import("@azure/arm-monitor");
    return {
      compute: new ComputeManagementClient(resolved, subscriptionId),
      monitor: new MonitorClient(resolved, subscriptionId),
    };
  };
}

/** `/subscriptions/<sub>/resourceGroups/<rg>/providers/...` → `<rg>`. */
export function extractResourceGroup(resourceId: string): string | undefined {
  const parts = resourceId.split("/");
  const index = parts.findIndex((part) => part.toLowerCase() === "resourcegroups");
  return index >= 0 && index + 1 < parts.length ? parts[index + 1] : undefined;
}
