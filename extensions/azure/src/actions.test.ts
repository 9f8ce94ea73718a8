import { describe, it, expect, vi } from "vitest";
import type { ComputeManagementClient } from "@azure/arm-compute";
import type { MonitorClient } from "@azure/arm-monitor";

import type { ActionRequest, ResourceKind } from "../../../src/plugin-sdk/index.js";
import { AzureActionHandler } from "./actions.js";
import { createAzureClientFactory } from "./clients.js";

function createHandler() {
  // Pollers resolve once the operation is accepted; completion is never awaited.
  const poller = () => ({ pollUntilDone: vi.fn(() => new Promise<never>(() => {})) });
  const beginDeallocate = vi.fn(async (_rg: string, _name: string, _options?: unknown) => poller());
  const beginDelete = vi.fn(async (_rg: string, _name: string, _options?: unknown) => poller());
  const compute = {
    virtualMachines: { beginDeallocate },
    disks: { beginDelete },
  } as unknown as ComputeManagementClient;
  const handler = new AzureActionHandler({
    createClients: async () => ({ compute, monitor: {} as unknown as MonitorClient }),
    callTimeoutMs: 1000,
  });
  return { handler, beginDeallocate, beginDelete };
}

function request(
  kind: ResourceKind,
  attributes: Record<string, string>,
  overrides: Partial<ActionRequest> = {},
): ActionRequest {
  const resourceId = `${attributes.resourceGroup}/${attributes.vmName ?? attributes.diskName}`;
  return {
    sample: {
      resourceId,
      provider: "AZURE",
      kind,
      hourlyCost: 0.1,
      isAttachedOrRunning: kind === "COMPUTE",
      observationWindowHours: 24,
      attributes,
    },
    result: {
      resourceId,
      provider: "AZURE",
      kind,
      underutilized: true,
      reason: kind === "COMPUTE" ? "LOW_CPU" : "UNUSED_STORAGE",
      estimatedMonthlySaving: 73,
    },
    dryRun: false,
    deleteUnattachedStorage: false,
    ...overrides,
  };
}

describe("AzureActionHandler", () => {
  it("starts deallocating VMs in their resource group without waiting for completion", async () => {
    const { handler, beginDeallocate } = createHandler();

    const outcome = await handler.apply(request("COMPUTE", { resourceGroup: "rg-app", vmName: "vm-web" }));

    expect(beginDeallocate).toHaveBeenCalledWith("rg-app", "vm-web", { abortSignal: expect.any(AbortSignal) });
    expect(outcome.status).toBe("applied");
    expect(outcome.message).toBe("Deallocation of Azure VM vm-web in rg-app started");
  });

  it("deletes unattached disks when enabled", async () => {
    const { handler, beginDelete } = createHandler();

    const outcome = await handler.apply(
      request("BLOCK_STORAGE", { resourceGroup: "rg-data", diskName: "disk-1" }, { deleteUnattachedStorage: true }),
    );

    expect(beginDelete).toHaveBeenCalledWith("rg-data", "disk-1", { abortSignal: expect.any(AbortSignal) });
    expect(outcome.message).toBe("Deletion of Azure disk disk-1 in rg-data started");
  });

  it("fails when the sample lacks its resource group", async () => {
    const { handler, beginDeallocate } = createHandler();

    await expect(handler.apply(request("COMPUTE", { vmName: "vm-web" }))).rejects.toThrow(
      "Azure resource undefined/vm-web is missing its resource group or name",
    );
    expect(beginDeallocate).not.toHaveBeenCalled();
  });
});

describe("AzureActionHandler timeouts", () => {
  it("fails when ARM does not accept the operation in time", async () => {
    const beginDeallocate = vi.fn(() => new Promise<never>(() => {}));
    const compute = { virtualMachines: { beginDeallocate } } as unknown as ComputeManagementClient;
    const handler = new AzureActionHandler({
      createClients: async () => ({ compute, monitor: {} as unknown as MonitorClient }),
      callTimeoutMs: 20,
    });

    await expect(
      handler.apply(request("COMPUTE", { resourceGroup: "rg-app", vmName: "vm-web" })),
    ).rejects.toThrow("deallocate vm-web timed out after 20ms");
  });
});

describe("createAzureClientFactory", () => {
  it("rejects without a subscription id", async () => {
    const factory = createAzureClientFactory({ enabled: true });

    await expect(factory()).rejects.toThrow("Azure subscriptionId is not configured");
  });
});
