import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";

import type { OptimizerConfigInput } from "../config/schema.js";
import type { OptimizerPluginDefinition, ProviderOperations, ResourceSample } from "../plugin-sdk/index.js";
import { dispatchAction } from "../plugin-sdk/index.js";
import type { RuntimeEnv } from "../runtime.js";

export function createCapturingRuntime() {
  const logs: string[] = [];
  const errors: string[] = [];
  const runtime: RuntimeEnv = {
    log: (message) => logs.push(message),
    error: (message) => errors.push(message),
    exit: vi.fn(),
  };
  return { runtime, logs, errors };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "cloud-optimizer-cmd-"));
}

export async function writeConfigFile(dir: string, config: OptimizerConfigInput): Promise<string> {
  const file = path.join(dir, "config.json");
  await fs.writeFile(file, JSON.stringify(config));
  return file;
}

/** An AWS plugin that returns fixed samples and records stop calls. */
export function makeFakeAwsPlugin(samples: ResourceSample[], ops: ProviderOperations = {}): OptimizerPluginDefinition {
  return {
    id: "aws",
    name: "AWS",
    provider: "AWS",
    isEnabled: (providers) => providers.aws.enabled,
    register: (api) => {
      api.registerCollector({ provider: "AWS", collect: async () => samples });
      api.registerActionHandler({ provider: "AWS", apply: (request) => dispatchAction(request, ops) });
    },
  };
}

export const IDLE_INSTANCE: ResourceSample = {
  resourceId: "i-idle",
  provider: "AWS",
  kind: "COMPUTE",
  avgCpuPercent: 1,
  avgMemoryPercent: 50,
  hourlyCost: 0.1,
  isAttachedOrRunning: true,
  observationWindowHours: 24,
};

export const BUSY_INSTANCE: ResourceSample = {
  ...IDLE_INSTANCE,
  resourceId: "i-busy",
  avgCpuPercent: 70,
};
