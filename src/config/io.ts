/**
 * Config loading — JSON file overlaid by environment variables, validated
 * against the Zod schema.
 */

import fs from "node:fs";
import os from "node:os";
import type { ZodError } from "zod";
import { ConfigError, formatErrorMessage } from "../optimizer/errors.js";
import { resolveConfigPath, resolveStateDir } from "./paths.js";
import { optimizerConfigSchema, type OptimizerConfig } from "./schema.js";

type RawObject = Record<string, unknown>;

export type ConfigIODeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  /** Explicit config file (e.g. from `--config`); wins over env and defaults. */
  configPath?: string;
  fs?: Pick<typeof fs, "existsSync" | "readFileSync">;
};

export type ConfigIO = {
  configPath: string;
  readConfigFile: () => RawObject;
  loadConfig: () => OptimizerConfig;
};

function isPlainObject(value: unknown): value is RawObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function child(obj: RawObject, key: string): RawObject {
  const existing = obj[key];
  if (isPlainObject(existing)) return existing;
  const created: RawObject = {};
  obj[key] = created;
  return created;
}

function setPath(target: RawObject, keys: string[], value: unknown): void {
  let cursor = target;
  for (const key of keys.slice(0, -1)) cursor = child(cursor, key);
  cursor[keys[keys.length - 1]] = value;
}

export function mergeConfig(base: RawObject, override: RawObject): RawObject {
  const merged: RawObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

/** Booleans accept true/false, 1/0, yes/no, on/off; anything else is left for the schema to reject. */
export function parseEnvBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  return raw;
}

const NUMERIC_ENV: Array<[string, string[]]> = [
  ["CPU_THRESHOLD", ["thresholds", "cpuThresholdPercent"]],
  ["MEMORY_THRESHOLD", ["thresholds", "memoryThresholdPercent"]],
  ["OPTIMIZATION_INTERVAL_HOURS", ["intervalHours"]],
  ["LOOKBACK_HOURS", ["lookbackHours"]],
  ["COLLECTOR_TIMEOUT_MS", ["collectorTimeoutMs"]],
  ["CALL_TIMEOUT_MS", ["callTimeoutMs"]],
];

const BOOLEAN_ENV: Array<[string, string[]]> = [
  ["AUTO_OPTIMIZE", ["autoOptimize"]],
  ["DRY_RUN", ["dryRun"]],
  ["DELETE_UNATTACHED_STORAGE", ["deleteUnattachedStorage"]],
];

const STRING_ENV: Array<[string, string[]]> = [
  ["REPORT_DIR", ["reportDir"]],
  ["AWS_PROFILE", ["providers", "aws", "profile"]],
  ["AZURE_SUBSCRIPTION_ID", ["providers", "azure", "subscriptionId"]],
  ["AZURE_TENANT_ID", ["providers", "azure", "tenantId"]],
  ["GOOGLE_CLOUD_PROJECT", ["providers", "gcp", "projectId"]],
  ["GOOGLE_OAUTH_ACCESS_TOKEN", ["providers", "gcp", "accessToken"]],
];

/** Translate recognised environment variables into a partial raw config. */
export function configFromEnv(env: NodeJS.ProcessEnv): RawObject {
  const raw: RawObject = {};
  const read = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  for (const [name, keys] of NUMERIC_ENV) {
    const value = read(name);
    if (value !== undefined) setPath(raw, keys, Number(value));
  }
  for (const [name, keys] of BOOLEAN_ENV) {
    const value = read(name);
    if (value !== undefined) setPath(raw, keys, parseEnvBoolean(value));
  }
  for (const [name, keys] of STRING_ENV) {
    const value = read(name);
    if (value !== undefined) setPath(raw, keys, value);
  }

  const region = read("AWS_REGION") ?? read("AWS_DEFAULT_REGION");
  if (region) setPath(raw, ["providers", "aws", "region"], region);

  return raw;
}

/**
 * Fill in `enabled` for providers the config does not mention explicitly:
 * a provider is on when its credential marker is present.
 */
function applyProviderDefaults(raw: RawObject, env: NodeJS.ProcessEnv): RawObject {
  const result = mergeConfig(raw, {});
  const providers = child(result, "providers");
  const aws = child(providers, "aws");
  const azure = child(providers, "azure");
  const gcp = child(providers, "gcp");

  if (aws.enabled === undefined) aws.enabled = Boolean(env.AWS_ACCESS_KEY_ID || env.AWS_PROFILE);
  if (azure.enabled === undefined) azure.enabled = Boolean(azure.subscriptionId);
  if (gcp.enabled === undefined) gcp.enabled = Boolean(gcp.projectId);
  return result;
}

function toConfigError(error: ZodError, source: string): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    source,
  );
}

export function parseConfig(raw: unknown, source = "config"): OptimizerConfig {
  const parsed = optimizerConfigSchema.safeParse(raw);
  if (!parsed.success) throw toConfigError(parsed.error, source);
  return parsed.data;
}

export function createConfigIO(deps: ConfigIODeps = {}): ConfigIO {
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const fsImpl = deps.fs ?? fs;
  const configPath = deps.configPath ?? resolveConfigPath(env, resolveStateDir(env, homedir), homedir);

  const readConfigFile = (): RawObject => {
    if (!fsImpl.existsSync(configPath)) return {};
    let parsed: unknown;
    try {
      parsed = JSON.parse(fsImpl.readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigError(
        [{ path: "", message: `could not parse JSON: ${formatErrorMessage(error)}` }],
        configPath,
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError([{ path: "", message: "expected a JSON object" }], configPath);
    }
    return parsed;
  };

  const loadConfig = (): OptimizerConfig => {
    const merged = mergeConfig(readConfigFile(), configFromEnv(env));
    return Object.freeze(parseConfig(applyProviderDefaults(merged, env), configPath));
  };

  return { configPath, readConfigFile, loadConfig };
}
