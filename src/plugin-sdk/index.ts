/**
 * Plugin SDK — the surface provider extensions build against.
 */

import type { ProvidersConfig } from "../config/schema.js";
import type {
  ActionOutcome,
  CloudProvider,
  ClassificationResult,
  ResourceSample,
} from "../optimizer/types.js";

export type {
  ActionOutcome,
  ActionStatus,
  CloudProvider,
  ClassificationResult,
  OptimizationActionType,
  ResourceKind,
  ResourceSample,
} from "../optimizer/types.js";
export type {
  AwsProviderConfig,
  AzureProviderConfig,
  GcpProviderConfig,
  ProvidersConfig,
} from "../config/schema.js";
export { HOURS_PER_MONTH } from "../optimizer/classifier.js";
export { formatErrorMessage } from "../optimizer/errors.js";
export { withTimeout, TimeoutError } from "../optimizer/timeout.js";
export { lookupRate, storageHourlyCost, type PriceTable } from "../optimizer/pricing.js";
export { dispatchAction, actionForKind, type ProviderOperations } from "../optimizer/dispatch.js";

export type PluginLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

/** Settings every collector honours. */
export type CollectionSettings = {
  /** Averaging window for utilization metrics, in hours. */
  lookbackHours: number;
  /** Upper bound for any single provider API call, in ms. */
  callTimeoutMs: number;
};

export type CollectContext = {
  now: Date;
  /** Aborted once the cycle has given up on this collector; stop issuing calls. */
  signal?: AbortSignal;
};

/** Fetches the normalized samples for one provider. */
export interface ResourceCollector {
  readonly provider: CloudProvider;
  collect(ctx: CollectContext): Promise<ResourceSample[]>;
}

export type ActionRequest = {
  result: ClassificationResult;
  sample: ResourceSample;
  dryRun: boolean;
  deleteUnattachedStorage: boolean;
};

/** Stops or deletes underutilized resources for one provider. */
export interface OptimizationActionHandler {
  readonly provider: CloudProvider;
  apply(request: ActionRequest): Promise<ActionOutcome>;
}

export type OptimizerPluginApi = {
  readonly pluginId: string;
  readonly providers: ProvidersConfig;
  readonly collection: CollectionSettings;
  readonly logger: PluginLogger;
  registerCollector: (collector: ResourceCollector) => void;
  registerActionHandler: (handler: OptimizationActionHandler) => void;
};

export type OptimizerPluginDefinition = {
  id: string;
  name: string;
  provider: CloudProvider;
  isEnabled: (providers: ProvidersConfig) => boolean;
  register: (api: OptimizerPluginApi) => void;
};
