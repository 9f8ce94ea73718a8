/**
 * Optimizer core types — resource samples, classifications, and reports.
 */

// ── Enumerations ────────────────────────────────────────────────────────────────

export const CLOUD_PROVIDERS = ["AWS", "AZURE", "GCP"] as const;
export type CloudProvider = (typeof CLOUD_PROVIDERS)[number];

export const RESOURCE_KINDS = ["COMPUTE", "BLOCK_STORAGE", "DATABASE", "OBJECT_STORE"] as const;
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type UnderutilizationReason =
  | "LOW_CPU"
  | "LOW_MEMORY"
  | "LOW_CPU_AND_MEMORY"
  | "UNUSED_STORAGE"
  | "NONE";

// ── Samples ─────────────────────────────────────────────────────────────────────

/**
 * Normalized usage sample produced by a provider collector for one resource
 * and one analysis cycle.
 */
export interface ResourceSample {
  readonly resourceId: string;
  readonly provider: CloudProvider;
  readonly kind: ResourceKind;
  /** Average CPU utilization over the observation window, 0–100. */
  readonly avgCpuPercent?: number;
  /** Average memory utilization over the observation window, 0–100. */
  readonly avgMemoryPercent?: number;
  /** USD per hour, after any provider discounts. */
  readonly hourlyCost: number;
  readonly isAttachedOrRunning: boolean;
  readonly observationWindowHours: number;
  readonly name?: string;
  /** Region or zone. */
  readonly location?: string;
  /** Provider-specific details the action handlers need (zone, resource group, ...). */
  readonly attributes?: Readonly<Record<string, string>>;
}

export interface Thresholds {
  readonly cpuThresholdPercent: number;
  readonly memoryThresholdPercent: number;
}

export const DEFAULT_THRESHOLDS: Thresholds = {
  cpuThresholdPercent: 10,
  memoryThresholdPercent: 15,
};

// ── Results ─────────────────────────────────────────────────────────────────────

export interface ClassificationResult {
  readonly resourceId: string;
  readonly provider: CloudProvider;
  readonly kind: ResourceKind;
  readonly underutilized: boolean;
  readonly reason: UnderutilizationReason;
  readonly estimatedMonthlySaving: number;
}

export type PerProviderResults = Partial<Record<CloudProvider, readonly ClassificationResult[]>>;

export interface OptimizationReport {
  /** ISO-8601 instant the cycle was aggregated at. */
  readonly timestamp: string;
  readonly perProviderResults: PerProviderResults;
  readonly estimatedMonthlySavingsTotal: number;
  readonly recommendations: readonly string[];
}

// ── Cycle bookkeeping ───────────────────────────────────────────────────────────

export interface SkippedResource {
  resourceId: string;
  provider?: CloudProvider;
  reason: string;
}

export interface ProviderFailure {
  provider: CloudProvider;
  error: string;
}

export type ActionStatus = "applied" | "skipped" | "failed" | "dry-run";
export type OptimizationActionType = "stop" | "delete" | "none";

export interface ActionOutcome {
  resourceId: string;
  provider: CloudProvider;
  kind: ResourceKind;
  action: OptimizationActionType;
  status: ActionStatus;
  message: string;
}
