/**
 * Report document — the JSON shape written to disk, using snake_case field
 * names for the report itself plus the cycle's bookkeeping.
 */

import type {
  ActionOutcome,
  ClassificationResult,
  CloudProvider,
  OptimizationReport,
  ProviderFailure,
  SkippedResource,
} from "../optimizer/types.js";

export type ClassificationRecord = {
  resource_id: string;
  provider: CloudProvider;
  kind: ClassificationResult["kind"];
  underutilized: boolean;
  reason: ClassificationResult["reason"];
  estimated_monthly_saving: number;
};

export type ReportDocument = {
  timestamp: string;
  per_provider_results: Partial<Record<CloudProvider, ClassificationRecord[]>>;
  estimated_monthly_savings_total: number;
  recommendations: string[];
  skipped_resources: Array<{ resource_id: string; provider: CloudProvider | null; reason: string }>;
  failed_providers: Array<{ provider: CloudProvider; error: string }>;
  actions?: Array<{
    resource_id: string;
    provider: CloudProvider;
    kind: ActionOutcome["kind"];
    action: ActionOutcome["action"];
    status: ActionOutcome["status"];
    message: string;
  }>;
  /** Present only when there is advice to give. */
  advisories?: string[];
};

export type SerializableCycle = {
  report: OptimizationReport;
  skipped?: readonly SkippedResource[];
  failedProviders?: readonly ProviderFailure[];
  actions?: readonly ActionOutcome[];
  advisories?: readonly string[];
};

function toRecord(result: ClassificationResult): ClassificationRecord {
  return {
    resource_id: result.resourceId,
    provider: result.provider,
    kind: result.kind,
    underutilized: result.underutilized,
    reason: result.reason,
    estimated_monthly_saving: result.estimatedMonthlySaving,
  };
}

export function serializeReport(cycle: SerializableCycle): ReportDocument {
  const { report } = cycle;
  const perProvider: ReportDocument["per_provider_results"] = {};
  for (const [provider, results] of Object.entries(report.perProviderResults)) {
    if (provider === "AWS" || provider === "AZURE" || provider === "GCP") {
      perProvider[provider] = (results ?? []).map(toRecord);
    }
  }

  const doc: ReportDocument = {
    timestamp: report.timestamp,
    per_provider_results: perProvider,
    estimated_monthly_savings_total: report.estimatedMonthlySavingsTotal,
    recommendations: [...report.recommendations],
    skipped_resources: (cycle.skipped ?? []).map((s) => ({
      resource_id: s.resourceId,
      provider: s.provider ?? null,
      reason: s.reason,
    })),
    failed_providers: (cycle.failedProviders ?? []).map((f) => ({ provider: f.provider, error: f.error })),
  };

  if (cycle.actions) {
    doc.actions = cycle.actions.map((a) => ({
      resource_id: a.resourceId,
      provider: a.provider,
      kind: a.kind,
      action: a.action,
      status: a.status,
      message: a.message,
    }));
  }

  if (cycle.advisories && cycle.advisories.length > 0) {
    doc.advisories = [...cycle.advisories];
  }

  return doc;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `optimization_report_YYYYMMDD_HHMMSS.json`, in UTC. */
export function reportFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `optimization_report_${date}_${time}.json`;
}
