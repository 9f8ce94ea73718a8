/**
 * Report aggregator — merges classification results from every provider into
 * one report with a deterministic total and recommendation order.
 */

import {
  CLOUD_PROVIDERS,
  type ClassificationResult,
  type CloudProvider,
  type OptimizationReport,
  type PerProviderResults,
} from "./types.js";

/** Group results by provider, keeping input order inside each group. */
export function groupByProvider(
  results: readonly ClassificationResult[],
): Map<CloudProvider, ClassificationResult[]> {
  const groups = new Map<CloudProvider, ClassificationResult[]>();
  for (const provider of CLOUD_PROVIDERS) groups.set(provider, []);
  for (const result of results) {
    groups.get(result.provider)?.push(result);
  }
  return groups;
}

export function formatUsd(amount: number): string {
  return amount.toFixed(2);
}

export function formatRecommendation(result: ClassificationResult): string {
  return (
    `Consider stopping ${result.provider} ${result.kind} ${result.resourceId} ` +
    `(estimated saving $${formatUsd(result.estimatedMonthlySaving)}/month)`
  );
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Saving descending, then resource id, provider and kind ascending. */
export function compareBySaving(a: ClassificationResult, b: ClassificationResult): number {
  if (a.estimatedMonthlySaving !== b.estimatedMonthlySaving) {
    return b.estimatedMonthlySaving - a.estimatedMonthlySaving;
  }
  return (
    compareText(a.resourceId, b.resourceId) ||
    compareText(a.provider, b.provider) ||
    compareText(a.kind, b.kind)
  );
}

/**
 * Build the report for one analysis cycle.
 *
 * The total is accumulated provider by provider (AWS, AZURE, GCP) and in input
 * order within each provider, so the same input always yields the same bits.
 */
export function aggregate(
  results: readonly ClassificationResult[],
  at: Date | string,
): OptimizationReport {
  const timestamp = typeof at === "string" ? at : at.toISOString();
  const groups = groupByProvider(results);

  const perProviderResults: PerProviderResults = {};
  const underutilized: ClassificationResult[] = [];
  let total = 0;

  for (const [provider, group] of groups) {
    if (group.length === 0) continue;
    perProviderResults[provider] = Object.freeze([...group]);
    for (const result of group) {
      if (!result.underutilized) continue;
      total += result.estimatedMonthlySaving;
      underutilized.push(result);
    }
  }

  const recommendations = [...underutilized].sort(compareBySaving).map(formatRecommendation);

  return Object.freeze({
    timestamp,
    perProviderResults: Object.freeze(perProviderResults),
    estimatedMonthlySavingsTotal: total,
    recommendations: Object.freeze(recommendations),
  });
}
