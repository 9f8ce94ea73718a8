/**
 * Analysis cycle — fans out to every provider collector, classifies each
 * sample on its own, and fans the results into a single report.
 */

import type { PluginLogger, ResourceCollector } from "../plugin-sdk/index.js";
import { lifecycleAdvisories } from "./advisories.js";
import { aggregate } from "./aggregator.js";
import { classify, validateSample, validateThresholds } from "./classifier.js";
import { formatErrorMessage, ValidationError } from "./errors.js";
import { withTimeout } from "./timeout.js";
import type {
  ClassificationResult,
  OptimizationReport,
  ProviderFailure,
  ResourceSample,
  SkippedResource,
  Thresholds,
} from "./types.js";

export type AnalysisCycleOptions = {
  collectors: readonly ResourceCollector[];
  thresholds: Thresholds;
  now?: Date;
  /** Per-collector bound; a slower provider is reported as failed. */
  timeoutMs: number;
  logger?: PluginLogger;
};

export type AnalysisCycleResult = {
  report: OptimizationReport;
  samples: ResourceSample[];
  skipped: SkippedResource[];
  failedProviders: ProviderFailure[];
  advisories: string[];
};

export type ClassifyBatchResult = {
  results: ClassificationResult[];
  samples: ResourceSample[];
  skipped: SkippedResource[];
};

function providerOf(input: unknown): ResourceSample["provider"] | undefined {
  if (input === null || typeof input !== "object" || !("provider" in input)) return undefined;
  const provider = input.provider;
  return provider === "AWS" || provider === "AZURE" || provider === "GCP" ? provider : undefined;
}

/**
 * Classify many samples, isolating failures per sample. Invalid samples end up
 * in `skipped` with the validation message; the rest are classified in order.
 */
export function classifyAll(inputs: readonly unknown[], thresholds: Thresholds): ClassifyBatchResult {
  const results: ClassificationResult[] = [];
  const samples: ResourceSample[] = [];
  const skipped: SkippedResource[] = [];

  inputs.forEach((input, index) => {
    try {
      const sample = validateSample(input);
      results.push(classify(sample, thresholds));
      samples.push(sample);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      skipped.push({
        resourceId: error.resourceId ?? `#${index}`,
        provider: providerOf(input),
        reason: error.message,
      });
    }
  });

  return { results, samples, skipped };
}

export async function runAnalysisCycle(options: AnalysisCycleOptions): Promise<AnalysisCycleResult> {
  const thresholds = validateThresholds(options.thresholds);
  const now = options.now ?? new Date();
  const { logger } = options;

  const settled = await Promise.allSettled(
    options.collectors.map((collector) =>
      withTimeout(
        (signal) => collector.collect({ now, signal }),
        options.timeoutMs,
        `${collector.provider} collection`,
      ),
    ),
  );

  const collected: unknown[] = [];
  const failedProviders: ProviderFailure[] = [];

  settled.forEach((outcome, index) => {
    const provider = options.collectors[index].provider;
    if (outcome.status === "fulfilled") {
      logger?.info(`${provider}: collected ${outcome.value.length} samples`);
      collected.push(...outcome.value);
    } else {
      const error = formatErrorMessage(outcome.reason);
      logger?.error(`${provider}: collection failed: ${error}`);
      failedProviders.push({ provider, error });
    }
  });

  const { results, samples, skipped } = classifyAll(collected, thresholds);
  for (const s of skipped) {
    logger?.warn(`Skipped ${s.resourceId}: ${s.reason}`);
  }

  const report = aggregate(results, now);
  logger?.info(
    `Cycle complete: ${results.length} classified, ${report.recommendations.length} underutilized, ` +
      `$${report.estimatedMonthlySavingsTotal.toFixed(2)}/month estimated savings`,
  );

  const advisories = lifecycleAdvisories(samples);
  return { report, samples, skipped, failedProviders, advisories };
}
