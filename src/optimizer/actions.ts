/**
 * Optimization actions — hands each underutilized result to its provider's
 * action handler. Only invoked when auto-optimize is on (or on explicit CLI
 * request); the decision to call this lives with the caller.
 */

import type { OptimizationActionHandler, PluginLogger } from "../plugin-sdk/index.js";
import { formatErrorMessage } from "./errors.js";
import type {
  ActionOutcome,
  ClassificationResult,
  CloudProvider,
  OptimizationReport,
  ResourceSample,
} from "./types.js";

export type ApplyOptimizationsOptions = {
  report: OptimizationReport;
  samples: readonly ResourceSample[];
  handlers: readonly OptimizationActionHandler[];
  dryRun: boolean;
  deleteUnattachedStorage: boolean;
  logger?: PluginLogger;
};

function skippedOutcome(result: ClassificationResult, message: string): ActionOutcome {
  return {
    resourceId: result.resourceId,
    provider: result.provider,
    kind: result.kind,
    action: "none",
    status: "skipped",
    message,
  };
}

function sampleKey(provider: CloudProvider, resourceId: string): string {
  return `${provider}:${resourceId}`;
}

/** Apply provider actions to every underutilized result, in report order. */
export async function applyOptimizations(options: ApplyOptimizationsOptions): Promise<ActionOutcome[]> {
  const { report, logger } = options;
  const handlers = new Map(options.handlers.map((h) => [h.provider, h]));
  const samples = new Map(options.samples.map((s) => [sampleKey(s.provider, s.resourceId), s]));
  const outcomes: ActionOutcome[] = [];

  for (const results of Object.values(report.perProviderResults)) {
    for (const result of results ?? []) {
      if (!result.underutilized) continue;

      if (result.kind === "OBJECT_STORE") {
        outcomes.push(skippedOutcome(result, "Object stores are reported only"));
        continue;
      }

      const handler = handlers.get(result.provider);
      if (!handler) {
        outcomes.push(skippedOutcome(result, `No action handler registered for ${result.provider}`));
        continue;
      }

      const sample = samples.get(sampleKey(result.provider, result.resourceId));
      if (!sample) {
        outcomes.push(skippedOutcome(result, "Originating sample not found"));
        continue;
      }

      try {
        const outcome = await handler.apply({
          result,
          sample,
          dryRun: options.dryRun,
          deleteUnattachedStorage: options.deleteUnattachedStorage,
        });
        logger?.info(`${outcome.provider} ${outcome.resourceId}: ${outcome.action} ${outcome.status} (${outcome.message})`);
        outcomes.push(outcome);
      } catch (error) {
        const message = formatErrorMessage(error);
        logger?.error(`${result.provider} ${result.resourceId}: action failed: ${message}`);
        outcomes.push({
          resourceId: result.resourceId,
          provider: result.provider,
          kind: result.kind,
          action: result.kind === "BLOCK_STORAGE" ? "delete" : "stop",
          status: "failed",
          message,
        });
      }
    }
  }

  return outcomes;
}
