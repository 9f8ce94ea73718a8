/**
 * Shared wiring for CLI commands: resolved config, provider plugins, report store.
 */

import { createConfigIO } from "../config/io.js";
import { resolveReportDir } from "../config/paths.js";
import type { OptimizerConfig } from "../config/schema.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { applyOptimizations } from "../optimizer/actions.js";
import { runAnalysisCycle, type AnalysisCycleResult } from "../optimizer/cycle.js";
import type { ActionOutcome } from "../optimizer/types.js";
import type { OptimizerPluginDefinition } from "../plugin-sdk/index.js";
import { BUNDLED_PLUGINS } from "../plugins/bundled.js";
import { loadProviderPlugins, type PluginRegistry } from "../plugins/registry.js";
import { serializeReport, type ReportDocument } from "../reports/serialize.js";
import { ReportStore } from "../reports/store.js";

export type CommandContext = {
  config: OptimizerConfig;
  registry: PluginRegistry;
  store: ReportStore;
  logger: SubsystemLogger;
};

export type CommandContextOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  plugins?: readonly OptimizerPluginDefinition[];
};

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const logger = createSubsystemLogger("optimizer");
  const config = createConfigIO({ env: options.env, configPath: options.configPath }).loadConfig();
  const registry = loadProviderPlugins({
    config,
    plugins: options.plugins ?? BUNDLED_PLUGINS,
    logger: logger.child("plugins"),
  });
  return { config, registry, store: new ReportStore(resolveReportDir(config.reportDir)), logger };
}

export type CycleRunOptions = {
  /** Apply provider actions; defaults to the config's `autoOptimize`. */
  applyActions?: boolean;
  dryRun?: boolean;
  save?: boolean;
  outputFile?: string;
  now?: Date;
};

export type CycleRunResult = {
  cycle: AnalysisCycleResult;
  actions?: ActionOutcome[];
  document: ReportDocument;
  reportPath?: string;
};

/** One full cycle: collect, classify, aggregate, optionally act, then persist. */
export async function executeCycle(
  ctx: CommandContext,
  options: CycleRunOptions = {},
): Promise<CycleRunResult> {
  const { config, registry, logger } = ctx;

  if (registry.collectors.length === 0) {
    logger.warn("No cloud providers are enabled; the report will be empty");
  }

  const cycle = await runAnalysisCycle({
    collectors: registry.collectors,
    thresholds: config.thresholds,
    timeoutMs: config.collectorTimeoutMs,
    now: options.now,
    logger: logger.child("cycle"),
  });

  let actions: ActionOutcome[] | undefined;
  if (options.applyActions ?? config.autoOptimize) {
    actions = await applyOptimizations({
      report: cycle.report,
      samples: cycle.samples,
      handlers: registry.actionHandlers,
      dryRun: options.dryRun ?? config.dryRun,
      deleteUnattachedStorage: config.deleteUnattachedStorage,
      logger: logger.child("actions"),
    });
  }

  const document = serializeReport({
    report: cycle.report,
    skipped: cycle.skipped,
    failedProviders: cycle.failedProviders,
    actions,
    advisories: cycle.advisories,
  });

  let reportPath: string | undefined;
  if (options.save ?? true) {
    reportPath = await ctx.store.save(document, options.outputFile);
    logger.info(`Report saved to ${reportPath}`);
  }

  return { cycle, actions, document, reportPath };
}
