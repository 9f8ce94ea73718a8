/**
 * Provider plugin registry — runs each enabled plugin's `register` and
 * collects the collectors and action handlers it contributes.
 */

import type { OptimizerConfig } from "../config/schema.js";
import { formatErrorMessage } from "../optimizer/errors.js";
import type {
  OptimizationActionHandler,
  OptimizerPluginDefinition,
  PluginLogger,
  ResourceCollector,
} from "../plugin-sdk/index.js";

export type PluginStatus = "loaded" | "disabled" | "error";

export type PluginRecord = {
  id: string;
  name: string;
  provider: OptimizerPluginDefinition["provider"];
  status: PluginStatus;
  error?: string;
};

export type PluginRegistry = {
  plugins: PluginRecord[];
  collectors: ResourceCollector[];
  actionHandlers: OptimizationActionHandler[];
};

export type LoadPluginsOptions = {
  config: OptimizerConfig;
  plugins: readonly OptimizerPluginDefinition[];
  logger: PluginLogger;
};

export function loadProviderPlugins(options: LoadPluginsOptions): PluginRegistry {
  const { config, logger } = options;
  const registry: PluginRegistry = { plugins: [], collectors: [], actionHandlers: [] };

  for (const plugin of options.plugins) {
    const record: PluginRecord = {
      id: plugin.id,
      name: plugin.name,
      provider: plugin.provider,
      status: "loaded",
    };
    registry.plugins.push(record);

    if (!plugin.isEnabled(config.providers)) {
      record.status = "disabled";
      logger.warn(`${plugin.name}: credentials not configured, skipping`);
      continue;
    }

    try {
      plugin.register({
        pluginId: plugin.id,
        providers: config.providers,
        collection: {
          lookbackHours: config.lookbackHours,
          callTimeoutMs: config.callTimeoutMs,
        },
        logger,
        registerCollector: (collector) => registry.collectors.push(collector),
        registerActionHandler: (handler) => registry.actionHandlers.push(handler),
      });
      logger.debug?.(`${plugin.name}: registered`);
    } catch (error) {
      record.status = "error";
      record.error = formatErrorMessage(error);
      logger.error(`${plugin.name}: failed to register: ${record.error}`);
    }
  }

  return registry;
}
