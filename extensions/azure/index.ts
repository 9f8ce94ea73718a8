/**
 * Azure provider plugin: virtual machines and managed disks.
 */

import type { OptimizerPluginDefinition } from "../../src/plugin-sdk/index.js";
import { AzureActionHandler } from "./src/actions.js";
import { createAzureClientFactory } from "./src/clients.js";
import { AzureResourceCollector } from "./src/collector.js";

const azurePlugin: OptimizerPluginDefinition = {
  id: "azure",
  name: "Azure",
  provider: "AZURE",
  isEnabled: (providers) => providers.azure.enabled && Boolean(providers.azure.subscriptionId),
  register(api) {
    const createClients = createAzureClientFactory(api.providers.azure);
    api.registerCollector(
      new AzureResourceCollector({ settings: api.collection, createClients, logger: api.logger }),
    );
    api.registerActionHandler(
      new AzureActionHandler({ createClients, callTimeoutMs: api.collection.callTimeoutMs }),
    );
    api.logger.info(`Azure: subscription ${api.providers.azure.subscriptionId ?? "unset"}`);
  },
};

export default azurePlugin;
