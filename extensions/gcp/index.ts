/**
 * GCP provider plugin: Compute Engine instances and persistent disks over REST.
 */

import type { OptimizerPluginDefinition } from "../../src/plugin-sdk/index.js";
import { GcpActionHandler } from "./src/actions.js";
import { createAccessTokenProvider } from "./src/auth.js";
import { GcpResourceCollector } from "./src/collector.js";

const gcpPlugin: OptimizerPluginDefinition = {
  id: "gcp",
  name: "GCP",
  provider: "GCP",
  isEnabled: (providers) => providers.gcp.enabled && Boolean(providers.gcp.projectId),
  register(api) {
    const { projectId, accessToken } = api.providers.gcp;
    if (!projectId) {
      throw new Error("GCP projectId is not configured");
    }
    const getAccessToken = createAccessTokenProvider({ accessToken });

    api.registerCollector(
      new GcpResourceCollector({ projectId, settings: api.collection, getAccessToken, logger: api.logger }),
    );
    api.registerActionHandler(
      new GcpActionHandler({ projectId, getAccessToken, callTimeoutMs: api.collection.callTimeoutMs }),
    );
    api.logger.info(`GCP: project ${projectId}`);
  },
};

export default gcpPlugin;
