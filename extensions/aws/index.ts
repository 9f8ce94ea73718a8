/**
 * AWS provider plugin: EC2, EBS, RDS and S3 collection plus stop/delete actions.
 */

import type { OptimizerPluginDefinition } from "../../src/plugin-sdk/index.js";
import { AwsActionHandler } from "./src/actions.js";
import { createAwsClientFactory } from "./src/clients.js";
import { AwsResourceCollector } from "./src/collector.js";

const awsPlugin: OptimizerPluginDefinition = {
  id: "aws",
  name: "AWS",
  provider: "AWS",
  isEnabled: (providers) => providers.aws.enabled,
  register(api) {
    const config = api.providers.aws;
    const createClients = createAwsClientFactory(config);

    api.registerCollector(
      new AwsResourceCollector({
        region: config.region,
        settings: api.collection,
        createClients,
        logger: api.logger,
      }),
    );
    api.registerActionHandler(
      new AwsActionHandler({ createClients, callTimeoutMs: api.collection.callTimeoutMs }),
    );
    api.logger.info(`AWS: region ${config.region}${config.profile ? `, profile ${config.profile}` : ""}`);
  },
};

export default awsPlugin;
