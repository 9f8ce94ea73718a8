import awsPlugin from "../../extensions/aws/index.js";
import azurePlugin from "../../extensions/azure/index.js";
import gcpPlugin from "../../extensions/gcp/index.js";
import type { OptimizerPluginDefinition } from "../plugin-sdk/index.js";

export const BUNDLED_PLUGINS: readonly OptimizerPluginDefinition[] = [awsPlugin, azurePlugin, gcpPlugin];
