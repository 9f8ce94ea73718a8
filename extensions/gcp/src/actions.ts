import {
  dispatchAction,
  type ActionOutcome,
  type ActionRequest,
  type OptimizationActionHandler,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import { gcpMutate } from "./api.js";
import type { AccessTokenProvider } from "./auth.js";
import { COMPUTE_BASE } from "./collector.js";

export type GcpActionHandlerOptions = {
  projectId: string;
  getAccessToken: AccessTokenProvider;
  callTimeoutMs: number;
};

type Placement = { scope: "zones" | "regions"; location: string; name: string };

function locate(sample: ResourceSample, nameKey: "instanceName" | "diskName"): Placement {
  const zone = sample.attributes?.zone;
  const region = sample.attributes?.region;
  const name = sample.attributes?.[nameKey];
  if (name && zone) return { scope: "zones", location: zone, name };
  // Only disks are regional.
  if (name && region && nameKey === "diskName") return { scope: "regions", location: region, name };
  throw new Error(`GCP resource ${sample.resourceId} is missing its zone or name`);
}

/** Stops instances and deletes unattached persistent disks. */
export class GcpActionHandler implements OptimizationActionHandler {
  readonly provider = "GCP" as const;

  constructor(private readonly options: GcpActionHandlerOptions) {}

  async apply(request: ActionRequest): Promise<ActionOutcome> {
    return dispatchAction(request, {
      stop: (sample) => this.stopInstance(sample),
      delete: (sample) => this.deleteDisk(sample),
    });
  }

  private placementUrl({ scope, location }: Placement, path: string): string {
    const project = encodeURIComponent(this.options.projectId);
    return `${COMPUTE_BASE}/projects/${project}/${scope}/${encodeURIComponent(location)}/${path}`;
  }

  private async stopInstance(sample: ResourceSample): Promise<string> {
    const placement = locate(sample, "instanceName");
    const { location, name } = placement;
    const token = await this.options.getAccessToken();
    const url = this.placementUrl(placement, `instances/${encodeURIComponent(name)}/stop`);
    const result = await gcpMutate(url, token, { timeout: this.options.callTimeoutMs });
    return `Stopping GCP instance ${name} in ${location}: ${result.message}`;
  }

  private async deleteDisk(sample: ResourceSample): Promise<string> {
    const placement = locate(sample, "diskName");
    const { location, name } = placement;
    const token = await this.options.getAccessToken();
    const url = this.placementUrl(placement, `disks/${encodeURIComponent(name)}`);
    const result = await gcpMutate(url, token, {
      method: "DELETE",
      timeout: this.options.callTimeoutMs,
    });
    return `Deleting GCP disk ${name} in ${location}: ${result.message}`;
  }
}
