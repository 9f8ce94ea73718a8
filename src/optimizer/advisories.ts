import type { ResourceSample } from "./types.js";

/**
 * Housekeeping advice that does not depend on utilization: object stores the
 * collector found without lifecycle rules. Buckets whose lifecycle state could
 * not be read are left out.
 */
export function lifecycleAdvisories(samples: readonly ResourceSample[]): string[] {
  return samples
    .filter((sample) => sample.kind === "OBJECT_STORE" && sample.attributes?.hasLifecycle === "false")
    .map((sample) => `Add lifecycle rules to ${sample.provider} OBJECT_STORE ${sample.resourceId}`);
}
