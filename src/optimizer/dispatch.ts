import type { ActionRequest } from "../plugin-sdk/index.js";
import type { ActionOutcome, OptimizationActionType, ResourceSample } from "./types.js";

/** Provider operations; each resolves to a human-readable message. */
export type ProviderOperations = {
  stop?: (sample: ResourceSample) => Promise<string>;
  delete?: (sample: ResourceSample) => Promise<string>;
};

export function actionForKind(kind: ResourceSample["kind"]): OptimizationActionType {
  switch (kind) {
    case "COMPUTE":
    case "DATABASE":
      return "stop";
    case "BLOCK_STORAGE":
      return "delete";
    case "OBJECT_STORE":
      return "none";
  }
}

/**
 * Map an action request onto the provider's stop/delete operations, applying
 * the dry-run and storage-deletion gates. Provider errors propagate.
 */
export async function dispatchAction(
  request: ActionRequest,
  ops: ProviderOperations,
): Promise<ActionOutcome> {
  const { result, sample } = request;
  const action = actionForKind(result.kind);
  const base = { resourceId: result.resourceId, provider: result.provider, kind: result.kind, action };
  const label = `${result.provider} ${result.kind} ${result.resourceId}`;

  if (action === "none") {
    return { ...base, status: "skipped", message: "No automatic action for this resource kind" };
  }
  if (action === "delete" && !request.deleteUnattachedStorage) {
    return { ...base, status: "skipped", message: "Deleting unattached storage is disabled" };
  }

  const op = action === "stop" ? ops.stop : ops.delete;
  if (!op) {
    return { ...base, status: "skipped", message: `${action} is not supported for ${label}` };
  }
  if (request.dryRun) {
    return { ...base, status: "dry-run", message: `Would ${action} ${label}` };
  }

  const message = await op(sample);
  return { ...base, status: "applied", message };
}
