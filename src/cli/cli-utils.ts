import { formatErrorMessage } from "../optimizer/errors.js";
import type { RuntimeEnv } from "../runtime.js";

/** Run a command body, reporting any failure on stderr and exiting non-zero. */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
  onError?: (error: unknown) => void,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (onError) {
      onError(error);
      return;
    }
    runtime.error(formatErrorMessage(error));
    runtime.exit(1);
  }
}

/** Parse a numeric CLI option; undefined stays undefined. */
export function parseNumberOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number, got "${value}"`);
  }
  return parsed;
}
