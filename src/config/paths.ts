import os from "node:os";
import path from "node:path";

export const STATE_DIRNAME = ".cloud-optimizer";
export const CONFIG_FILENAME = "config.json";

function resolveUserPath(input: string, homedir: () => string): string {
  const trimmed = input.trim();
  if (trimmed === "~") return homedir();
  if (trimmed.startsWith("~/")) return path.join(homedir(), trimmed.slice(2));
  return path.resolve(trimmed);
}

/** State directory: `CLOUD_OPTIMIZER_STATE_DIR`, else `~/.cloud-optimizer`. */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.CLOUD_OPTIMIZER_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(homedir(), STATE_DIRNAME);
}

/** Config file: `CLOUD_OPTIMIZER_CONFIG`, else `<state dir>/config.json`. */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
  homedir: () => string = os.homedir,
): string {
  const override = env.CLOUD_OPTIMIZER_CONFIG?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(stateDir, CONFIG_FILENAME);
}

/** Report directory relative paths resolve against the working directory. */
export function resolveReportDir(reportDir: string, homedir: () => string = os.homedir): string {
  return resolveUserPath(reportDir, homedir);
}
