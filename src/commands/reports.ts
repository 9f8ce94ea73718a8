import { resolveReportDir } from "../config/paths.js";
import { createConfigIO } from "../config/io.js";
import { ReportStore } from "../reports/store.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatReportSummary } from "./analyze.js";

export type ReportsCommandOptions = {
  configPath?: string;
  dir?: string;
  json?: boolean;
};

function storeFor(opts: ReportsCommandOptions): ReportStore {
  if (opts.dir) return new ReportStore(resolveReportDir(opts.dir));
  const config = createConfigIO({ configPath: opts.configPath }).loadConfig();
  return new ReportStore(resolveReportDir(config.reportDir));
}

export async function reportsListCommand(opts: ReportsCommandOptions, runtime: RuntimeEnv): Promise<string[]> {
  const store = storeFor(opts);
  const names = await store.list();
  if (names.length === 0) {
    runtime.log(`No reports in ${store.directory}`);
  } else {
    for (const name of names) runtime.log(name);
  }
  return names;
}

export async function reportsShowCommand(
  name: string,
  opts: ReportsCommandOptions,
  runtime: RuntimeEnv,
): Promise<void> {
  const doc = await storeFor(opts).load(name);
  if (opts.json) runtime.log(JSON.stringify(doc, null, 2));
  else for (const line of formatReportSummary(doc)) runtime.log(line);
}

export function configShowCommand(opts: { configPath?: string }, runtime: RuntimeEnv): void {
  const io = createConfigIO({ configPath: opts.configPath });
  const config = io.loadConfig();
  const redacted = {
    ...config,
    providers: {
      ...config.providers,
      gcp: { ...config.providers.gcp, accessToken: config.providers.gcp.accessToken ? "***" : undefined },
    },
  };
  runtime.log(`# ${io.configPath}`);
  runtime.log(JSON.stringify(redacted, null, 2));
}
