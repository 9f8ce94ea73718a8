import type { RuntimeEnv } from "../runtime.js";
import type { ReportDocument } from "../reports/serialize.js";
import { createCommandContext, executeCycle, type CommandContext } from "./context.js";

export type AnalyzeCommandOptions = {
  configPath?: string;
  json?: boolean;
  output?: string;
  save?: boolean;
  /** Force provider actions on (the `optimize` command). */
  applyActions?: boolean;
  dryRun?: boolean;
};

export function formatReportSummary(doc: ReportDocument): string[] {
  const lines: string[] = [];
  const classified = Object.values(doc.per_provider_results).reduce(
    (n, results) => n + (results?.length ?? 0),
    0,
  );

  lines.push(`Report: ${doc.timestamp}`);
  lines.push(`Resources classified: ${classified}`);
  lines.push(`Estimated monthly savings: $${doc.estimated_monthly_savings_total.toFixed(2)}`);

  if (doc.recommendations.length > 0) {
    lines.push("", "Recommendations:");
    for (const rec of doc.recommendations) lines.push(`  - ${rec}`);
  } else {
    lines.push("", "No underutilized resources found.");
  }

  if (doc.advisories && doc.advisories.length > 0) {
    lines.push("", "Advisories:");
    for (const advice of doc.advisories) lines.push(`  - ${advice}`);
  }

  if (doc.skipped_resources.length > 0) {
    lines.push("", `Skipped ${doc.skipped_resources.length} invalid sample(s):`);
    for (const s of doc.skipped_resources) lines.push(`  - ${s.resource_id}: ${s.reason}`);
  }
  if (doc.failed_providers.length > 0) {
    lines.push("", "Provider failures:");
    for (const f of doc.failed_providers) lines.push(`  - ${f.provider}: ${f.error}`);
  }
  if (doc.actions && doc.actions.length > 0) {
    lines.push("", "Actions:");
    for (const a of doc.actions) {
      lines.push(`  - [${a.status.toUpperCase()}] ${a.action} ${a.provider} ${a.resource_id}: ${a.message}`);
    }
  }

  return lines;
}

export async function analyzeCommand(
  opts: AnalyzeCommandOptions,
  runtime: RuntimeEnv,
  ctx: CommandContext = createCommandContext({ configPath: opts.configPath }),
): Promise<ReportDocument> {
  const { document, reportPath } = await executeCycle(ctx, {
    applyActions: opts.applyActions,
    dryRun: opts.dryRun,
    save: opts.save,
    outputFile: opts.output,
  });

  if (opts.json) {
    runtime.log(JSON.stringify(document, null, 2));
  } else {
    for (const line of formatReportSummary(document)) runtime.log(line);
    if (reportPath) runtime.log(`\nSaved: ${reportPath}`);
  }

  return document;
}
