import type { Command } from "commander";

import { analyzeCommand } from "../../commands/analyze.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

type AnalyzeFlags = {
  json?: boolean;
  output?: string;
  save?: boolean;
  dryRun?: boolean;
};

export function registerAnalyzeCommand(program: Command) {
  program
    .command("analyze")
    .description("Run one analysis cycle across enabled providers and write a report")
    .option("--json", "Print the report as JSON")
    .option("--output <file>", "Report file name inside the report directory")
    .option("--no-save", "Do not write the report to disk")
    .action(async (opts: AnalyzeFlags) => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        await analyzeCommand(
          { configPath: config, json: Boolean(opts.json), output: opts.output, save: opts.save },
          defaultRuntime,
        );
      });
    });

  program
    .command("optimize")
    .description("Analyze, then stop or delete underutilized resources")
    .option("--dry-run", "Report what would be done without calling providers")
    .option("--json", "Print the report as JSON")
    .option("--no-save", "Do not write the report to disk")
    .action(async (opts: AnalyzeFlags) => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        await analyzeCommand(
          {
            configPath: config,
            json: Boolean(opts.json),
            save: opts.save,
            applyActions: true,
            dryRun: opts.dryRun ? true : undefined,
          },
          defaultRuntime,
        );
      });
    });
}
