import type { Command } from "commander";

import { configShowCommand, reportsListCommand, reportsShowCommand } from "../../commands/reports.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

type ReportsFlags = { dir?: string; json?: boolean };

export function registerReportsCommands(program: Command) {
  const reports = program.command("reports").description("Inspect saved optimization reports");

  reports
    .command("list")
    .description("List saved reports, newest first")
    .option("--dir <dir>", "Report directory (default: config reportDir)")
    .action(async (opts: ReportsFlags) => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        await reportsListCommand({ configPath: config, dir: opts.dir }, defaultRuntime);
      });
    });

  reports
    .command("show")
    .description("Print a saved report")
    .argument("<name>", "Report file name")
    .option("--dir <dir>", "Report directory (default: config reportDir)")
    .option("--json", "Print the raw JSON document")
    .action(async (name: string, opts: ReportsFlags) => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        await reportsShowCommand(name, { configPath: config, dir: opts.dir, json: opts.json }, defaultRuntime);
      });
    });

  program
    .command("config")
    .description("Configuration helpers")
    .command("show")
    .description("Print the resolved configuration")
    .action(async () => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        configShowCommand({ configPath: config }, defaultRuntime);
      });
    });
}
