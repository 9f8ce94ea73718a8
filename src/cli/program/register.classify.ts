import type { Command } from "commander";

import { classifyCommand } from "../../commands/classify.js";
import { defaultRuntime } from "../../runtime.js";
import { parseNumberOption, runCommandWithRuntime } from "../cli-utils.js";

type ClassifyFlags = {
  cpuThreshold?: string;
  memoryThreshold?: string;
  json?: boolean;
};

export function registerClassifyCommand(program: Command) {
  program
    .command("classify")
    .description("Classify resource samples from a JSON file without contacting any provider")
    .argument("<file>", "JSON array of samples, or an object with a samples array")
    .option("--cpu-threshold <percent>", "CPU threshold percent (default: 10)")
    .option("--memory-threshold <percent>", "Memory threshold percent (default: 15)")
    .option("--json", "Print the report as JSON")
    .action(async (file: string, opts: ClassifyFlags) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await classifyCommand(
          {
            file,
            cpuThreshold: parseNumberOption(opts.cpuThreshold, "--cpu-threshold"),
            memoryThreshold: parseNumberOption(opts.memoryThreshold, "--memory-threshold"),
            json: Boolean(opts.json),
          },
          defaultRuntime,
        );
      });
    });
}
