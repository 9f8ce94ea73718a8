import type { Command } from "commander";

import { runCommand } from "../../commands/run.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerRunCommand(program: Command) {
  program
    .command("run")
    .description("Run analysis cycles on the configured interval until interrupted")
    .action(async () => {
      const { config } = program.opts<{ config?: string }>();
      await runCommandWithRuntime(defaultRuntime, async () => {
        await runCommand({ configPath: config }, defaultRuntime);
      });
    });
}
