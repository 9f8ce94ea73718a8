import { Command } from "commander";

import { VERSION } from "../../version.js";
import { registerAnalyzeCommand } from "./register.analyze.js";
import { registerClassifyCommand } from "./register.classify.js";
import { registerReportsCommands } from "./register.reports.js";
import { registerRunCommand } from "./register.run.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("cloud-optimizer")
    .description("Find and act on underutilized AWS, Azure and GCP resources")
    .version(VERSION)
    .option("-c, --config <path>", "Config file (default: ~/.cloud-optimizer/config.json)");

  registerAnalyzeCommand(program);
  registerRunCommand(program);
  registerClassifyCommand(program);
  registerReportsCommands(program);
  return program;
}
