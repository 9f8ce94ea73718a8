#!/usr/bin/env node
import "dotenv/config";

import { buildProgram } from "./cli/program/build-program.js";
import { resolveLogLevel, setLogLevel } from "./logging/subsystem.js";
import { formatErrorMessage } from "./optimizer/errors.js";

setLogLevel(resolveLogLevel(process.env));

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatErrorMessage(error));
    process.exitCode = 1;
  });
