import { MS_PER_HOUR, OptimizationScheduler } from "../daemon/scheduler.js";
import { formatErrorMessage } from "../optimizer/errors.js";
import type { RuntimeEnv } from "../runtime.js";
import { createCommandContext, executeCycle, type CommandContext } from "./context.js";

export type RunCommandOptions = {
  configPath?: string;
};

export type RunningDaemon = {
  scheduler: OptimizationScheduler;
  shutdown: () => Promise<void>;
};

/**
 * Start the polling loop: one cycle now, then one every `intervalHours`, until
 * SIGINT/SIGTERM.
 */
export async function runCommand(
  opts: RunCommandOptions,
  runtime: RuntimeEnv,
  ctx: CommandContext = createCommandContext({ configPath: opts.configPath }),
): Promise<RunningDaemon> {
  const { config, logger } = ctx;

  const scheduler = new OptimizationScheduler({
    intervalMs: config.intervalHours * MS_PER_HOUR,
    logger: logger.child("scheduler"),
    job: async () => {
      await executeCycle(ctx);
    },
  });

  const shutdown = async () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    logger.info("Shutting down");
    await scheduler.stop();
  };

  function onSignal(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}`);
    shutdown()
      .then(() => runtime.exit(0))
      .catch((error: unknown) => {
        runtime.error(formatErrorMessage(error));
        runtime.exit(1);
      });
  }
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info(`Cloud resource optimizer started. Running every ${config.intervalHours} hours.`);
  await scheduler.start();
  return { scheduler, shutdown };
}
