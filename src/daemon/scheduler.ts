/**
 * Fixed-interval scheduler for optimization cycles.
 *
 * One cycle runs immediately on start, then one every `intervalMs`. Cycles never
 * overlap: a tick that lands while the previous cycle is still running is
 * dropped.
 */

import { formatErrorMessage } from "../optimizer/errors.js";
import type { PluginLogger } from "../plugin-sdk/index.js";

export const MS_PER_HOUR = 3_600_000;
/** Node clamps longer timer delays to 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type SchedulerOptions = {
  intervalMs: number;
  job: () => Promise<void>;
  logger: PluginLogger;
};

export class OptimizationScheduler {
  private readonly options: SchedulerOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private completedRuns = 0;
  private skippedTicks = 0;

  constructor(options: SchedulerOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    if (options.intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`intervalMs must be at most ${MAX_TIMER_DELAY_MS}, got ${options.intervalMs}`);
    }
    this.options = options;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get stats(): { completedRuns: number; skippedTicks: number } {
    return { completedRuns: this.completedRuns, skippedTicks: this.skippedTicks };
  }

  /** Start the schedule; resolves once the first (immediate) cycle has finished. */
  async start(): Promise<void> {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    await this.tick();
  }

  /** Run one cycle unless one is already in flight. Never rejects. */
  tick(): Promise<void> {
    if (this.inFlight) {
      this.skippedTicks++;
      this.options.logger.warn("Previous optimization cycle still running, skipping this tick");
      return this.inFlight;
    }

    this.inFlight = this.options
      .job()
      .then(() => {
        this.completedRuns++;
      })
      .catch((error: unknown) => {
        this.options.logger.error(`Optimization cycle failed: ${formatErrorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  /** Stop scheduling and wait for the in-flight cycle, if any. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }
}
