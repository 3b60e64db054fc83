import { componentLogger, type Logger } from "./lib/logger";
import { errorMessage } from "./lib/errors";
import { sleep } from "./lib/rate_limit";
import type { CycleOptions, CycleResult } from "./jobs/monitor";

export type SchedulerState = "idle" | "running" | "sleeping" | "terminated";

export type SchedulerOptions = {
  intervalSeconds: number;
  /** Stop after the first cycle. */
  once?: boolean;
  /** Bypass the cursor until one cycle gets past the fetch. */
  force?: boolean;
  cycle: (opts: CycleOptions) => Promise<CycleResult>;
  log?: Logger;
  now?: () => Date;
};

export type SchedulerStatus = {
  state: SchedulerState;
  cycles: number;
  lastResult: CycleResult | null;
  lastError: string | null;
  lastRunAt: string | null;
  nextRunAt: string | null;
};

/**
 * Runs cycles back to back with a sleep in between; never two at once.
 *
 * Abort is checked before each cycle and wakes a sleep immediately. An abort
 * that arrives mid-cycle takes effect once that cycle's notify + save is
 * done. `requestRun()` cuts the current sleep short.
 */
export class Scheduler {
  private state: SchedulerState = "idle";
  private cycles = 0;
  private lastResult: CycleResult | null = null;
  private lastError: string | null = null;
  private lastRunAt: Date | null = null;
  private nextRunAt: Date | null = null;
  private wake: (() => void) | null = null;
  private runRequested = false;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: SchedulerOptions) {
    this.log = options.log ?? componentLogger("scheduler");
    this.now = options.now ?? (() => new Date());
  }

  async run(signal?: AbortSignal): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`scheduler cannot start from state ${this.state}`);
    }
    let force = this.options.force ?? false;
    this.log.info(
      {
        intervalSeconds: this.options.intervalSeconds,
        once: Boolean(this.options.once),
      },
      "monitor starting"
    );

    try {
      while (!signal?.aborted) {
        this.state = "running";
        this.nextRunAt = null;
        this.runRequested = false;
        this.cycles++;
        this.lastRunAt = this.now();

        try {
          const result = await this.options.cycle({ force });
          this.lastResult = result;
          this.lastError = null;
          if (result.status !== "fetch_failed") force = false;
        } catch (e) {
          this.lastError = errorMessage(e);
          this.log.error(
            { err: this.lastError },
            "cycle crashed; will try again next interval"
          );
        }

        if (this.options.once) {
          this.log.info("run complete");
          break;
        }
        if (signal?.aborted) break;

        const ms = this.options.intervalSeconds * 1000;
        this.state = "sleeping";
        this.nextRunAt = new Date(this.now().getTime() + ms);
        this.log.info(
          { seconds: this.options.intervalSeconds },
          "waiting before the next check"
        );
        await this.pause(ms, signal);
      }
    } finally {
      this.state = "terminated";
      this.nextRunAt = null;
      this.wake = null;
      this.log.info({ cycles: this.cycles }, "monitor stopped");
    }
  }

  /**
   * Asks for a cycle now. A sleeping scheduler wakes; a running one starts
   * the next cycle without sleeping. False once terminated.
   */
  requestRun(): boolean {
    if (this.state === "terminated") return false;
    this.runRequested = true;
    this.wake?.();
    return true;
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      lastResult: this.lastResult,
      lastError: this.lastError,
      lastRunAt: this.lastRunAt?.toISOString() ?? null,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
  }

  /** Waits out the interval; ends early on cancel or `requestRun()`. */
  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    if (this.runRequested || signal?.aborted) return;
    const interrupt = new AbortController();
    const cancel = () => interrupt.abort();
    signal?.addEventListener("abort", cancel, { once: true });
    this.wake = cancel;
    try {
      await sleep(ms, interrupt.signal);
    } finally {
      signal?.removeEventListener("abort", cancel);
      this.wake = null;
    }
  }
}
