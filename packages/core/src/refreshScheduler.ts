import { createLogger } from "./logger.js";
import { asErrorMessage, sleep } from "./utils.js";

const log = createLogger("scheduler");

export type RefreshPass = (signal: AbortSignal) => Promise<void>;

export interface RefreshSchedulerStats {
  signalCount: number;
  passCount: number;
  failedPassCount: number;
  cancelled: boolean;
}

/**
 * Coalesces bursts of change signals into at most one pass per cadence.
 * One loop runs at a time; it exits only after a pass that saw no new signal,
 * so the last signal of a burst is always followed by a pass.
 */
export class RefreshScheduler {
  private readonly controller = new AbortController();
  private refreshPending = false;
  private loop: Promise<void> | null = null;
  private perf: RefreshSchedulerStats = {
    signalCount: 0,
    passCount: 0,
    failedPassCount: 0,
    cancelled: false,
  };

  constructor(
    private readonly pass: RefreshPass,
    readonly cadenceMs: number,
  ) {}

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  signal(): void {
    if (this.isCancelled) return;
    this.perf.signalCount += 1;
    this.refreshPending = true;
    if (this.loop) return;
    this.loop = this.runRefreshLoop();
  }

  /** Resolves once no loop is running. */
  async idle(): Promise<void> {
    while (this.loop) {
      await this.loop;
    }
  }

  /** Stops the loop at its next suspension point; a pass in flight must not write back. */
  cancel(): void {
    if (this.isCancelled) return;
    this.perf.cancelled = true;
    this.refreshPending = false;
    this.controller.abort();
  }

  stats(): RefreshSchedulerStats {
    return { ...this.perf };
  }

  private async runRefreshLoop(): Promise<void> {
    const signal = this.controller.signal;
    try {
      do {
        this.refreshPending = false;
        try {
          await this.pass(signal);
          this.perf.passCount += 1;
        } catch (error) {
          this.perf.failedPassCount += 1;
          log.warn("refresh pass failed", { error: asErrorMessage(error) });
        }
        if (signal.aborted) return;
        await sleep(this.cadenceMs, signal);
        if (signal.aborted) return;
      } while (this.refreshPending);
    } finally {
      // must clear in the same tick as the final pending check
      this.loop = null;
    }
  }
}
