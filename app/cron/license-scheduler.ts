import { LICENSE_SCHEDULER_DEFAULTS } from "../utils/config.shared";
import { logger } from "../utils/logger.server";
import { hasSweepErrors, type CronLogger, type LicenseSweepSummary } from "./types";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SweepProcessor {
  process(): Promise<LicenseSweepSummary>;
}

export interface LicenseSchedulerOptions {
  intervalMs?: number;
  sleep?: Sleep;
  /** Monotonic milliseconds. */
  now?: () => number;
  logger?: CronLogger;
}

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });

/**
 * Runs the license sweeps once at start and then every interval until the
 * signal aborts. Ticks stay on the cadence set by the first one: the time a
 * sweep takes is subtracted from the wait, and a tick that overruns whole
 * intervals resumes at the next slot. Cancellation is only observed between
 * ticks, so a sweep in flight always finishes first. Sweep failures are
 * logged and retried on the next tick.
 */
export class LicenseScheduler {
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger: CronLogger;
  private ticks = 0;

  constructor(private readonly sweeps: SweepProcessor, options: LicenseSchedulerOptions = {}) {
    this.intervalMs = options.intervalMs ?? LICENSE_SCHEDULER_DEFAULTS.INTERVAL_MS;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? logger.child({ component: "license-scheduler" });
  }

  get tickCount(): number {
    return this.ticks;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info("License scheduler started", { intervalMs: this.intervalMs });
    let deadline = this.now();
    while (!signal.aborted) {
      await this.tick();
      if (signal.aborted) {
        break;
      }
      const current = this.now();
      deadline = this.nextDeadline(deadline, current);
      await this.sleep(deadline - current, signal);
    }
    this.logger.info("License scheduler stopped", { ticks: this.ticks });
  }

  private nextDeadline(previous: number, current: number): number {
    const next = previous + this.intervalMs;
    if (next > current) {
      return next;
    }
    const missed = Math.floor((current - next) / this.intervalMs) + 1;
    this.logger.warn("License sweep overran its interval", { missedTicks: missed });
    return next + missed * this.intervalMs;
  }

  async tick(): Promise<LicenseSweepSummary | null> {
    this.ticks++;
    try {
      const summary = await this.sweeps.process();
      if (hasSweepErrors(summary)) {
        for (const error of summary.errors) {
          this.logger.error("License sweep failed", error, { tick: this.ticks });
        }
      } else {
        this.logger.info("License sweeps completed", {
          tick: this.ticks,
          warned: summary.warn.processed,
          expired: summary.expire.processed,
          purged: summary.purge.processed,
          durationMs: summary.durationMs,
        });
      }
      return summary;
    } catch (error) {
      this.logger.error("License sweep tick crashed", error, { tick: this.ticks });
      return null;
    }
  }
}
