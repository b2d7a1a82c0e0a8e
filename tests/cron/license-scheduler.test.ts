import { describe, it, expect, vi } from "vitest";
import { LicenseScheduler, abortableSleep, type Sleep } from "../../app/cron/license-scheduler";
import type { LicenseSweepSummary, SweepResult } from "../../app/cron/types";
import { Errors } from "../../app/utils/errors";
import { createMockLogger } from "../mocks";

function emptyResult(sweep: SweepResult["sweep"]): SweepResult {
  return { sweep, candidates: 0, processed: 0, skipped: 0 };
}

function summary(overrides: Partial<LicenseSweepSummary> = {}): LicenseSweepSummary {
  return {
    warn: emptyResult("warn"),
    expire: emptyResult("expire"),
    purge: emptyResult("purge"),
    errors: [],
    durationMs: 5,
    ...overrides,
  };
}

describe("LicenseScheduler", () => {
  it("runs a tick immediately and then once per interval until aborted", async () => {
    const controller = new AbortController();
    const processSweeps = vi.fn(async () => summary());
    let sleeps = 0;
    const sleep = vi.fn<Parameters<Sleep>, ReturnType<Sleep>>(async () => {
      sleeps++;
      if (sleeps === 2) {
        controller.abort();
      }
    });
    const scheduler = new LicenseScheduler(
      { process: processSweeps },
      { intervalMs: 1000, sleep, now: () => 0, logger: createMockLogger() }
    );

    await scheduler.run(controller.signal);

    expect(processSweeps).toHaveBeenCalledTimes(2);
    expect(scheduler.tickCount).toBe(2);
    expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
  });

  it("subtracts the time spent sweeping from each wait", async () => {
    const controller = new AbortController();
    let clock = 0;
    const durations = [300, 500];
    const processSweeps = vi.fn(async () => {
      clock += durations.shift() ?? 0;
      return summary();
    });
    let sleeps = 0;
    const sleep = vi.fn<Parameters<Sleep>, ReturnType<Sleep>>(async (ms) => {
      clock += ms;
      sleeps++;
      if (sleeps === 2) {
        controller.abort();
      }
    });
    const scheduler = new LicenseScheduler(
      { process: processSweeps },
      { intervalMs: 1000, sleep, now: () => clock, logger: createMockLogger() }
    );

    await scheduler.run(controller.signal);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([700, 500]);
    expect(clock).toBe(2000);
  });

  it("resumes at the next slot after a tick overruns the interval", async () => {
    const controller = new AbortController();
    const logger = createMockLogger();
    let clock = 0;
    const processSweeps = vi.fn(async () => {
      clock += 2500;
      return summary();
    });
    const sleep = vi.fn<Parameters<Sleep>, ReturnType<Sleep>>(async (ms) => {
      clock += ms;
      controller.abort();
    });
    const scheduler = new LicenseScheduler(
      { process: processSweeps },
      { intervalMs: 1000, sleep, now: () => clock, logger }
    );

    await scheduler.run(controller.signal);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500]);
    expect(logger.warn).toHaveBeenCalledWith("License sweep overran its interval", { missedTicks: 2 });
  });

  it("does not tick when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const processSweeps = vi.fn(async () => summary());
    const scheduler = new LicenseScheduler({ process: processSweeps }, { logger: createMockLogger() });

    await scheduler.run(controller.signal);

    expect(processSweeps).not.toHaveBeenCalled();
    expect(scheduler.tickCount).toBe(0);
  });

  it("lets an in-flight tick finish before stopping", async () => {
    const controller = new AbortController();
    const sleep = vi.fn<Parameters<Sleep>, ReturnType<Sleep>>(async () => undefined);
    const processSweeps = vi.fn(async () => {
      controller.abort();
      return summary({ expire: { sweep: "expire", candidates: 3, processed: 3, skipped: 0 } });
    });
    const scheduler = new LicenseScheduler({ process: processSweeps }, { sleep, logger: createMockLogger() });

    await scheduler.run(controller.signal);

    expect(processSweeps).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("logs each sweep error and keeps the loop alive", async () => {
    const logger = createMockLogger();
    const failure = Errors.dependency("list expiring licenses");
    const scheduler = new LicenseScheduler(
      { process: async () => summary({ errors: [failure] }) },
      { logger }
    );

    const result = await scheduler.tick();

    expect(result?.errors).toEqual([failure]);
    expect(logger.error).toHaveBeenCalledWith("License sweep failed", failure, { tick: 1 });
  });

  it("survives a crashing tick", async () => {
    const logger = createMockLogger();
    const crash = new Error("unexpected");
    const scheduler = new LicenseScheduler(
      {
        process: async () => {
          throw crash;
        },
      },
      { logger }
    );

    expect(await scheduler.tick()).toBeNull();
    expect(logger.error).toHaveBeenCalledWith("License sweep tick crashed", crash, { tick: 1 });
  });

  it("logs the counts of a clean tick", async () => {
    const logger = createMockLogger();
    const scheduler = new LicenseScheduler(
      {
        process: async () =>
          summary({
            warn: { sweep: "warn", candidates: 2, processed: 2, skipped: 0 },
            purge: { sweep: "purge", candidates: 1, processed: 1, skipped: 0 },
          }),
      },
      { logger }
    );

    await scheduler.tick();

    expect(logger.info).toHaveBeenCalledWith("License sweeps completed", {
      tick: 1,
      warned: 2,
      expired: 0,
      purged: 1,
      durationMs: 5,
    });
  });
});

describe("abortableSleep", () => {
  it("resolves as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    try {
      const pending = abortableSleep(5_000, new AbortController().signal);
      await vi.advanceTimersByTimeAsync(5_000);
      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
