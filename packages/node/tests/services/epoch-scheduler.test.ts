/**
 * Tests for EpochScheduler.
 *
 * Logs go to an in-memory pino destination so alerts can be counted.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import pino from "pino";
import { createContext, ExecutionError, StateError } from "@pegvault/types";
import { ManualClock } from "@pegvault/sim";
import type { EpochReport } from "@pegvault/vault";
import { EpochScheduler, type KeeperTarget } from "../../src/services/epoch-scheduler.js";
import { createTestService, START, USDC, WEEK } from "../setup.js";

interface LogLine {
  level: number;
  msg: string;
  alert?: string;
  code?: string;
}

function captureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        lines.push(JSON.parse(line) as LogLine);
      },
    },
  );
  return { logger, lines };
}

const keeper = createContext("keeper-scheduler", ["keeper"]);
const admin = createContext("ops", ["administrator"]);
const alice = createContext("alice");

function live() {
  const clock = new ManualClock(START);
  const service = createTestService(clock);
  const { logger, lines } = captureLogger();
  const scheduler = new EpochScheduler({ target: service, keeper, logger, pollIntervalMs: 1_000 });
  return { clock, service, scheduler, lines };
}

const REPORT: EpochReport = {
  epoch: 1,
  marketPrice: 100_000_000n,
  targetPrice: 100_000_000n,
  rate: 800n,
  dividendTarget: 0n,
  harvested: 0n,
  distributed: 0n,
  deployed: 0n,
  yieldPerShareDelta: 0n,
};

/** Target that is always due and fails with the given error */
function failingTarget(error: unknown): KeeperTarget {
  return {
    isEpochDue: () => true,
    breakerTripped: () => false,
    nextEpochAt: START,
    tick: () => Promise.reject(error),
  };
}

describe("EpochScheduler.poll", () => {
  it("is idle before the epoch is due", async () => {
    const { scheduler } = live();

    expect(await scheduler.poll()).toEqual({ outcome: "idle", reports: [] });
  });

  it("ticks a due epoch and logs the settlement", async () => {
    const { clock, service, scheduler, lines } = live();
    await service.deposit(USDC(10_000n), "alice", alice);
    clock.advance(WEEK);

    const result = await scheduler.poll();

    expect(result.outcome).toBe("ticked");
    expect(result.reports.map((r) => r.epoch)).toEqual([1]);
    expect(lines.filter((l) => l.msg === "Epoch settled")).toHaveLength(1);
  });

  it("catches up every missed epoch in order", async () => {
    const { clock, service, scheduler } = live();
    await service.deposit(USDC(10_000n), "alice", alice);
    clock.advance(3 * WEEK);

    const result = await scheduler.poll();

    expect(result.reports.map((r) => r.epoch)).toEqual([1, 2, 3]);
    expect(service.nextEpochAt).toBe(START + 4 * WEEK);
    expect((await scheduler.poll()).outcome).toBe("idle");
  });

  it("stops at the catch-up bound", async () => {
    const clock = new ManualClock(START);
    const service = createTestService(clock);
    const { logger } = captureLogger();
    const scheduler = new EpochScheduler({ target: service, keeper, logger, pollIntervalMs: 1_000, maxCatchUp: 2 });
    await service.deposit(USDC(10_000n), "alice", alice);
    clock.advance(5 * WEEK);

    const result = await scheduler.poll();

    expect(result.reports).toHaveLength(2);
    expect(service.isEpochDue()).toBe(true);
  });

  it("halts on a breaker trip, alerts once, and resumes after reset", async () => {
    const { clock, service, scheduler, lines } = live();
    await service.deposit(USDC(10_000n), "alice", alice);
    clock.advance(WEEK);
    // Fresh breaker checkpoint at $97,000 inside the window
    await service.deposit(USDC(100n), "alice", alice);
    service.market.feed.setPrice("PEG", 90_000_000n, 6);
    service.market.feed.setPrice("WBTC", 7_275_000_000_000n, 8);

    const first = await scheduler.poll();
    expect(first).toEqual({ outcome: "halted", reports: [] });
    expect(scheduler.halted).toBe(true);

    const second = await scheduler.poll();
    expect(second.outcome).toBe("halted");
    expect(lines.filter((l) => l.alert === "circuit-breaker")).toHaveLength(1);

    await service.resetCircuitBreaker(admin);
    const resumed = await scheduler.poll();

    expect(resumed.outcome).toBe("ticked");
    expect(resumed.reports.map((r) => r.epoch)).toEqual([1]);
    expect(scheduler.halted).toBe(false);
    expect(lines.some((l) => l.msg === "Circuit breaker reset; epoch ticks resumed")).toBe(true);
  });

  it("treats a late EpochNotElapsed as idle", async () => {
    const { logger } = captureLogger();
    const scheduler = new EpochScheduler({
      target: failingTarget(new StateError("EpochNotElapsed", "Next epoch is due at 1750604800")),
      keeper,
      logger,
      pollIntervalMs: 1_000,
    });

    expect(await scheduler.poll()).toEqual({ outcome: "idle", reports: [] });
  });

  it("warns on a domain failure and keeps running", async () => {
    const { logger, lines } = captureLogger();
    const scheduler = new EpochScheduler({
      target: failingTarget(new ExecutionError("SlippageExceeded", "Swap returned less than the minimum")),
      keeper,
      logger,
      pollIntervalMs: 1_000,
    });

    const result = await scheduler.poll();

    expect(result.outcome).toBe("failed");
    expect(scheduler.halted).toBe(false);
    expect(lines.at(-1)).toMatchObject({ level: 40, code: "SlippageExceeded", msg: "Swap returned less than the minimum" });
  });

  it("logs unexpected errors at error level", async () => {
    const { logger, lines } = captureLogger();
    const scheduler = new EpochScheduler({
      target: failingTarget(new Error("boom")),
      keeper,
      logger,
      pollIntervalMs: 1_000,
    });

    expect((await scheduler.poll()).outcome).toBe("failed");
    expect(lines.at(-1)).toMatchObject({ level: 50, msg: "Epoch tick failed" });
  });

  it("keeps reports from ticks that ran before a failure", async () => {
    const { logger } = captureLogger();
    let calls = 0;
    const target: KeeperTarget = {
      isEpochDue: () => true,
      breakerTripped: () => false,
      nextEpochAt: START,
      tick: () => {
        calls++;
        return calls === 1
          ? Promise.resolve(REPORT)
          : Promise.reject(new StateError("EpochNotElapsed", "Next epoch is due at 1750604800"));
      },
    };
    const scheduler = new EpochScheduler({ target, keeper, logger, pollIntervalMs: 1_000 });

    expect(await scheduler.poll()).toEqual({ outcome: "ticked", reports: [REPORT] });
  });
});

describe("EpochScheduler.start / stop", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("polls immediately and then on every interval until stopped", async () => {
    vi.useFakeTimers();
    const { logger } = captureLogger();
    const isEpochDue = vi.fn(() => false);
    const target: KeeperTarget = {
      isEpochDue,
      breakerTripped: () => false,
      nextEpochAt: START,
      tick: () => Promise.resolve(REPORT),
    };
    const scheduler = new EpochScheduler({ target, keeper, logger, pollIntervalMs: 1_000 });

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(isEpochDue).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(isEpochDue).toHaveBeenCalledTimes(2);

    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(5_000);
    expect(isEpochDue).toHaveBeenCalledTimes(2);
  });
});
