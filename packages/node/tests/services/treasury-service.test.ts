/**
 * Tests for TreasuryService.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createContext, hasErrorCode } from "@pegvault/types";
import { ManualClock } from "@pegvault/sim";
import { createTestService, START, USDC, WEEK } from "../setup.js";

const alice = createContext("alice");
const keeper = createContext("keeper-1", ["keeper"]);

describe("TreasuryService", () => {
  it("runs concurrent calls one at a time", async () => {
    const service = createTestService();

    const shares = await Promise.all([
      service.deposit(USDC(100n), "alice", alice),
      service.deposit(USDC(250n), "alice", alice),
      service.deposit(USDC(50n), "bob", alice),
    ]);

    expect(shares[0]).toBe(USDC(100n));
    expect(service.vault.totalShares).toBe(shares.reduce((sum, s) => sum + s, 0n));
    expect(service.vault.balanceOf("bob")).toBe(shares[2]);
  });

  it("keeps the queue moving after a failure", async () => {
    const service = createTestService();

    const results = await Promise.allSettled([
      service.deposit(USDC(100n), "alice", alice),
      service.deposit(500_000n, "alice", alice),
      service.deposit(USDC(250n), "alice", alice),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    const failed = results[1];
    expect(failed?.status === "rejected" && hasErrorCode(failed.reason, "DepositTooSmall")).toBe(true);
    const last = results[2];
    expect(last?.status).toBe("fulfilled");
    if (last?.status === "fulfilled") {
      expect(service.vault.balanceOf("alice")).toBe(USDC(100n) + last.value);
    }
  });

  it("redeems the caller's own shares", async () => {
    const service = createTestService();
    await service.deposit(USDC(100n), "alice", alice);

    await service.redeem(USDC(40n), "carol", alice);

    expect(service.vault.balanceOf("alice")).toBe(USDC(60n));
    expect(service.market.bank.balanceOf("USDC", "carol")).toBeGreaterThan(0n);
  });

  it("follows the wall clock for epoch timing", async () => {
    const clock = new ManualClock(START);
    const service = createTestService(clock);
    await service.deposit(USDC(10_000n), "alice", alice);

    expect(service.isEpochDue()).toBe(false);
    clock.advance(WEEK);
    expect(service.isEpochDue()).toBe(true);

    const report = await service.tick(keeper);

    expect(report.epoch).toBe(1);
    expect(service.market.clock.now()).toBe(START + WEEK);
    expect(service.nextEpochAt).toBe(START + 2 * WEEK);
    expect(service.isEpochDue()).toBe(false);
  });

  it("lists a stream newest first and applies the limit after filtering", async () => {
    const service = createTestService();
    await service.deposit(USDC(100n), "alice", alice);
    await service.deposit(USDC(200n), "alice", alice);
    await service.deposit(USDC(300n), "alice", alice);

    const records = service.audit({ stream: "vault", limit: 2, order: "desc" });

    expect(records.map((r) => r.event.payload["assets"])).toEqual(["300000000", "200000000"]);
  });

  it("drains once queued work settles", async () => {
    const service = createTestService();
    const pending = service.deposit(USDC(100n), "alice", alice);

    await service.drain();

    expect(service.vault.balanceOf("alice")).toBe(USDC(100n));
    await expect(pending).resolves.toBe(USDC(100n));
  });
});

describe("TreasuryService with a data directory", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "pegvault-service-"));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it("restarts with the vault, reserve and market state it stopped with", async () => {
    const clock = new ManualClock(START);
    const first = createTestService(clock, { dataDir });
    await first.deposit(USDC(10_000n), "alice", alice);
    clock.advance(WEEK);
    await first.tick(keeper);
    await first.redeem(USDC(1_000n), "alice", alice);

    const second = createTestService(clock, { dataDir });

    expect(second.vault.balanceOf("alice")).toBe(first.vault.balanceOf("alice"));
    expect(second.vault.totalShares).toBe(first.vault.totalShares);
    expect(second.nextEpochAt).toBe(START + 2 * WEEK);
    expect(await second.overview()).toEqual(await first.overview());
    expect(await second.reserve()).toEqual(await first.reserve());
    expect(second.market.bank.balanceOf("USDC", "alice")).toBe(first.market.bank.balanceOf("USDC", "alice"));
    expect(second.market.bank.balanceOf("USDC", "vault")).toBe(first.market.bank.balanceOf("USDC", "vault"));
    expect(second.checkJournal().valid).toBe(true);
    expect(second.journal.readAll()).toHaveLength(first.journal.readAll().length);
  });

  it("funds each actor only once across restarts", async () => {
    const first = createTestService(new ManualClock(START), { dataDir });
    await first.deposit(USDC(500n), "alice", alice);

    const second = createTestService(new ManualClock(START + 60), { dataDir });

    expect(second.market.bank.balanceOf("USDC", "alice")).toBe(USDC(99_500n));
    expect(second.market.clock.now()).toBe(START + 60);
  });
});
