/**
 * Tests for the share ledger and share math.
 */

import { describe, it, expect } from "vitest";
import { hasErrorCode } from "@pegvault/types";
import { ShareLedger } from "../src/share-ledger.js";
import { VIRTUAL_OFFSET, assetsPerShare, assetsToShares, sharesToAssets } from "../src/share-math.js";

describe("ShareLedger", () => {
  it("keeps the total equal to the sum of balances", () => {
    const ledger = new ShareLedger();
    ledger.mint("alice", 700n);
    ledger.mint("bob", 300n);
    ledger.transfer("alice", "bob", 200n);
    ledger.burn("bob", 100n);

    expect(ledger.balanceOf("alice")).toBe(500n);
    expect(ledger.balanceOf("bob")).toBe(400n);
    expect(ledger.totalShares).toBe(900n);
  });

  it("removes holders whose balance reaches zero", () => {
    const ledger = new ShareLedger();
    ledger.mint("alice", 10n);
    ledger.burn("alice", 10n);

    expect(ledger.holderCount).toBe(0);
    expect(ledger.entries()).toEqual([]);
  });

  it("rejects an overdraft without touching balances", () => {
    const ledger = new ShareLedger();
    ledger.mint("alice", 10n);

    let caught: unknown;
    try {
      ledger.transfer("alice", "bob", 11n);
    } catch (err) {
      caught = err;
    }

    expect(hasErrorCode(caught, "InsufficientShares")).toBe(true);
    expect(ledger.balanceOf("alice")).toBe(10n);
    expect(ledger.balanceOf("bob")).toBe(0n);
  });

  it("restores captured balances", () => {
    const ledger = new ShareLedger();
    ledger.mint("alice", 10n);
    const restore = ledger.capture();
    ledger.mint("bob", 5n);
    ledger.burn("alice", 10n);
    restore();

    expect(ledger.entries()).toEqual([["alice", 10n]]);
    expect(ledger.totalShares).toBe(10n);
  });

  it("rebuilds from persisted balances in holder order", () => {
    const ledger = ShareLedger.fromBalances({ carol: 3n, alice: 1n, bob: 2n });

    expect(ledger.entries()).toEqual([
      ["alice", 1n],
      ["bob", 2n],
      ["carol", 3n],
    ]);
    expect(ledger.totalShares).toBe(6n);
  });
});

describe("share math", () => {
  it("mints one share per asset unit into an empty vault", () => {
    const empty = { totalShares: 0n, totalAssets: 0n };

    expect(assetsToShares(1_000_000n, empty)).toBe(1_000_000n);
    expect(assetsPerShare(empty)).toBe(1_000_000_000_000_000_000n);
  });

  it("rounds deposits down and mints up", () => {
    const state = { totalShares: 1_000n, totalAssets: 2_000n };

    // 10 × 2000 / 3000
    expect(assetsToShares(10n, state, "down")).toBe(6n);
    expect(assetsToShares(10n, state, "up")).toBe(7n);
    // 10 × 3000 / 2000
    expect(sharesToAssets(10n, state, "down")).toBe(15n);
  });

  it("makes a donated first-deposit inflation unprofitable", () => {
    // Attacker holds 1 share, then donates 1,000,000 units to the vault.
    const inflated = { totalShares: 1n, totalAssets: 1_000_001n };

    // The victim's 1,000,000-unit deposit still mints shares...
    const victimShares = assetsToShares(1_000_000n, inflated);
    expect(victimShares).toBe(999n);

    // ...and the attacker's single share recovers a thousandth of the donation.
    const after = { totalShares: 1n + victimShares, totalAssets: 2_000_001n };
    expect(sharesToAssets(1n, after)).toBe(1_000_000n / VIRTUAL_OFFSET);
  });
});
