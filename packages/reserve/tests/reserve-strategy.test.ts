/**
 * Tests for ReserveStrategy against the simulated market.
 *
 * Prices: USDC $1, WBTC $97,000. Amounts are in base units
 * (USDC 6 dp, WBTC 8 dp). Default split 80/20, slippage 100 bps.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createContext, hasErrorCode, type LendingVenue, type SwapVenue } from "@pegvault/types";
import { GuardedPriceReader } from "@pegvault/oracle";
import { InMemoryEventStore, InMemorySnapshotStore } from "@pegvault/event-store";
import { createSimulatedMarket, type SimulatedMarket } from "@pegvault/sim";
import { ReserveStrategy } from "../src/reserve-strategy.js";
import type { ReserveStrategyDeps } from "../src/types.js";

const USDC = (units: bigint): bigint => units * 1_000_000n;
const YEAR = 31_536_000;

const orchestrator = createContext("vault", ["orchestrator"]);
const admin = createContext("ops", ["administrator"]);
const keeper = createContext("keeper-1", ["keeper"]);

interface Harness {
  readonly market: SimulatedMarket;
  readonly journal: InMemoryEventStore;
  readonly snapshots: InMemorySnapshotStore;
  readonly strategy: ReserveStrategy;
  readonly deps: ReserveStrategyDeps;
}

function setup(overrides: Partial<ReserveStrategyDeps> = {}, lendingApyBps = 0n): Harness {
  const market = createSimulatedMarket({ lendingApyBps });
  const journal = new InMemoryEventStore();
  const snapshots = new InMemorySnapshotStore();
  const prices = new GuardedPriceReader(market.feed, market.clock, {
    staleness: { USDC: 86_400, WBTC: 3_600, PEG: 86_400 },
  });
  const deps: ReserveStrategyDeps = {
    assets: market.assets,
    bank: market.bank,
    swap: market.swap,
    lending: market.lending,
    prices,
    clock: market.clock,
    scope: market.scope,
    vaultAccount: "vault",
    journal,
    snapshots,
    ...overrides,
  };
  return { market, journal, snapshots, strategy: new ReserveStrategy(deps), deps };
}

async function fund(h: Harness, amount: bigint): Promise<void> {
  h.market.bank.mint("USDC", h.strategy.account, amount);
  await h.strategy.deploy(amount, orchestrator);
}

function dropVolatileTo(h: Harness, price: bigint): void {
  h.market.feed.setPrice("WBTC", price, 8);
}

// ─── Deploy ──────────────────────────────────────────────────────────────

describe("deploy", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  it("splits capital 80/20 between volatile and cash", async () => {
    await fund(h, USDC(1_000n));

    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 824_742n, cashDeployed: 200_000_000n });
    expect(await h.strategy.cashReserveValue()).toBe(200_000_000n);
    expect(await h.strategy.volatileReserveValue()).toBe(799_999_740n);
    expect(await h.strategy.totalValue()).toBe(999_999_740n);
    expect(h.market.bank.balanceOf("USDC", h.strategy.account)).toBe(0n);
  });

  it("follows a changed allocation", async () => {
    await h.strategy.setAllocation({ volatileBps: 5_000n, cashBps: 5_000n }, admin);
    await fund(h, USDC(1_000n));

    expect(h.strategy.position().cashDeployed).toBe(500_000_000n);
  });

  it("rejects a zero amount", async () => {
    await expect(h.strategy.deploy(0n, orchestrator)).rejects.toThrow("deploy amount must be positive");
  });

  it("rejects deploying funds that were never transferred in", async () => {
    const err = await h.strategy.deploy(USDC(10n), orchestrator).catch((e: unknown) => e);
    expect(hasErrorCode(err, "InsufficientLiquidity")).toBe(true);
  });

  it("requires the orchestrator capability", async () => {
    h.market.bank.mint("USDC", h.strategy.account, USDC(10n));
    const err = await h.strategy.deploy(USDC(10n), keeper).catch((e: unknown) => e);

    expect(hasErrorCode(err, "Unauthorized")).toBe(true);
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 0n, cashDeployed: 0n });
  });

  it("records a deployed event on success", async () => {
    await fund(h, USDC(1_000n));

    const records = h.journal.read("reserve");
    expect(records.map((r) => r.event.type)).toEqual(["reserve.deployed"]);
    expect(records[0]!.event.payload).toEqual({
      amount: "1000000000",
      volatileSpent: "800000000",
      volatileBought: "824742",
      cashSupplied: "200000000",
    });
  });
});

// ─── Slippage and venue verification ─────────────────────────────────────

describe("venue verification", () => {
  it("rejects a fill below the slippage bound and rolls back", async () => {
    const h = setup();
    h.market.swap.behavior = { priceImpactBps: 200n };
    h.market.bank.mint("USDC", h.strategy.account, USDC(1_000n));

    const err = await h.strategy.deploy(USDC(1_000n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "SlippageExceeded")).toBe(true);
    expect(h.market.bank.balanceOf("USDC", h.strategy.account)).toBe(USDC(1_000n));
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 0n, cashDeployed: 0n });
  });

  it("measures proceeds itself when the venue ignores the limit", async () => {
    const h = setup();
    h.market.swap.behavior = { priceImpactBps: 200n, ignoreLimits: true };
    h.market.bank.mint("USDC", h.strategy.account, USDC(1_000n));

    const err = await h.strategy.deploy(USDC(1_000n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "SlippageExceeded")).toBe(true);
    expect(h.market.bank.balanceOf("USDC", h.strategy.account)).toBe(USDC(1_000n));
    expect(h.market.bank.balanceOf("WBTC", h.strategy.account)).toBe(0n);
  });

  it("books what arrived, not what the venue reported", async () => {
    const h = setup();
    h.market.swap.behavior = { misreportBps: 500n };

    await fund(h, USDC(1_000n));

    expect(h.strategy.position().volatileAssetHeld).toBe(824_742n);
  });

  it("rejects a lending venue that pays out short", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));
    h.market.lending.payoutBps = 9_000n;

    const err = await h.strategy.withdraw(USDC(100n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "MalformedVenueResponse")).toBe(true);
    expect(h.strategy.position().cashDeployed).toBe(200_000_000n);
    expect(h.market.bank.balanceOf("USDC", "vault")).toBe(0n);
  });

  it("wraps foreign venue failures as VenueCallFailed", async () => {
    const failing: LendingVenue = {
      supply: async () => {
        throw new Error("market paused");
      },
      withdraw: async () => 0n,
      balanceOf: async () => 0n,
    };
    const h = setup({ lending: failing });
    h.market.bank.mint("USDC", h.strategy.account, USDC(1_000n));

    const err = await h.strategy.deploy(USDC(1_000n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "VenueCallFailed")).toBe(true);
    expect((err as Error).message).toBe("supply failed: market paused");
    expect(h.market.bank.balanceOf("USDC", h.strategy.account)).toBe(USDC(1_000n));
  });

  it("passes a deadline of now plus the configured window", async () => {
    const base = createSimulatedMarket().swap;
    const deadlines: number[] = [];
    const recording: SwapVenue = {
      swapExactInput: (assetIn, assetOut, amountIn, minOut, deadline, account) => {
        deadlines.push(deadline);
        return base.swapExactInput(assetIn, assetOut, amountIn, minOut, deadline, account);
      },
      swapExactOutput: (assetIn, assetOut, amountOut, maxIn, deadline, account) => {
        deadlines.push(deadline);
        return base.swapExactOutput(assetIn, assetOut, amountOut, maxIn, deadline, account);
      },
    };
    const h = setup();
    const strategy = new ReserveStrategy({ ...h.deps, swap: recording, account: "reserve-2" });
    await strategy.setSwapDeadline(120, admin);
    h.market.bank.mint("USDC", "reserve-2", USDC(10n));

    // Settlement fails: the wrapped venue has its own bank where reserve-2 holds nothing.
    await strategy.deploy(USDC(10n), orchestrator).catch(() => undefined);

    expect(deadlines).toEqual([h.market.clock.now() + 120]);
  });
});

// ─── Withdraw ────────────────────────────────────────────────────────────

describe("withdraw", () => {
  it("takes cash first and sells volatile for the rest", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));

    const delivered = await h.strategy.withdraw(USDC(300n), orchestrator);

    expect(delivered).toBe(USDC(300n));
    expect(h.market.bank.balanceOf("USDC", "vault")).toBe(USDC(300n));
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 721_649n, cashDeployed: 0n });
  });

  it("stays within the cash reserve when it covers the request", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));

    await h.strategy.withdraw(USDC(50n), orchestrator);

    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 824_742n, cashDeployed: 150_000_000n });
    expect(h.market.swap.swapCount).toBe(1);
  });

  it("delivers what it can when the reserve is short", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));

    const delivered = await h.strategy.withdraw(USDC(2_000n), orchestrator);

    expect(delivered).toBe(999_999_740n);
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 0n, cashDeployed: 0n });
  });
});

// ─── Rebalance ───────────────────────────────────────────────────────────

describe("rebalance", () => {
  let h: Harness;

  beforeEach(async () => {
    h = setup();
    await fund(h, USDC(1_000n));
  });

  it("sells volatile into the cash reserve", async () => {
    await h.strategy.rebalance(true, USDC(100n), orchestrator);

    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 721_649n, cashDeployed: 300_000_000n });
    expect(await h.strategy.cashReserveValue()).toBe(300_000_000n);
  });

  it("buys volatile out of the cash reserve", async () => {
    await h.strategy.rebalance(false, USDC(50n), orchestrator);

    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 876_288n, cashDeployed: 150_000_000n });
  });

  it("refuses a partial sell", async () => {
    const err = await h.strategy.rebalance(true, USDC(900n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "InsufficientReserve")).toBe(true);
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 824_742n, cashDeployed: 200_000_000n });
  });

  it("refuses a buy larger than the cash reserve", async () => {
    const err = await h.strategy.rebalance(false, USDC(300n), orchestrator).catch((e: unknown) => e);
    expect(hasErrorCode(err, "InsufficientReserve")).toBe(true);
  });
});

// ─── Harvest ─────────────────────────────────────────────────────────────

describe("harvestYield", () => {
  it("sends interest above the deployed principal to the vault", async () => {
    const h = setup({}, 500n);
    await fund(h, USDC(1_000n));
    h.market.clock.advance(YEAR);
    h.market.feed.refresh();

    const harvested = await h.strategy.harvestYield(orchestrator);

    expect(harvested).toBe(10_000_000n);
    expect(h.market.bank.balanceOf("USDC", "vault")).toBe(10_000_000n);
    expect(h.strategy.position().cashDeployed).toBe(200_000_000n);
    expect(await h.strategy.cashReserveValue()).toBe(200_000_000n);
  });

  it("returns zero without consulting the breaker when nothing accrued", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));
    dropVolatileTo(h, 7_275_000_000_000n);
    await h.strategy.withdraw(1n, orchestrator).catch(() => undefined);
    expect(h.strategy.circuitBreakerStatus().tripped).toBe(true);

    expect(await h.strategy.harvestYield(orchestrator)).toBe(0n);
  });
});

// ─── Circuit breaker ─────────────────────────────────────────────────────

describe("circuit breaker", () => {
  let h: Harness;

  beforeEach(async () => {
    h = setup();
    await fund(h, USDC(1_000n));
    h.market.bank.mint("USDC", h.strategy.account, USDC(100n));
    dropVolatileTo(h, 7_275_000_000_000n);
  });

  it("a 25% drop inside the window blocks deploy until reset", async () => {
    const tripped = await h.strategy.deploy(USDC(100n), orchestrator).catch((e: unknown) => e);
    expect(hasErrorCode(tripped, "CircuitBreakerTripped")).toBe(true);

    const active = await h.strategy.deploy(USDC(100n), orchestrator).catch((e: unknown) => e);
    expect(hasErrorCode(active, "CircuitBreakerActive")).toBe(true);

    await h.strategy.resetCircuitBreaker(admin);
    await h.strategy.deploy(USDC(100n), orchestrator);

    expect(h.strategy.position().cashDeployed).toBe(220_000_000n);
  });

  it("persists the trip even though the operation failed", async () => {
    await h.strategy.deploy(USDC(100n), orchestrator).catch(() => undefined);

    const saved = h.snapshots.load("circuit-breaker");
    expect(saved?.state).toMatchObject({ tripped: true, trippedPrice: "72750000000000000000000" });
    expect(h.journal.read("reserve").map((r) => r.event.type)).toEqual([
      "reserve.deployed",
      "reserve.breaker.tripped",
    ]);
    expect(h.journal.read("reserve")[1]!.event.payload).toMatchObject({ dropBps: "2500" });
  });

  it("survives a restart", async () => {
    await h.strategy.deploy(USDC(100n), orchestrator).catch(() => undefined);

    const reopened = new ReserveStrategy({ ...h.deps, account: h.strategy.account });

    expect(reopened.circuitBreakerStatus().tripped).toBe(true);
    const err = await reopened.withdraw(USDC(1n), orchestrator).catch((e: unknown) => e);
    expect(hasErrorCode(err, "CircuitBreakerActive")).toBe(true);
  });

  it("reset requires the administrator capability", async () => {
    await h.strategy.deploy(USDC(100n), orchestrator).catch(() => undefined);

    const err = await h.strategy.resetCircuitBreaker(orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "Unauthorized")).toBe(true);
    expect(h.strategy.circuitBreakerStatus().tripped).toBe(true);
  });

  it("emergency withdraw bypasses a tripped breaker", async () => {
    await h.strategy.deploy(USDC(100n), orchestrator).catch(() => undefined);

    const delivered = await h.strategy.emergencyWithdraw(admin);

    // 200 USDC cash + 824742 sats at $72,750 + 100 USDC idle
    expect(delivered).toBe(899_999_805n);
    expect(h.market.bank.balanceOf("USDC", "vault")).toBe(899_999_805n);
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 0n, cashDeployed: 0n });
  });
});

// ─── Reentrancy and rollback ─────────────────────────────────────────────

describe("reentrancy", () => {
  it("rejects a venue callback into the strategy and restores state", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));
    h.market.bank.mint("USDC", h.strategy.account, USDC(100n));
    h.market.swap.onSwap = async () => {
      await h.strategy.withdraw(USDC(1n), orchestrator);
    };

    const err = await h.strategy.deploy(USDC(100n), orchestrator).catch((e: unknown) => e);

    expect(hasErrorCode(err, "ReentrantCall")).toBe(true);
    expect((err as Error).message).toBe(
      "ReserveStrategy.withdraw called while ReserveStrategy.deploy is in progress",
    );
    expect(h.strategy.position()).toEqual({ volatileAssetHeld: 824_742n, cashDeployed: 200_000_000n });
    expect(h.market.bank.balanceOf("USDC", h.strategy.account)).toBe(USDC(100n));
  });
});

// ─── Configuration and persistence ───────────────────────────────────────

describe("configuration", () => {
  it("rejects an allocation that does not sum to 10000 bps", async () => {
    const h = setup();
    const err = await h.strategy
      .setAllocation({ volatileBps: 7_000n, cashBps: 2_000n }, admin)
      .catch((e: unknown) => e);

    expect(hasErrorCode(err, "InvalidParameter")).toBe(true);
    expect(h.strategy.config.allocation.volatileBps).toBe(8_000n);
  });

  it("rejects slippage outside (0, 1000] bps", async () => {
    const h = setup();
    await expect(h.strategy.setMaxSlippage(0n, admin)).rejects.toThrow("Slippage tolerance");
    await expect(h.strategy.setMaxSlippage(1_001n, admin)).rejects.toThrow("Slippage tolerance");
    await h.strategy.setMaxSlippage(50n, admin);
    expect(h.strategy.config.maxSlippageBps).toBe(50n);
  });

  it("restores position and configuration from snapshots", async () => {
    const h = setup();
    await h.strategy.setAllocation({ volatileBps: 6_000n, cashBps: 4_000n }, admin);
    await h.strategy.setCircuitBreakerConfig({ thresholdBps: 1_500n, windowSeconds: 600 }, admin);
    await fund(h, USDC(1_000n));

    const reopened = new ReserveStrategy(h.deps);

    expect(reopened.position()).toEqual(h.strategy.position());
    expect(reopened.config.allocation).toEqual({ volatileBps: 6_000n, cashBps: 4_000n });
    expect(reopened.config.circuitBreaker).toEqual({ thresholdBps: 1_500n, windowSeconds: 600 });
  });

  it("does not snapshot a failed operation", async () => {
    const h = setup();
    await fund(h, USDC(1_000n));
    const before = h.snapshots.count("reserve");

    await h.strategy.rebalance(true, USDC(900n), orchestrator).catch(() => undefined);

    expect(h.snapshots.count("reserve")).toBe(before);
  });
});
