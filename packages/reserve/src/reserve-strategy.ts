/**
 * @pegvault/reserve — Reserve strategy.
 *
 * Owns the volatile-asset position and the cash reserve on the lending
 * venue. The vault reaches it only through the orchestrator-gated methods
 * below; nothing outside this class touches the position fields.
 *
 * Rules:
 * - Every entry point is non-reentrant and runs inside the atomic scope
 * - Capital-moving operations consult the circuit breaker first
 * - Venue results are never taken at their word; proceeds are measured as
 *   balance deltas and checked against the slippage bound
 * - Swaps carry a deadline of now + swapDeadlineSeconds
 * - Position snapshots and audit events are written only on commit
 */

import {
  ExecutionError,
  StateError,
  ValidationError,
  isTreasuryError,
  requireCapability,
  type AssetSpec,
  type CallContext,
  type Capability,
  type Clock,
  type LendingVenue,
  type ReservePosition,
  type ReserveStrategyPort,
  type SwapVenue,
  type TokenBank,
} from "@pegvault/types";
import { AtomicScope, ReentrancyGuard, type RestoreFn, type ScopeParticipant } from "@pegvault/guard";
import { BPS, applyBps, minBigInt, type Rounding } from "@pegvault/math";
import { GuardedPriceReader, convertAmount } from "@pegvault/oracle";
import { createEvent, type EventStore, type SnapshotStore } from "@pegvault/event-store";
import { CircuitBreaker, validateBreakerConfig } from "./circuit-breaker.js";
import {
  BREAKER_STREAM,
  POSITION_STREAM,
  decodeBreaker,
  decodePosition,
  encodeBreaker,
  encodePosition,
} from "./persistence.js";
import {
  DEFAULT_RESERVE_CONFIG,
  type AllocationSplit,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  type ReserveConfig,
  type ReserveStrategyDeps,
  type ReserveValuation,
} from "./types.js";

/** Upper bound on the configurable slippage tolerance (10%) */
export const MAX_SLIPPAGE_BPS = 1_000n;

interface OperationOptions {
  readonly capability: Capability;
  /** Consult the circuit breaker before the body runs */
  readonly breaker: boolean;
}

export class ReserveStrategy implements ReserveStrategyPort, ScopeParticipant {
  readonly account: string;

  private holdings: ReservePosition = { volatileAssetHeld: 0n, cashDeployed: 0n };
  private settings: ReserveConfig;
  private readonly breaker: CircuitBreaker;
  private readonly guard = new ReentrancyGuard("ReserveStrategy");

  private readonly stable: AssetSpec;
  private readonly volatile: AssetSpec;
  private readonly bank: TokenBank;
  private readonly swap: SwapVenue;
  private readonly lending: LendingVenue;
  private readonly prices: GuardedPriceReader;
  private readonly clock: Clock;
  private readonly scope: AtomicScope;
  private readonly vaultAccount: string;
  private readonly journal: EventStore | undefined;
  private readonly snapshots: SnapshotStore | undefined;

  constructor(deps: ReserveStrategyDeps) {
    this.account = deps.account ?? "reserve";
    this.stable = deps.assets.stable;
    this.volatile = deps.assets.volatile;
    this.bank = deps.bank;
    this.swap = deps.swap;
    this.lending = deps.lending;
    this.prices = deps.prices;
    this.clock = deps.clock;
    this.scope = deps.scope;
    this.vaultAccount = deps.vaultAccount;
    this.journal = deps.journal;
    this.snapshots = deps.snapshots;

    let config = deps.config ?? DEFAULT_RESERVE_CONFIG;
    let breakerState: CircuitBreakerState | undefined;

    const saved = this.snapshots?.load(POSITION_STREAM);
    if (saved !== undefined) {
      const decoded = decodePosition(saved.state);
      this.holdings = decoded.position;
      config = decoded.config;
    }
    const savedBreaker = this.snapshots?.load(BREAKER_STREAM);
    if (savedBreaker !== undefined) {
      breakerState = decodeBreaker(savedBreaker.state);
    }

    validateConfig(config);
    this.settings = config;
    this.breaker = new CircuitBreaker(config.circuitBreaker, breakerState);
    this.scope.register(this);
  }

  // ===========================================================================
  // Orchestrator operations
  // ===========================================================================

  /**
   * Split `amount` (already transferred to this account) between the
   * volatile asset and the lending venue.
   */
  async deploy(amount: bigint, ctx: CallContext): Promise<void> {
    await this.operate("deploy", ctx, { capability: "orchestrator", breaker: true }, async () => {
      assertPositive(amount, "deploy");
      const idle = this.bank.balanceOf(this.stable.id, this.account);
      if (idle < amount) {
        throw new ExecutionError("InsufficientLiquidity", "Deploy amount has not been received", {
          amount: amount.toString(),
          idle: idle.toString(),
        });
      }

      const volatilePortion = applyBps(amount, this.settings.allocation.volatileBps);
      const cashPortion = amount - volatilePortion;

      const bought = volatilePortion > 0n ? await this.buyVolatile(volatilePortion) : 0n;
      if (cashPortion > 0n) await this.supplyCash(cashPortion);

      this.holdings = {
        volatileAssetHeld: this.holdings.volatileAssetHeld + bought,
        cashDeployed: this.holdings.cashDeployed + cashPortion,
      };

      await this.record("reserve.deployed", ctx, {
        amount: amount.toString(),
        volatileSpent: volatilePortion.toString(),
        volatileBought: bought.toString(),
        cashSupplied: cashPortion.toString(),
      });
    });
  }

  /**
   * Send up to `amount` of the stable asset to the vault: cash reserve
   * first, then liquidate volatile for the shortfall. Returns what was sent.
   */
  async withdraw(amount: bigint, ctx: CallContext): Promise<bigint> {
    return this.operate("withdraw", ctx, { capability: "orchestrator", breaker: true }, async () => {
      assertPositive(amount, "withdraw");

      const liveCash = await this.lending.balanceOf(this.stable.id, this.account);
      const fromCash = minBigInt(amount, liveCash);
      const cashRaised = fromCash > 0n ? await this.redeemCash(fromCash) : 0n;
      this.reduceCashDeployed(cashRaised);

      const shortfall = amount > cashRaised ? amount - cashRaised : 0n;
      const liquidated =
        shortfall > 0n && this.holdings.volatileAssetHeld > 0n
          ? await this.liquidateFor(shortfall, false)
          : 0n;

      const available = this.bank.balanceOf(this.stable.id, this.account);
      const delivered = minBigInt(amount, available);
      if (delivered > 0n) {
        this.bank.transfer(this.stable.id, this.account, this.vaultAccount, delivered);
      }

      await this.record("reserve.withdrawn", ctx, {
        requested: amount.toString(),
        fromCash: cashRaised.toString(),
        fromVolatile: liquidated.toString(),
        delivered: delivered.toString(),
      });
      return delivered;
    });
  }

  /**
   * Move `amount` (stable units) between reserves. Selling raises cash from
   * the volatile position; buying spends cash on the volatile asset. Either
   * direction is all or nothing.
   */
  async rebalance(sellVolatile: boolean, amount: bigint, ctx: CallContext): Promise<void> {
    await this.operate("rebalance", ctx, { capability: "orchestrator", breaker: true }, async () => {
      assertPositive(amount, "rebalance");

      if (sellVolatile) {
        const raised = await this.liquidateFor(amount, true);
        await this.supplyCash(raised);
        this.holdings = { ...this.holdings, cashDeployed: this.holdings.cashDeployed + raised };
        await this.record("reserve.rebalanced", ctx, {
          direction: "sell-volatile",
          amount: amount.toString(),
          cashRaised: raised.toString(),
        });
        return;
      }

      const liveCash = await this.lending.balanceOf(this.stable.id, this.account);
      if (amount > liveCash) {
        throw new StateError("InsufficientReserve", "Cash reserve cannot cover the purchase", {
          amount: amount.toString(),
          cashReserve: liveCash.toString(),
        });
      }
      const redeemed = await this.redeemCash(amount);
      this.reduceCashDeployed(redeemed);
      const bought = await this.buyVolatile(redeemed);
      this.holdings = {
        ...this.holdings,
        volatileAssetHeld: this.holdings.volatileAssetHeld + bought,
      };
      await this.record("reserve.rebalanced", ctx, {
        direction: "buy-volatile",
        amount: amount.toString(),
        volatileBought: bought.toString(),
      });
    });
  }

  /**
   * Send interest accrued above `cashDeployed` to the vault. Never harvests
   * a negative amount.
   */
  async harvestYield(ctx: CallContext): Promise<bigint> {
    return this.operate("harvestYield", ctx, { capability: "orchestrator", breaker: false }, async () => {
      const live = await this.lending.balanceOf(this.stable.id, this.account);
      const accrued = live - this.holdings.cashDeployed;
      if (accrued <= 0n) return 0n;

      await this.checkCircuitBreaker(ctx);
      const harvested = await this.redeemCash(accrued);
      this.bank.transfer(this.stable.id, this.account, this.vaultAccount, harvested);
      await this.record("reserve.harvested", ctx, { harvested: harvested.toString() });
      return harvested;
    });
  }

  // ===========================================================================
  // Administrator operations
  // ===========================================================================

  /**
   * Unwind everything to the vault. Bypasses the circuit breaker; swaps are
   * still slippage-bounded.
   */
  async emergencyWithdraw(ctx: CallContext): Promise<bigint> {
    return this.operate("emergencyWithdraw", ctx, { capability: "administrator", breaker: false }, async () => {
      const liveCash = await this.lending.balanceOf(this.stable.id, this.account);
      if (liveCash > 0n) await this.redeemCash(liveCash);

      const held = this.holdings.volatileAssetHeld;
      if (held > 0n) await this.sellExactVolatile(held);
      this.holdings = { volatileAssetHeld: 0n, cashDeployed: 0n };

      const delivered = this.bank.balanceOf(this.stable.id, this.account);
      if (delivered > 0n) {
        this.bank.transfer(this.stable.id, this.account, this.vaultAccount, delivered);
      }
      await this.record("reserve.emergency-withdrawn", ctx, {
        volatileSold: held.toString(),
        delivered: delivered.toString(),
      });
      return delivered;
    });
  }

  /**
   * Clear a tripped breaker and start a new window at the current price.
   */
  async resetCircuitBreaker(ctx: CallContext): Promise<void> {
    requireCapability(ctx, "administrator", "ReserveStrategy.resetCircuitBreaker");
    await this.guard.run("resetCircuitBreaker", async () => {
      const price = await this.prices.readWad(this.volatile.id);
      const previous = this.breaker.state;
      this.breaker.reset(price, this.clock.now());
      this.saveBreaker();
      this.appendNow("reserve.breaker.reset", ctx, {
        price: price.toString(),
        wasTripped: previous.tripped,
        trippedPrice: previous.trippedPrice === null ? null : previous.trippedPrice.toString(),
      });
    });
  }

  async setAllocation(allocation: AllocationSplit, ctx: CallContext): Promise<void> {
    await this.configure("setAllocation", ctx, { ...this.settings, allocation }, {
      volatileBps: allocation.volatileBps.toString(),
      cashBps: allocation.cashBps.toString(),
    });
  }

  async setMaxSlippage(maxSlippageBps: bigint, ctx: CallContext): Promise<void> {
    await this.configure("setMaxSlippage", ctx, { ...this.settings, maxSlippageBps }, {
      maxSlippageBps: maxSlippageBps.toString(),
    });
  }

  async setSwapDeadline(swapDeadlineSeconds: number, ctx: CallContext): Promise<void> {
    await this.configure("setSwapDeadline", ctx, { ...this.settings, swapDeadlineSeconds }, {
      swapDeadlineSeconds,
    });
  }

  async setCircuitBreakerConfig(circuitBreaker: CircuitBreakerConfig, ctx: CallContext): Promise<void> {
    await this.configure("setCircuitBreakerConfig", ctx, { ...this.settings, circuitBreaker }, {
      thresholdBps: circuitBreaker.thresholdBps.toString(),
      windowSeconds: circuitBreaker.windowSeconds,
    });
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  position(): ReservePosition {
    return { ...this.holdings };
  }

  get config(): ReserveConfig {
    return this.settings;
  }

  circuitBreakerStatus(): CircuitBreakerState {
    return this.breaker.state;
  }

  async cashReserveValue(): Promise<bigint> {
    return this.lending.balanceOf(this.stable.id, this.account);
  }

  async volatileReserveValue(): Promise<bigint> {
    const held = this.holdings.volatileAssetHeld;
    if (held === 0n) return 0n;
    return this.volatileToStable(held, "down");
  }

  async totalValue(): Promise<bigint> {
    return (await this.valuation()).totalValue;
  }

  async valuation(): Promise<ReserveValuation> {
    const cashReserveValue = await this.cashReserveValue();
    const volatileReserveValue = await this.volatileReserveValue();
    const idleValue = this.bank.balanceOf(this.stable.id, this.account);
    return {
      volatileAssetHeld: this.holdings.volatileAssetHeld,
      cashDeployed: this.holdings.cashDeployed,
      cashReserveValue,
      volatileReserveValue,
      idleValue,
      totalValue: cashReserveValue + volatileReserveValue + idleValue,
    };
  }

  // ===========================================================================
  // Scope participation
  // ===========================================================================

  capture(): RestoreFn {
    const position = this.holdings;
    const settings = this.settings;
    return () => {
      this.holdings = position;
      this.settings = settings;
      this.breaker.configure(settings.circuitBreaker);
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async operate<T>(
    operation: string,
    ctx: CallContext,
    options: OperationOptions,
    body: () => Promise<T>,
  ): Promise<T> {
    requireCapability(ctx, options.capability, `ReserveStrategy.${operation}`);
    return this.guard.run(operation, async () => {
      if (options.breaker) await this.checkCircuitBreaker(ctx);
      return this.scope.run(async () => {
        const result = await body();
        await this.scope.afterCommit(() => this.savePosition());
        return result;
      });
    });
  }

  private async configure(
    operation: string,
    ctx: CallContext,
    next: ReserveConfig,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.operate(operation, ctx, { capability: "administrator", breaker: false }, async () => {
      validateConfig(next);
      this.settings = next;
      this.breaker.configure(next.circuitBreaker);
      await this.record("reserve.config.updated", ctx, { operation, ...payload });
    });
  }

  /**
   * Observe the volatile price. Trips and checkpoint moves are saved
   * immediately: they must outlive the rollback of the operation they reject.
   */
  private async checkCircuitBreaker(ctx: CallContext): Promise<void> {
    const price = await this.prices.readWad(this.volatile.id);
    const observation = this.breaker.observe(price, this.clock.now());
    if (observation.changed) this.saveBreaker();

    if (observation.verdict === "tripped") {
      this.appendNow("reserve.breaker.tripped", ctx, {
        price: price.toString(),
        checkpointPrice: this.breaker.state.checkpointPrice.toString(),
        dropBps: observation.dropBps.toString(),
      });
      throw new StateError("CircuitBreakerTripped", "Volatile price drop tripped the circuit breaker", {
        dropBps: observation.dropBps.toString(),
        thresholdBps: this.breaker.config.thresholdBps.toString(),
      });
    }
    if (observation.verdict === "active") {
      throw new StateError("CircuitBreakerActive", "Circuit breaker is tripped; awaiting administrative reset", {
        trippedAt: this.breaker.state.trippedAt,
      });
    }
  }

  /** Spend exactly `stableIn` on the volatile asset; returns the amount received */
  private async buyVolatile(stableIn: bigint): Promise<bigint> {
    const expected = await this.stableToVolatile(stableIn, "down");
    const minOut = applyBps(expected, BPS - this.settings.maxSlippageBps);

    const volatileBefore = this.bank.balanceOf(this.volatile.id, this.account);
    const stableBefore = this.bank.balanceOf(this.stable.id, this.account);
    await this.callVenue("swapExactInput", () =>
      this.swap.swapExactInput(this.stable.id, this.volatile.id, stableIn, minOut, this.deadline(), this.account),
    );
    const received = this.bank.balanceOf(this.volatile.id, this.account) - volatileBefore;
    const spent = stableBefore - this.bank.balanceOf(this.stable.id, this.account);

    if (spent > stableIn || received < 0n) {
      throw new ExecutionError("MalformedVenueResponse", "Swap moved balances outside its bounds", {
        spent: spent.toString(),
        stableIn: stableIn.toString(),
        received: received.toString(),
      });
    }
    if (received < minOut) {
      throw new ExecutionError("SlippageExceeded", "Swap output below the slippage bound", {
        received: received.toString(),
        minOut: minOut.toString(),
      });
    }
    return received;
  }

  /**
   * Raise `stableNeeded` by selling volatile. With `exact`, anything short
   * of the full amount is an InsufficientReserve; otherwise the whole
   * position is sold when it cannot cover the bound. Returns stable raised.
   */
  private async liquidateFor(stableNeeded: bigint, exact: boolean): Promise<bigint> {
    const held = this.holdings.volatileAssetHeld;
    const expectedIn = await this.stableToVolatile(stableNeeded, "up");
    const maxIn = applyBps(expectedIn, BPS + this.settings.maxSlippageBps, "up");

    if (maxIn > held) {
      if (exact) {
        throw new StateError("InsufficientReserve", "Volatile reserve cannot cover the requested amount", {
          requested: stableNeeded.toString(),
          volatileHeld: held.toString(),
          maxVolatileIn: maxIn.toString(),
        });
      }
      return held > 0n ? this.sellExactVolatile(held) : 0n;
    }

    const volatileBefore = this.bank.balanceOf(this.volatile.id, this.account);
    const stableBefore = this.bank.balanceOf(this.stable.id, this.account);
    await this.callVenue("swapExactOutput", () =>
      this.swap.swapExactOutput(this.volatile.id, this.stable.id, stableNeeded, maxIn, this.deadline(), this.account),
    );
    const spent = volatileBefore - this.bank.balanceOf(this.volatile.id, this.account);
    const received = this.bank.balanceOf(this.stable.id, this.account) - stableBefore;

    if (spent < 0n || spent > maxIn) {
      throw new ExecutionError("SlippageExceeded", "Swap consumed more than the slippage bound", {
        spent: spent.toString(),
        maxIn: maxIn.toString(),
      });
    }
    if (received < stableNeeded) {
      throw new ExecutionError("MalformedVenueResponse", "Exact-output swap delivered less than requested", {
        received: received.toString(),
        requested: stableNeeded.toString(),
      });
    }

    this.holdings = { ...this.holdings, volatileAssetHeld: held - spent };
    return received;
  }

  /** Sell exactly `volatileIn`; returns stable received */
  private async sellExactVolatile(volatileIn: bigint): Promise<bigint> {
    const expected = await this.volatileToStable(volatileIn, "down");
    const minOut = applyBps(expected, BPS - this.settings.maxSlippageBps);

    const volatileBefore = this.bank.balanceOf(this.volatile.id, this.account);
    const stableBefore = this.bank.balanceOf(this.stable.id, this.account);
    await this.callVenue("swapExactInput", () =>
      this.swap.swapExactInput(this.volatile.id, this.stable.id, volatileIn, minOut, this.deadline(), this.account),
    );
    const spent = volatileBefore - this.bank.balanceOf(this.volatile.id, this.account);
    const received = this.bank.balanceOf(this.stable.id, this.account) - stableBefore;

    if (spent > volatileIn || received < 0n) {
      throw new ExecutionError("MalformedVenueResponse", "Swap moved balances outside its bounds", {
        spent: spent.toString(),
        volatileIn: volatileIn.toString(),
      });
    }
    if (received < minOut) {
      throw new ExecutionError("SlippageExceeded", "Swap output below the slippage bound", {
        received: received.toString(),
        minOut: minOut.toString(),
      });
    }

    const held = this.holdings.volatileAssetHeld;
    this.holdings = { ...this.holdings, volatileAssetHeld: held > spent ? held - spent : 0n };
    return received;
  }

  private async supplyCash(amount: bigint): Promise<void> {
    const before = await this.lending.balanceOf(this.stable.id, this.account);
    await this.callVenue("supply", () => this.lending.supply(this.stable.id, amount, this.account));
    const after = await this.lending.balanceOf(this.stable.id, this.account);
    if (after - before < amount) {
      throw new ExecutionError("MalformedVenueResponse", "Lending venue credited less than supplied", {
        supplied: amount.toString(),
        credited: (after - before).toString(),
      });
    }
  }

  /** Pull `amount` from the lending venue into this account; returns what arrived */
  private async redeemCash(amount: bigint): Promise<bigint> {
    const before = this.bank.balanceOf(this.stable.id, this.account);
    await this.callVenue("withdraw", () => this.lending.withdraw(this.stable.id, amount, this.account));
    const received = this.bank.balanceOf(this.stable.id, this.account) - before;
    if (received < amount) {
      throw new ExecutionError("MalformedVenueResponse", "Lending venue paid out less than requested", {
        requested: amount.toString(),
        received: received.toString(),
      });
    }
    return received;
  }

  private reduceCashDeployed(amount: bigint): void {
    const deployed = this.holdings.cashDeployed;
    this.holdings = { ...this.holdings, cashDeployed: deployed > amount ? deployed - amount : 0n };
  }

  private async callVenue<T>(call: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isTreasuryError(err)) throw err;
      throw new ExecutionError(
        "VenueCallFailed",
        `${call} failed: ${err instanceof Error ? err.message : String(err)}`,
        { call },
      );
    }
  }

  private deadline(): number {
    return this.clock.now() + this.settings.swapDeadlineSeconds;
  }

  private async stableToVolatile(amount: bigint, rounding: Rounding): Promise<bigint> {
    const stablePrice = await this.prices.readWad(this.stable.id);
    const volatilePrice = await this.prices.readWad(this.volatile.id);
    return convertAmount(amount, this.stable.decimals, stablePrice, this.volatile.decimals, volatilePrice, rounding);
  }

  private async volatileToStable(amount: bigint, rounding: Rounding): Promise<bigint> {
    const stablePrice = await this.prices.readWad(this.stable.id);
    const volatilePrice = await this.prices.readWad(this.volatile.id);
    return convertAmount(amount, this.volatile.decimals, volatilePrice, this.stable.decimals, stablePrice, rounding);
  }

  // ─── Persistence and audit ───────────────────────────────────────────

  private savePosition(): void {
    this.snapshots?.save(POSITION_STREAM, encodePosition(this.holdings, this.settings));
  }

  private saveBreaker(): void {
    this.snapshots?.save(BREAKER_STREAM, encodeBreaker(this.breaker.state));
  }

  private async record(type: string, ctx: CallContext, payload: Record<string, unknown>): Promise<void> {
    await this.scope.afterCommit(() => this.appendNow(type, ctx, payload));
  }

  private appendNow(type: string, ctx: CallContext, payload: Record<string, unknown>): void {
    this.journal?.append("reserve", [
      createEvent(type, payload, {
        actor: ctx.actor,
        source: "reserve",
        ...(ctx.correlationId !== undefined ? { correlationId: ctx.correlationId } : {}),
      }),
    ]);
  }
}

function assertPositive(amount: bigint, operation: string): void {
  if (amount <= 0n) {
    throw new ValidationError("ZeroAmount", `${operation} amount must be positive`, {
      amount: amount.toString(),
    });
  }
}

function validateConfig(config: ReserveConfig): void {
  const { volatileBps, cashBps } = config.allocation;
  if (volatileBps < 0n || cashBps < 0n || volatileBps + cashBps !== BPS) {
    throw new ValidationError("InvalidParameter", "Allocation must split 10000 bps between the reserves", {
      volatileBps: volatileBps.toString(),
      cashBps: cashBps.toString(),
    });
  }
  if (config.maxSlippageBps <= 0n || config.maxSlippageBps > MAX_SLIPPAGE_BPS) {
    throw new ValidationError("InvalidParameter", `Slippage tolerance must be within (0, ${MAX_SLIPPAGE_BPS.toString()}] bps`, {
      maxSlippageBps: config.maxSlippageBps.toString(),
    });
  }
  if (!Number.isInteger(config.swapDeadlineSeconds) || config.swapDeadlineSeconds <= 0) {
    throw new ValidationError("InvalidParameter", "Swap deadline must be a positive number of seconds", {
      swapDeadlineSeconds: config.swapDeadlineSeconds,
    });
  }
  validateBreakerConfig(config.circuitBreaker);
}
