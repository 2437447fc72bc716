/**
 * Vault — share ledger, deposits, redemptions and the epoch tick.
 *
 * Composes:
 * - ShareLedger (holder balances)
 * - Share math (virtual-offset exchange rate)
 * - Epoch engine (rate, dividend and rebalance plan)
 * - A ReserveStrategyPort that holds the deployed capital
 *
 * Rules:
 * - Every mutating entry point is non-reentrant and atomic: a failure
 *   restores the ledger, the accounting and every scope participant
 * - Validation happens before the first mutation
 * - The strategy is reached only through its port, with an orchestrator
 *   context derived from the caller's
 * - State is snapshotted and an audit event appended after each commit
 */

import {
  AccessError,
  ExecutionError,
  StateError,
  ValidationError,
  createContext,
  requireCapability,
  type CallContext,
  type Capability,
  type EventSource,
  type ReserveStrategyPort,
} from "@pegvault/types";
import { AtomicScope, ReentrancyGuard, type RestoreFn, type ScopeParticipant } from "@pegvault/guard";
import {
  applyBps,
  collateralRatio,
  maxBigInt,
  minBigInt,
  mulDiv,
  projectedAnnualDividend,
  validateRateParams,
  type RateParams,
} from "@pegvault/math";
import type { GuardedPriceReader } from "@pegvault/oracle";
import { createEvent, type EventStore, type SnapshotStore } from "@pegvault/event-store";
import { ShareLedger } from "./share-ledger.js";
import { assetsPerShare, assetsToShares, sharesToAssets, type ExchangeState } from "./share-math.js";
import { observedPhase, planEpoch, transition, type EpochPhase } from "./epoch-engine.js";
import { VAULT_STREAM, decodeVault, encodeVault } from "./persistence.js";
import {
  DEFAULT_VAULT_PARAMETERS,
  MAX_EPOCH_DURATION,
  PRICE_DECIMALS,
  type DepositLimits,
  type EpochReport,
  type VaultAccounting,
  type VaultDeps,
  type VaultParameters,
  type VaultSummary,
} from "./types.js";

/** Share of idle balance kept back from deployment (1%) */
const LIQUIDITY_BUFFER_BPS = 100n;

// =============================================================================
// Vault
// =============================================================================

export class Vault implements ScopeParticipant {
  readonly account: string;

  private ledger = new ShareLedger();
  private accounting: VaultAccounting;
  private strategy: ReserveStrategyPort | undefined;
  private readonly guard = new ReentrancyGuard("Vault");

  private readonly deps: VaultDeps;
  private readonly prices: GuardedPriceReader;
  private readonly scope: AtomicScope;
  private readonly journal: EventStore | undefined;
  private readonly snapshots: SnapshotStore | undefined;

  constructor(deps: VaultDeps) {
    const parameters = deps.parameters ?? DEFAULT_VAULT_PARAMETERS;
    validateParameters(parameters);

    this.deps = deps;
    this.account = deps.account ?? "vault";
    this.strategy = deps.strategy;
    this.prices = deps.prices;
    this.scope = deps.scope;
    this.journal = deps.journal;
    this.snapshots = deps.snapshots;
    this.accounting = {
      parameters,
      outstandingPrincipal: 0n,
      currentRate: parameters.rate.baseRate,
      lastEpochTimestamp: deps.clock.now(),
      epochCount: 0,
      accumulatedYieldPerShare: 0n,
      lastAssetsPerShare: 0n,
      totalDividendsDistributed: 0n,
      mintingPaused: false,
      redeemingPaused: false,
      phase: "idle",
    };
    this.scope.register(this);
  }

  /**
   * Build a vault from the latest verified snapshot, or a fresh one when
   * nothing has been saved yet.
   */
  static restore(deps: VaultDeps): Vault {
    const vault = new Vault(deps);
    const saved = deps.snapshots?.load(VAULT_STREAM);
    if (saved !== undefined) {
      const decoded = decodeVault(saved.state);
      validateParameters(decoded.accounting.parameters);
      vault.ledger = ShareLedger.fromBalances(decoded.holders);
      vault.accounting = decoded.accounting;
    }
    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take `assets` from the caller and mint shares to `receiver`.
   * Returns the shares minted.
   */
  async deposit(assets: bigint, receiver: string, ctx: CallContext): Promise<bigint> {
    return this.operate("deposit", ctx, undefined, async () => {
      this.assertRecipient(receiver);
      this.assertMintingOpen();
      if (assets <= 0n) {
        throw new ValidationError("ZeroAmount", "Deposit amount must be positive");
      }

      const exchange = await this.exchange();
      this.checkDepositLimits(assets, exchange.totalAssets);
      const shares = assetsToShares(assets, exchange, "down");
      if (shares === 0n) {
        throw new ValidationError("ZeroShares", "Deposit is too small to mint a share", {
          assets: assets.toString(),
        });
      }

      await this.enter(ctx, receiver, assets, shares);
      return shares;
    });
  }

  /**
   * Mint exactly `shares` to `receiver`, charging the caller what they cost.
   * Caps are checked against that cost before anything moves.
   */
  async mint(shares: bigint, receiver: string, ctx: CallContext): Promise<bigint> {
    return this.operate("mint", ctx, undefined, async () => {
      this.assertRecipient(receiver);
      this.assertMintingOpen();
      if (shares <= 0n) {
        throw new ValidationError("ZeroShares", "Share amount must be positive");
      }

      const exchange = await this.exchange();
      const assets = sharesToAssets(shares, exchange, "up");
      this.checkDepositLimits(assets, exchange.totalAssets);

      await this.enter(ctx, receiver, assets, shares);
      return assets;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Redemptions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay exactly `assets` to `receiver`, burning the shares they cost from
   * `owner`. Returns the shares burned.
   */
  async withdraw(assets: bigint, receiver: string, owner: string, ctx: CallContext): Promise<bigint> {
    return this.operate("withdraw", ctx, undefined, async () => {
      this.assertOwner(owner, ctx);
      this.assertRecipient(receiver);
      this.assertRedeemingOpen();
      if (assets <= 0n) {
        throw new ValidationError("ZeroAmount", "Withdrawal amount must be positive");
      }

      const shares = assetsToShares(assets, await this.exchange(), "up");
      this.assertHolds(owner, shares);

      await this.exit(ctx, owner, receiver, assets, shares);
      return shares;
    });
  }

  /**
   * Burn `shares` from `owner` and pay what they are worth to `receiver`.
   * Returns the assets paid.
   */
  async redeem(shares: bigint, receiver: string, owner: string, ctx: CallContext): Promise<bigint> {
    return this.operate("redeem", ctx, undefined, async () => {
      this.assertOwner(owner, ctx);
      this.assertRecipient(receiver);
      this.assertRedeemingOpen();
      if (shares <= 0n) {
        throw new ValidationError("ZeroShares", "Share amount must be positive");
      }
      this.assertHolds(owner, shares);

      const assets = sharesToAssets(shares, await this.exchange(), "down");
      if (assets === 0n) {
        throw new ValidationError("ZeroAssets", "Redemption is worth nothing at the current rate", {
          shares: shares.toString(),
        });
      }

      await this.exit(ctx, owner, receiver, assets, shares);
      return assets;
    });
  }

  /**
   * Move `shares` from the caller to `to`.
   */
  async transfer(to: string, shares: bigint, ctx: CallContext): Promise<void> {
    await this.operate("transfer", ctx, undefined, async () => {
      this.assertRecipient(to);
      if (shares <= 0n) {
        throw new ValidationError("ZeroShares", "Share amount must be positive");
      }
      this.ledger.transfer(ctx.actor, to, shares);
      await this.record("vault.transferred", ctx, "vault", {
        from: ctx.actor,
        to,
        shares: shares.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Epoch tick
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Recompute the rate from the share's market price and move capital to
   * match. Advances lastEpochTimestamp by exactly one epochDuration, so
   * missed epochs are caught up one tick at a time.
   */
  async rebalanceYield(ctx: CallContext): Promise<EpochReport> {
    return this.operate("rebalanceYield", ctx, "keeper", async () => {
      const strategy = this.requireStrategy();
      const now = this.deps.clock.now();
      const dueAt = this.nextEpochAt;
      if (now < dueAt) {
        throw new StateError("EpochNotElapsed", `Next epoch is due at ${dueAt}`, { nextEpochAt: dueAt, now });
      }

      // Computing
      this.setPhase("computing");
      const { parameters } = this.accounting;
      const marketPrice = await this.prices.readIn(this.deps.assets.share.id, PRICE_DECIMALS);
      const before = await this.exchange();
      const plan = planEpoch({
        targetPrice: parameters.targetPrice,
        marketPrice,
        rate: parameters.rate,
        totalAssets: before.totalAssets,
        epochDuration: parameters.epochDuration,
      });

      const perShare = assetsPerShare(before);
      const previous = this.accounting.lastAssetsPerShare;
      const yieldPerShareDelta = previous > 0n && perShare > previous ? perShare - previous : 0n;
      this.update({
        currentRate: plan.rate,
        accumulatedYieldPerShare: this.accounting.accumulatedYieldPerShare + yieldPerShareDelta,
      });

      // Rebalancing
      this.setPhase("rebalancing");
      const orchestrator = this.orchestrator(ctx);
      const harvested = await strategy.harvestYield(orchestrator);

      let distributed = 0n;
      let deployed = 0n;
      if (plan.action === "raise-liquidity") {
        // Cash first, then volatile for the shortfall. A reserve too small to
        // fund the whole dividend is sold out and the epoch settles on what arrived.
        distributed = await strategy.withdraw(plan.dividend, orchestrator);
      } else if (plan.action === "accumulate") {
        deployed = await this.deployIdle(ctx);
      }

      // Settled
      const epoch = this.accounting.epochCount + 1;
      this.update({
        lastAssetsPerShare: assetsPerShare(await this.exchange()),
        lastEpochTimestamp: this.accounting.lastEpochTimestamp + parameters.epochDuration,
        epochCount: epoch,
        totalDividendsDistributed: this.accounting.totalDividendsDistributed + distributed,
      });
      this.setPhase("settled");

      await this.record("vault.yield-rebalanced", ctx, "keeper", {
        epoch,
        newRate: plan.rate.toString(),
        marketPrice: marketPrice.toString(),
        targetPrice: parameters.targetPrice.toString(),
        action: plan.action,
        harvested: harvested.toString(),
      });
      if (distributed > 0n) {
        await this.record("vault.dividend-distributed", ctx, "keeper", {
          epoch,
          amount: distributed.toString(),
          rateBps: plan.rate.toString(),
        });
      }

      return {
        epoch,
        marketPrice,
        targetPrice: parameters.targetPrice,
        rate: plan.rate,
        dividendTarget: plan.dividend,
        harvested,
        distributed,
        deployed,
        yieldPerShareDelta,
      };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  async setDividendParams(rate: RateParams, ctx: CallContext): Promise<void> {
    await this.configure("setDividendParams", ctx, { ...this.accounting.parameters, rate }, {
      baseRate: rate.baseRate.toString(),
      sensitivity: rate.sensitivity.toString(),
      minRate: rate.minRate.toString(),
      maxRate: rate.maxRate.toString(),
    });
  }

  async setTargetPrice(targetPrice: bigint, ctx: CallContext): Promise<void> {
    await this.configure("setTargetPrice", ctx, { ...this.accounting.parameters, targetPrice }, {
      targetPrice: targetPrice.toString(),
    });
  }

  async setEpochDuration(epochDuration: number, ctx: CallContext): Promise<void> {
    await this.configure("setEpochDuration", ctx, { ...this.accounting.parameters, epochDuration }, {
      epochDuration,
    });
  }

  async setDepositLimits(limits: DepositLimits, ctx: CallContext): Promise<void> {
    await this.configure("setDepositLimits", ctx, { ...this.accounting.parameters, limits }, {
      minDeposit: limits.minDeposit.toString(),
      maxSingleDeposit: limits.maxSingleDeposit.toString(),
      maxTotalDeposits: limits.maxTotalDeposits.toString(),
    });
  }

  /**
   * Pause or resume minting and redeeming independently.
   */
  async setCircuitBreaker(mintingPaused: boolean, redeemingPaused: boolean, ctx: CallContext): Promise<void> {
    await this.operate("setCircuitBreaker", ctx, "administrator", async () => {
      this.update({ mintingPaused, redeemingPaused });
      await this.record("vault.pause.updated", ctx, "admin", { mintingPaused, redeemingPaused });
    });
  }

  /**
   * Attach the reserve strategy deposits are deployed into.
   */
  async setStrategy(strategy: ReserveStrategyPort, ctx: CallContext): Promise<void> {
    await this.operate("setStrategy", ctx, "administrator", async () => {
      this.strategy = strategy;
      await this.record("vault.strategy.updated", ctx, "admin", { strategyAccount: strategy.account });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  get totalShares(): bigint {
    return this.ledger.totalShares;
  }

  get parameters(): VaultParameters {
    return this.accounting.parameters;
  }

  get currentRate(): bigint {
    return this.accounting.currentRate;
  }

  get totalDividendsDistributed(): bigint {
    return this.accounting.totalDividendsDistributed;
  }

  get nextEpochAt(): number {
    return this.accounting.lastEpochTimestamp + this.accounting.parameters.epochDuration;
  }

  get phase(): EpochPhase {
    return observedPhase(this.accounting.phase, this.deps.clock.now(), this.nextEpochAt);
  }

  get hasStrategy(): boolean {
    return this.strategy !== undefined;
  }

  balanceOf(holder: string): bigint {
    return this.ledger.balanceOf(holder);
  }

  holders(): readonly (readonly [string, bigint])[] {
    return this.ledger.entries();
  }

  idleAssets(): bigint {
    return this.deps.bank.balanceOf(this.deps.assets.stable.id, this.account);
  }

  /** Idle balance plus everything the strategy holds */
  async totalAssets(): Promise<bigint> {
    const deployed = this.strategy === undefined ? 0n : await this.strategy.totalValue();
    return this.idleAssets() + deployed;
  }

  async convertToShares(assets: bigint): Promise<bigint> {
    return assetsToShares(assets, await this.exchange(), "down");
  }

  async convertToAssets(shares: bigint): Promise<bigint> {
    return sharesToAssets(shares, await this.exchange(), "down");
  }

  async previewDeposit(assets: bigint): Promise<bigint> {
    return assetsToShares(assets, await this.exchange(), "down");
  }

  async previewMint(shares: bigint): Promise<bigint> {
    return sharesToAssets(shares, await this.exchange(), "up");
  }

  async previewWithdraw(assets: bigint): Promise<bigint> {
    return assetsToShares(assets, await this.exchange(), "up");
  }

  async previewRedeem(shares: bigint): Promise<bigint> {
    return sharesToAssets(shares, await this.exchange(), "down");
  }

  /** Largest deposit currently accepted; zero while minting is paused */
  async maxDeposit(): Promise<bigint> {
    if (this.accounting.mintingPaused) return 0n;
    const { maxSingleDeposit, maxTotalDeposits } = this.accounting.parameters.limits;
    const total = await this.totalAssets();
    const headroom = maxTotalDeposits > total ? maxTotalDeposits - total : 0n;
    return minBigInt(maxSingleDeposit, headroom);
  }

  maxRedeem(owner: string): bigint {
    return this.accounting.redeemingPaused ? 0n : this.ledger.balanceOf(owner);
  }

  async maxWithdraw(owner: string): Promise<bigint> {
    return this.convertToAssets(this.maxRedeem(owner));
  }

  /** Asset units per share unit, PRECISION-scaled */
  async assetsPerShare(): Promise<bigint> {
    return assetsPerShare(await this.exchange());
  }

  /**
   * (volatile reserve + cash reserve + idle) / outstanding principal,
   * PRECISION-scaled. COLLATERAL_RATIO_INFINITE with nothing outstanding.
   */
  async collateralRatio(): Promise<bigint> {
    const volatile = this.strategy === undefined ? 0n : await this.strategy.volatileReserveValue();
    const cash = this.strategy === undefined ? 0n : await this.strategy.cashReserveValue();
    return collateralRatio(volatile, cash + this.idleAssets(), this.accounting.outstandingPrincipal);
  }

  async projectedAnnualDividend(): Promise<bigint> {
    return projectedAnnualDividend(await this.totalAssets(), this.accounting.currentRate);
  }

  async state(): Promise<VaultSummary> {
    const exchange = await this.exchange();
    return {
      ...this.accounting,
      phase: this.phase,
      totalShares: exchange.totalShares,
      holderCount: this.ledger.holderCount,
      idleAssets: this.idleAssets(),
      totalAssets: exchange.totalAssets,
      assetsPerShare: assetsPerShare(exchange),
      nextEpochAt: this.nextEpochAt,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Scope participation
  // ───────────────────────────────────────────────────────────────────────

  capture(): RestoreFn {
    const restoreLedger = this.ledger.capture();
    const accounting = this.accounting;
    const strategy = this.strategy;
    return () => {
      restoreLedger();
      this.accounting = accounting;
      this.strategy = strategy;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private async operate<T>(
    operation: string,
    ctx: CallContext,
    capability: Capability | undefined,
    body: () => Promise<T>,
  ): Promise<T> {
    if (capability !== undefined) {
      requireCapability(ctx, capability, `Vault.${operation}`);
    }
    return this.guard.run(operation, () =>
      this.scope.run(async () => {
        const result = await body();
        await this.scope.afterCommit(() => this.save());
        return result;
      }),
    );
  }

  private async configure(
    operation: string,
    ctx: CallContext,
    next: VaultParameters,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.operate(operation, ctx, "administrator", async () => {
      validateParameters(next);
      this.update({ parameters: next });
      await this.record("vault.params.updated", ctx, "admin", { operation, ...payload });
    });
  }

  private async enter(ctx: CallContext, receiver: string, assets: bigint, shares: bigint): Promise<void> {
    this.deps.bank.transfer(this.deps.assets.stable.id, ctx.actor, this.account, assets);
    this.ledger.mint(receiver, shares);
    this.update({ outstandingPrincipal: this.accounting.outstandingPrincipal + assets });
    const deployed = await this.deployIdle(ctx);

    await this.record("vault.deposited", ctx, "vault", {
      sender: ctx.actor,
      receiver,
      assets: assets.toString(),
      shares: shares.toString(),
      deployed: deployed.toString(),
    });
  }

  private async exit(
    ctx: CallContext,
    owner: string,
    receiver: string,
    assets: bigint,
    shares: bigint,
  ): Promise<void> {
    await this.ensureLiquidity(assets, ctx);

    const principal = this.accounting.outstandingPrincipal;
    const released = mulDiv(principal, shares, this.ledger.totalShares);
    this.ledger.burn(owner, shares);
    this.update({ outstandingPrincipal: principal - released });
    this.deps.bank.transfer(this.deps.assets.stable.id, this.account, receiver, assets);

    await this.record("vault.withdrawn", ctx, "vault", {
      owner,
      receiver,
      assets: assets.toString(),
      shares: shares.toString(),
    });
  }

  /**
   * Deploy idle balance above the buffer max(1% of idle, minDeposit).
   * Returns the amount handed to the strategy.
   */
  private async deployIdle(ctx: CallContext): Promise<bigint> {
    const strategy = this.strategy;
    if (strategy === undefined) return 0n;

    const idle = this.idleAssets();
    const buffer = maxBigInt(applyBps(idle, LIQUIDITY_BUFFER_BPS), this.accounting.parameters.limits.minDeposit);
    if (idle <= buffer) return 0n;

    const amount = idle - buffer;
    this.deps.bank.transfer(this.deps.assets.stable.id, this.account, strategy.account, amount);
    await strategy.deploy(amount, this.orchestrator(ctx));
    return amount;
  }

  /**
   * Make sure `assets` sits idle, pulling the shortfall from the strategy.
   */
  private async ensureLiquidity(assets: bigint, ctx: CallContext): Promise<void> {
    const idle = this.idleAssets();
    if (idle >= assets) return;

    if (this.strategy !== undefined) {
      await this.strategy.withdraw(assets - idle, this.orchestrator(ctx));
    }
    const available = this.idleAssets();
    if (available < assets) {
      throw new ExecutionError("InsufficientLiquidity", "Vault cannot raise enough liquidity", {
        required: assets.toString(),
        available: available.toString(),
      });
    }
  }

  private async exchange(): Promise<ExchangeState> {
    return { totalShares: this.ledger.totalShares, totalAssets: await this.totalAssets() };
  }

  private orchestrator(ctx: CallContext): CallContext {
    return createContext(this.account, ["orchestrator"], ctx.correlationId);
  }

  private requireStrategy(): ReserveStrategyPort {
    if (this.strategy === undefined) {
      throw new StateError("StrategyNotSet", "No reserve strategy is attached to the vault");
    }
    return this.strategy;
  }

  private update(patch: Partial<VaultAccounting>): void {
    this.accounting = { ...this.accounting, ...patch };
  }

  private setPhase(next: EpochPhase): void {
    this.update({ phase: transition(this.accounting.phase, next) });
  }

  private checkDepositLimits(assets: bigint, totalAssets: bigint): void {
    const { minDeposit, maxSingleDeposit, maxTotalDeposits } = this.accounting.parameters.limits;
    const details = {
      assets: assets.toString(),
      minDeposit: minDeposit.toString(),
      maxSingleDeposit: maxSingleDeposit.toString(),
      maxTotalDeposits: maxTotalDeposits.toString(),
    };
    if (assets < minDeposit) {
      throw new ValidationError("DepositTooSmall", "Deposit is below the minimum", details);
    }
    if (assets > maxSingleDeposit) {
      throw new ValidationError("DepositTooLarge", "Deposit exceeds the single-deposit limit", details);
    }
    if (totalAssets + assets > maxTotalDeposits) {
      throw new ValidationError("DepositCapExceeded", "Deposit would exceed the vault's total cap", {
        ...details,
        totalAssets: totalAssets.toString(),
      });
    }
  }

  private assertMintingOpen(): void {
    if (this.accounting.mintingPaused) {
      throw new StateError("MintingPaused", "Minting is paused");
    }
  }

  private assertRedeemingOpen(): void {
    if (this.accounting.redeemingPaused) {
      throw new StateError("RedeemingPaused", "Redeeming is paused");
    }
  }

  private assertOwner(owner: string, ctx: CallContext): void {
    if (owner !== ctx.actor) {
      throw new AccessError("NotShareOwner", `${ctx.actor} cannot spend shares owned by ${owner}`, {
        actor: ctx.actor,
        owner,
      });
    }
  }

  private assertHolds(owner: string, shares: bigint): void {
    const balance = this.ledger.balanceOf(owner);
    if (shares > balance) {
      throw new ValidationError("InsufficientShares", `${owner} holds ${balance} shares, needs ${shares}`, {
        owner,
        balance: balance.toString(),
        required: shares.toString(),
      });
    }
  }

  private assertRecipient(recipient: string): void {
    if (recipient.trim() === "" || recipient === this.account || recipient === this.strategy?.account) {
      throw new ValidationError("InvalidRecipient", `Invalid recipient "${recipient}"`, { recipient });
    }
  }

  // ─── Persistence and audit ───────────────────────────────────────────

  private save(): void {
    this.snapshots?.save(VAULT_STREAM, encodeVault(this.ledger.entries(), this.ledger.totalShares, this.accounting));
  }

  private async record(
    type: string,
    ctx: CallContext,
    source: EventSource,
    payload: Record<string, unknown>,
  ): Promise<void> {
    const journal = this.journal;
    if (journal === undefined) return;
    await this.scope.afterCommit(() => {
      journal.append(VAULT_STREAM, [
        createEvent(type, payload, {
          actor: ctx.actor,
          source,
          ...(ctx.correlationId !== undefined ? { correlationId: ctx.correlationId } : {}),
        }),
      ]);
    });
  }
}

// =============================================================================
// Parameter validation
// =============================================================================

export function validateParameters(parameters: VaultParameters): void {
  validateRateParams(parameters.rate);

  if (parameters.targetPrice <= 0n) {
    throw new ValidationError("InvalidParameter", "Target price must be positive", {
      targetPrice: parameters.targetPrice.toString(),
    });
  }
  const { epochDuration } = parameters;
  if (!Number.isInteger(epochDuration) || epochDuration <= 0 || epochDuration > MAX_EPOCH_DURATION) {
    throw new ValidationError("InvalidParameter", `Epoch duration must be within (0, ${MAX_EPOCH_DURATION}] seconds`, {
      epochDuration,
    });
  }

  const { minDeposit, maxSingleDeposit, maxTotalDeposits } = parameters.limits;
  if (minDeposit <= 0n || maxSingleDeposit < minDeposit || maxTotalDeposits < maxSingleDeposit) {
    throw new ValidationError(
      "InvalidParameter",
      "Deposit limits must satisfy 0 < minDeposit <= maxSingleDeposit <= maxTotalDeposits",
      {
        minDeposit: minDeposit.toString(),
        maxSingleDeposit: maxSingleDeposit.toString(),
        maxTotalDeposits: maxTotalDeposits.toString(),
      },
    );
  }
}
