/**
 * TreasuryService — Composition root for the treasury packages.
 *
 * Route handlers and the epoch scheduler delegate to this service; they
 * never reach the vault or the strategy directly.
 *
 * Rules:
 * - Calls run one at a time, in arrival order. A failed call does not
 *   block the ones queued behind it.
 * - Paper mode: venues are the in-process simulated market. Its clock
 *   follows the wall clock and its feed is refreshed before every call.
 * - With a data directory, the journal, the vault and reserve snapshots
 *   and the market's balances live on disk and are picked up on restart.
 *   Actors are funded once.
 */

import { join } from "node:path";
import { z } from "zod";

import type { CallContext, Clock } from "@pegvault/types";
import type { RateParams } from "@pegvault/math";
import { GuardedPriceReader } from "@pegvault/oracle";
import {
  FileSnapshotStore,
  InMemoryEventStore,
  InMemorySnapshotStore,
  JsonlEventStore,
  type EventStore,
  type SnapshotStore,
  type IntegrityReport,
  type JournalRecord,
} from "@pegvault/event-store";
import {
  ReserveStrategy,
  type CircuitBreakerState,
  type ReserveConfig,
  type ReserveValuation,
} from "@pegvault/reserve";
import {
  Vault,
  type DepositLimits,
  type EpochReport,
  type VaultParameters,
  type VaultSummary,
} from "@pegvault/vault";
import {
  createSimulatedMarket,
  encodeMarketState,
  restoreMarketState,
  type SimulatedMarket,
} from "@pegvault/sim";

// =============================================================================
// Configuration
// =============================================================================

export interface StalenessConfig {
  readonly stable: number;
  readonly volatile: number;
  readonly share: number;
}

export interface PaperMarketConfig {
  /** Volatile asset price, 8 decimals */
  readonly volatilePrice: bigint;
  /** Share price, 6 decimals */
  readonly sharePrice: bigint;
  readonly lendingApyBps: bigint;
  /** Stable balance minted to each funded actor at startup */
  readonly funding: bigint;
  readonly fundedActors: readonly string[];
}

export interface TreasuryServiceConfig {
  readonly parameters: VaultParameters;
  readonly reserve: ReserveConfig;
  readonly staleness: StalenessConfig;
  readonly paper: PaperMarketConfig;
  /** Holds `journal.jsonl` and `snapshots/`; everything in memory when unset */
  readonly dataDir?: string | undefined;
  /** Wall clock the paper market follows (default: system time) */
  readonly clock?: Clock;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

const VAULT_ACCOUNT = "vault";
export const MARKET_STREAM = "paper-market";

const PaperSnapshotSchema = z.object({
  market: z.unknown(),
  funded: z.array(z.string().min(1)),
});

// =============================================================================
// Read models
// =============================================================================

export interface VaultOverview extends VaultSummary {
  readonly collateralRatio: bigint;
  readonly projectedAnnualDividend: bigint;
  readonly hasStrategy: boolean;
}

export interface HolderView {
  readonly holder: string;
  readonly shares: bigint;
  readonly assets: bigint;
  readonly maxRedeem: bigint;
}

export interface ReserveView {
  readonly valuation: ReserveValuation;
  readonly config: ReserveConfig;
  readonly circuitBreaker: CircuitBreakerState;
}

export interface AuditReadOptions {
  readonly stream?: string | undefined;
  readonly type?: string | undefined;
  readonly fromPosition?: number | undefined;
  readonly limit: number;
  readonly order: "asc" | "desc";
}

// =============================================================================
// Service
// =============================================================================

export class TreasuryService {
  readonly market: SimulatedMarket;
  readonly vault: Vault;
  readonly strategy: ReserveStrategy;
  readonly journal: EventStore;

  private readonly snapshots: SnapshotStore;
  private readonly funded = new Set<string>();
  private readonly wallClock: Clock;
  private tail: Promise<void> = Promise.resolve();

  constructor(config: TreasuryServiceConfig) {
    this.wallClock = config.clock ?? systemClock;
    const { paper } = config;

    this.market = createSimulatedMarket({
      startTime: this.wallClock.now(),
      lendingApyBps: paper.lendingApyBps,
      prices: {
        volatile: { price: paper.volatilePrice, decimals: 8 },
        share: { price: paper.sharePrice, decimals: 6 },
      },
    });
    const { assets, bank, clock, scope } = this.market;

    if (config.dataDir !== undefined) {
      this.journal = new JsonlEventStore({ filePath: join(config.dataDir, "journal.jsonl") });
      this.snapshots = new FileSnapshotStore({ directory: join(config.dataDir, "snapshots") });
    } else {
      this.journal = new InMemoryEventStore();
      this.snapshots = new InMemorySnapshotStore();
    }

    const saved = this.snapshots.load(MARKET_STREAM);
    if (saved !== undefined) {
      const paperState = PaperSnapshotSchema.parse(saved.state);
      restoreMarketState(this.market, paperState.market);
      for (const actor of paperState.funded) this.funded.add(actor);
    }

    const prices = new GuardedPriceReader(this.market.feed, clock, {
      staleness: {
        [assets.stable.id]: config.staleness.stable,
        [assets.volatile.id]: config.staleness.volatile,
        [assets.share.id]: config.staleness.share,
      },
    });

    this.strategy = new ReserveStrategy({
      assets,
      bank,
      swap: this.market.swap,
      lending: this.market.lending,
      prices,
      clock,
      scope,
      vaultAccount: VAULT_ACCOUNT,
      config: config.reserve,
      journal: this.journal,
      snapshots: this.snapshots,
    });

    this.vault = Vault.restore({
      assets,
      bank,
      prices,
      clock,
      scope,
      strategy: this.strategy,
      account: VAULT_ACCOUNT,
      parameters: config.parameters,
      journal: this.journal,
      snapshots: this.snapshots,
    });

    for (const actor of paper.fundedActors) {
      if (this.funded.has(actor)) continue;
      bank.mint(assets.stable.id, actor, paper.funding);
      this.funded.add(actor);
    }
    this.saveMarket();
  }

  // ─── Views ─────────────────────────────────────────────────────────

  async overview(): Promise<VaultOverview> {
    return this.serialize(async () => ({
      ...(await this.vault.state()),
      collateralRatio: await this.vault.collateralRatio(),
      projectedAnnualDividend: await this.vault.projectedAnnualDividend(),
      hasStrategy: this.vault.hasStrategy,
    }));
  }

  async holder(holder: string): Promise<HolderView> {
    return this.serialize(async () => {
      const shares = this.vault.balanceOf(holder);
      return {
        holder,
        shares,
        assets: await this.vault.convertToAssets(shares),
        maxRedeem: this.vault.maxRedeem(holder),
      };
    });
  }

  async reserve(): Promise<ReserveView> {
    return this.serialize(async () => ({
      valuation: await this.strategy.valuation(),
      config: this.strategy.config,
      circuitBreaker: this.strategy.circuitBreakerStatus(),
    }));
  }

  audit(options: AuditReadOptions): readonly JournalRecord[] {
    const reverse = options.order === "desc";
    if (options.stream !== undefined) {
      const records = this.journal
        .read(options.stream)
        .filter((r) => options.type === undefined || r.event.type === options.type)
        .filter((r) => options.fromPosition === undefined || r.position >= options.fromPosition);
      return (reverse ? [...records].reverse() : records).slice(0, options.limit);
    }
    return this.journal.readAll({
      limit: options.limit,
      reverse,
      ...(options.fromPosition !== undefined ? { fromPosition: options.fromPosition } : {}),
      ...(options.type !== undefined ? { types: [options.type] } : {}),
    });
  }

  get nextEpochAt(): number {
    return this.vault.nextEpochAt;
  }

  isEpochDue(): boolean {
    return this.wallClock.now() >= this.vault.nextEpochAt;
  }

  breakerTripped(): boolean {
    return this.strategy.circuitBreakerStatus().tripped;
  }

  // ─── Holder operations ─────────────────────────────────────────────

  async deposit(assets: bigint, receiver: string, ctx: CallContext): Promise<bigint> {
    return this.mutate(() => this.vault.deposit(assets, receiver, ctx));
  }

  async redeem(shares: bigint, receiver: string, ctx: CallContext): Promise<bigint> {
    return this.mutate(() => this.vault.redeem(shares, receiver, ctx.actor, ctx));
  }

  // ─── Keeper ────────────────────────────────────────────────────────

  async tick(ctx: CallContext): Promise<EpochReport> {
    return this.mutate(() => this.vault.rebalanceYield(ctx));
  }

  // ─── Administration ────────────────────────────────────────────────

  async setPause(mintingPaused: boolean, redeemingPaused: boolean, ctx: CallContext): Promise<void> {
    return this.mutate(() => this.vault.setCircuitBreaker(mintingPaused, redeemingPaused, ctx));
  }

  async setDividendParams(rate: RateParams, ctx: CallContext): Promise<void> {
    return this.mutate(() => this.vault.setDividendParams(rate, ctx));
  }

  async setTargetPrice(targetPrice: bigint, ctx: CallContext): Promise<void> {
    return this.mutate(() => this.vault.setTargetPrice(targetPrice, ctx));
  }

  async setDepositLimits(limits: DepositLimits, ctx: CallContext): Promise<void> {
    return this.mutate(() => this.vault.setDepositLimits(limits, ctx));
  }

  async resetCircuitBreaker(ctx: CallContext): Promise<void> {
    return this.mutate(() => this.strategy.resetCircuitBreaker(ctx));
  }

  async emergencyWithdraw(ctx: CallContext): Promise<bigint> {
    return this.mutate(() => this.strategy.emergencyWithdraw(ctx));
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkJournal(): IntegrityReport {
    return this.journal.verifyIntegrity();
  }

  /** Resolves once every queued call has settled */
  async drain(): Promise<void> {
    await this.tail;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => {
      this.syncMarket();
      return work();
    });
    // The caller sees the failure through `run`; the queue only waits for it
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Serialized call whose committed effects are written back to the market snapshot */
  private mutate<T>(work: () => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      const result = await work();
      this.saveMarket();
      return result;
    });
  }

  private saveMarket(): void {
    this.snapshots.save(MARKET_STREAM, {
      market: encodeMarketState(this.market),
      funded: [...this.funded],
    });
  }

  private syncMarket(): void {
    const now = this.wallClock.now();
    if (now > this.market.clock.now()) {
      this.market.clock.set(now);
    }
    this.market.feed.refresh();
  }
}
