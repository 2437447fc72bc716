/**
 * Vault Types
 *
 * Parameters, limits and read models of the share vault.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in the stable asset's smallest unit
 * - Prices are bigint with PRICE_DECIMALS decimal places
 * - Rates are basis points
 */

import type { Clock, ReserveStrategyPort, TokenBank, TreasuryAssets } from "@pegvault/types";
import type { RateParams } from "@pegvault/math";
import type { AtomicScope } from "@pegvault/guard";
import type { GuardedPriceReader } from "@pegvault/oracle";
import type { EventStore, SnapshotStore } from "@pegvault/event-store";
import type { EpochPhase } from "./epoch-engine.js";

/** Scale of targetPrice and the share's market price ($100 = 100_000_000) */
export const PRICE_DECIMALS = 6;

// =============================================================================
// Parameters
// =============================================================================

export interface DepositLimits {
  readonly minDeposit: bigint;
  readonly maxSingleDeposit: bigint;
  readonly maxTotalDeposits: bigint;
}

export interface VaultParameters {
  readonly rate: RateParams;
  readonly targetPrice: bigint;
  /** Seconds between epoch ticks */
  readonly epochDuration: number;
  readonly limits: DepositLimits;
}

export const DEFAULT_VAULT_PARAMETERS: VaultParameters = {
  rate: { baseRate: 800n, sensitivity: 2_000n, minRate: 100n, maxRate: 2_500n },
  targetPrice: 100_000_000n,
  epochDuration: 7 * 24 * 60 * 60,
  limits: {
    minDeposit: 1_000_000n,
    maxSingleDeposit: 1_000_000_000_000n,
    maxTotalDeposits: 100_000_000_000_000n,
  },
};

/** Longest configurable epoch (one year) */
export const MAX_EPOCH_DURATION = 365 * 24 * 60 * 60;

// =============================================================================
// Wiring
// =============================================================================

export interface VaultDeps {
  readonly assets: TreasuryAssets;
  readonly bank: TokenBank;
  readonly prices: GuardedPriceReader;
  readonly clock: Clock;
  readonly scope: AtomicScope;
  /** May be attached later by an administrator; deposits stay idle until then */
  readonly strategy?: ReserveStrategyPort;
  /** Account holding the vault's idle stable balance (default "vault") */
  readonly account?: string;
  readonly parameters?: VaultParameters;
  readonly journal?: EventStore;
  readonly snapshots?: SnapshotStore;
}

// =============================================================================
// Mutable state
// =============================================================================

/**
 * Everything the vault owns apart from the share ledger.
 */
export interface VaultAccounting {
  readonly parameters: VaultParameters;
  /** Deposited principal still outstanding, reduced pro rata on exit */
  readonly outstandingPrincipal: bigint;
  readonly currentRate: bigint;
  readonly lastEpochTimestamp: number;
  readonly epochCount: number;
  /** Sum of realized per-share growth between epochs (PRECISION-scaled) */
  readonly accumulatedYieldPerShare: bigint;
  /** assetsPerShare right after the previous epoch's rebalance */
  readonly lastAssetsPerShare: bigint;
  readonly totalDividendsDistributed: bigint;
  readonly mintingPaused: boolean;
  readonly redeemingPaused: boolean;
  readonly phase: EpochPhase;
}

// =============================================================================
// Read models
// =============================================================================

export interface VaultSummary extends VaultAccounting {
  readonly totalShares: bigint;
  readonly holderCount: number;
  readonly idleAssets: bigint;
  readonly totalAssets: bigint;
  readonly assetsPerShare: bigint;
  readonly nextEpochAt: number;
}

export interface EpochReport {
  readonly epoch: number;
  readonly marketPrice: bigint;
  readonly targetPrice: bigint;
  readonly rate: bigint;
  readonly dividendTarget: bigint;
  readonly harvested: bigint;
  readonly distributed: bigint;
  readonly deployed: bigint;
  readonly yieldPerShareDelta: bigint;
}
