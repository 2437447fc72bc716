/**
 * @pegvault/reserve — Types.
 */

import type { Clock, LendingVenue, SwapVenue, TokenBank, TreasuryAssets } from "@pegvault/types";
import type { AtomicScope } from "@pegvault/guard";
import type { GuardedPriceReader } from "@pegvault/oracle";
import type { EventStore, SnapshotStore } from "@pegvault/event-store";

export interface AllocationSplit {
  readonly volatileBps: bigint;
  readonly cashBps: bigint;
}

export interface CircuitBreakerConfig {
  /** Trip when the price falls by more than this within the window */
  readonly thresholdBps: bigint;
  readonly windowSeconds: number;
}

export interface CircuitBreakerState {
  readonly tripped: boolean;
  /** Zero until the first observation */
  readonly checkpointPrice: bigint;
  readonly checkpointTimestamp: number;
  readonly trippedAt: number | null;
  readonly trippedPrice: bigint | null;
}

export interface ReserveConfig {
  readonly allocation: AllocationSplit;
  readonly maxSlippageBps: bigint;
  readonly swapDeadlineSeconds: number;
  readonly circuitBreaker: CircuitBreakerConfig;
}

export const DEFAULT_RESERVE_CONFIG: ReserveConfig = {
  allocation: { volatileBps: 8_000n, cashBps: 2_000n },
  maxSlippageBps: 100n,
  swapDeadlineSeconds: 300,
  circuitBreaker: { thresholdBps: 2_000n, windowSeconds: 3_600 },
};

export interface ReserveStrategyDeps {
  readonly assets: TreasuryAssets;
  readonly bank: TokenBank;
  readonly swap: SwapVenue;
  readonly lending: LendingVenue;
  readonly prices: GuardedPriceReader;
  readonly clock: Clock;
  readonly scope: AtomicScope;
  /** Where withdrawals and harvests are sent */
  readonly vaultAccount: string;
  /** Account the strategy holds tokens under (default "reserve") */
  readonly account?: string;
  readonly config?: ReserveConfig;
  readonly journal?: EventStore;
  readonly snapshots?: SnapshotStore;
}

export interface ReserveValuation {
  readonly volatileAssetHeld: bigint;
  readonly cashDeployed: bigint;
  /** Live lending balance, including accrued interest */
  readonly cashReserveValue: bigint;
  readonly volatileReserveValue: bigint;
  /** Stable asset sitting uninvested in the strategy account */
  readonly idleValue: bigint;
  readonly totalValue: bigint;
}
