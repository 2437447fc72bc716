/**
 * Epoch Engine
 *
 * The pure half of the epoch tick: phase transitions and the plan the vault
 * carries out. Executing the plan (harvest, liquidate, deploy) lives in the
 * Vault because it moves capital.
 *
 * Phases:
 *   idle → computing → rebalancing → settled
 *   settled → computing (next tick)
 *
 * A settled vault whose next epoch is due reads as idle.
 */

import { deviationBps, epochDividend, variableRate, type RateParams } from "@pegvault/math";

export type EpochPhase = "idle" | "computing" | "rebalancing" | "settled";

const PHASE_TRANSITIONS: Readonly<Record<EpochPhase, readonly EpochPhase[]>> = {
  idle: ["computing"],
  computing: ["rebalancing"],
  rebalancing: ["settled"],
  settled: ["computing"],
};

export const EPOCH_PHASES: readonly EpochPhase[] = ["idle", "computing", "rebalancing", "settled"];

/**
 * Move to `to`, or throw if the engine does not allow that step.
 */
export function transition(from: EpochPhase, to: EpochPhase): EpochPhase {
  if (!PHASE_TRANSITIONS[from].includes(to)) {
    throw new Error(`Invalid epoch phase transition: ${from} → ${to}`);
  }
  return to;
}

/** Phase as observed at `now` */
export function observedPhase(stored: EpochPhase, now: number, nextEpochAt: number): EpochPhase {
  return stored === "settled" && now >= nextEpochAt ? "idle" : stored;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * - raise-liquidity: below target with a dividend to fund; move it to idle
 * - accumulate: above target; deploy idle into the volatile asset
 * - hold: at target (or nothing to pay); harvest only
 */
export type EpochAction = "raise-liquidity" | "accumulate" | "hold";

export interface EpochInput {
  readonly targetPrice: bigint;
  readonly marketPrice: bigint;
  readonly rate: RateParams;
  readonly totalAssets: bigint;
  readonly epochDuration: number;
}

export interface EpochPlan {
  readonly rate: bigint;
  readonly deviationBps: bigint;
  readonly dividend: bigint;
  readonly action: EpochAction;
}

export function planEpoch(input: EpochInput): EpochPlan {
  const { targetPrice, marketPrice, rate: params } = input;
  const rate = variableRate(
    targetPrice,
    marketPrice,
    params.baseRate,
    params.sensitivity,
    params.minRate,
    params.maxRate,
  );
  const dividend = epochDividend(input.totalAssets, rate, BigInt(input.epochDuration));

  let action: EpochAction = "hold";
  if (marketPrice < targetPrice && dividend > 0n) action = "raise-liquidity";
  else if (marketPrice > targetPrice) action = "accumulate";

  return { rate, deviationBps: deviationBps(targetPrice, marketPrice), dividend, action };
}
