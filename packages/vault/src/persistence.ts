/**
 * Vault snapshot encoding.
 *
 * The full vault state (ledger included) is one snapshot on the "vault"
 * stream, saved after every committed mutation. Bigints are decimal strings.
 */

import { z } from "zod";
import { EPOCH_PHASES, type EpochPhase } from "./epoch-engine.js";
import type { VaultAccounting } from "./types.js";

export const VAULT_STREAM = "vault";

const amount = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer string")
  .transform((value) => BigInt(value));

const phase = z.custom<EpochPhase>(
  (value) => typeof value === "string" && EPOCH_PHASES.some((p) => p === value),
  "unknown epoch phase",
);

export const VaultSnapshotSchema = z
  .object({
    holders: z.record(z.string().min(1), amount),
    totalShares: amount,
    outstandingPrincipal: amount,
    parameters: z.object({
      baseRate: amount,
      sensitivity: amount,
      minRate: amount,
      maxRate: amount,
      targetPrice: amount,
      epochDuration: z.number().int().positive(),
      minDeposit: amount,
      maxSingleDeposit: amount,
      maxTotalDeposits: amount,
    }),
    currentRate: amount,
    lastEpochTimestamp: z.number().int().nonnegative(),
    epochCount: z.number().int().nonnegative(),
    accumulatedYieldPerShare: amount,
    lastAssetsPerShare: amount,
    totalDividendsDistributed: amount,
    mintingPaused: z.boolean(),
    redeemingPaused: z.boolean(),
    phase,
  })
  .refine(
    (snapshot) => Object.values(snapshot.holders).reduce((sum, shares) => sum + shares, 0n) === snapshot.totalShares,
    { message: "holder balances do not sum to totalShares", path: ["totalShares"] },
  );

export interface DecodedVault {
  readonly holders: Readonly<Record<string, bigint>>;
  readonly accounting: VaultAccounting;
}

export function encodeVault(
  holders: readonly (readonly [string, bigint])[],
  totalShares: bigint,
  accounting: VaultAccounting,
): Record<string, unknown> {
  const { parameters: p } = accounting;
  return {
    holders: Object.fromEntries(holders.map(([holder, shares]) => [holder, shares.toString()])),
    totalShares: totalShares.toString(),
    outstandingPrincipal: accounting.outstandingPrincipal.toString(),
    parameters: {
      baseRate: p.rate.baseRate.toString(),
      sensitivity: p.rate.sensitivity.toString(),
      minRate: p.rate.minRate.toString(),
      maxRate: p.rate.maxRate.toString(),
      targetPrice: p.targetPrice.toString(),
      epochDuration: p.epochDuration,
      minDeposit: p.limits.minDeposit.toString(),
      maxSingleDeposit: p.limits.maxSingleDeposit.toString(),
      maxTotalDeposits: p.limits.maxTotalDeposits.toString(),
    },
    currentRate: accounting.currentRate.toString(),
    lastEpochTimestamp: accounting.lastEpochTimestamp,
    epochCount: accounting.epochCount,
    accumulatedYieldPerShare: accounting.accumulatedYieldPerShare.toString(),
    lastAssetsPerShare: accounting.lastAssetsPerShare.toString(),
    totalDividendsDistributed: accounting.totalDividendsDistributed.toString(),
    mintingPaused: accounting.mintingPaused,
    redeemingPaused: accounting.redeemingPaused,
    phase: accounting.phase,
  };
}

export function decodeVault(state: unknown): DecodedVault {
  const s = VaultSnapshotSchema.parse(state);
  return {
    holders: s.holders,
    accounting: {
      parameters: {
        rate: {
          baseRate: s.parameters.baseRate,
          sensitivity: s.parameters.sensitivity,
          minRate: s.parameters.minRate,
          maxRate: s.parameters.maxRate,
        },
        targetPrice: s.parameters.targetPrice,
        epochDuration: s.parameters.epochDuration,
        limits: {
          minDeposit: s.parameters.minDeposit,
          maxSingleDeposit: s.parameters.maxSingleDeposit,
          maxTotalDeposits: s.parameters.maxTotalDeposits,
        },
      },
      outstandingPrincipal: s.outstandingPrincipal,
      currentRate: s.currentRate,
      lastEpochTimestamp: s.lastEpochTimestamp,
      epochCount: s.epochCount,
      accumulatedYieldPerShare: s.accumulatedYieldPerShare,
      lastAssetsPerShare: s.lastAssetsPerShare,
      totalDividendsDistributed: s.totalDividendsDistributed,
      mintingPaused: s.mintingPaused,
      redeemingPaused: s.redeemingPaused,
      phase: s.phase,
    },
  };
}
