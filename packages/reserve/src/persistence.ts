/**
 * @pegvault/reserve — Snapshot encoding.
 *
 * Position and breaker state live in separate snapshot streams: the
 * position is saved when an operation commits, the breaker the moment it
 * changes, so a trip survives the rollback of the operation it rejected.
 */

import { z } from "zod";
import type { ReservePosition } from "@pegvault/types";
import type { CircuitBreakerState, ReserveConfig } from "./types.js";

export const POSITION_STREAM = "reserve";
export const BREAKER_STREAM = "circuit-breaker";

const amount = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer string")
  .transform((value) => BigInt(value));

export const PositionSnapshotSchema = z.object({
  volatileAssetHeld: amount,
  cashDeployed: amount,
  config: z.object({
    volatileBps: amount,
    cashBps: amount,
    maxSlippageBps: amount,
    swapDeadlineSeconds: z.number().int().positive(),
    breakerThresholdBps: amount,
    breakerWindowSeconds: z.number().int().positive(),
  }),
});

export const BreakerSnapshotSchema = z.object({
  tripped: z.boolean(),
  checkpointPrice: amount,
  checkpointTimestamp: z.number().int().nonnegative(),
  trippedAt: z.number().int().nullable(),
  trippedPrice: amount.nullable(),
});

export interface DecodedPosition {
  readonly position: ReservePosition;
  readonly config: ReserveConfig;
}

export function encodePosition(position: ReservePosition, config: ReserveConfig): Record<string, unknown> {
  return {
    volatileAssetHeld: position.volatileAssetHeld.toString(),
    cashDeployed: position.cashDeployed.toString(),
    config: {
      volatileBps: config.allocation.volatileBps.toString(),
      cashBps: config.allocation.cashBps.toString(),
      maxSlippageBps: config.maxSlippageBps.toString(),
      swapDeadlineSeconds: config.swapDeadlineSeconds,
      breakerThresholdBps: config.circuitBreaker.thresholdBps.toString(),
      breakerWindowSeconds: config.circuitBreaker.windowSeconds,
    },
  };
}

export function decodePosition(state: unknown): DecodedPosition {
  const parsed = PositionSnapshotSchema.parse(state);
  return {
    position: {
      volatileAssetHeld: parsed.volatileAssetHeld,
      cashDeployed: parsed.cashDeployed,
    },
    config: {
      allocation: { volatileBps: parsed.config.volatileBps, cashBps: parsed.config.cashBps },
      maxSlippageBps: parsed.config.maxSlippageBps,
      swapDeadlineSeconds: parsed.config.swapDeadlineSeconds,
      circuitBreaker: {
        thresholdBps: parsed.config.breakerThresholdBps,
        windowSeconds: parsed.config.breakerWindowSeconds,
      },
    },
  };
}

export function encodeBreaker(state: CircuitBreakerState): Record<string, unknown> {
  return {
    tripped: state.tripped,
    checkpointPrice: state.checkpointPrice.toString(),
    checkpointTimestamp: state.checkpointTimestamp,
    trippedAt: state.trippedAt,
    trippedPrice: state.trippedPrice === null ? null : state.trippedPrice.toString(),
  };
}

export function decodeBreaker(state: unknown): CircuitBreakerState {
  return BreakerSnapshotSchema.parse(state);
}
