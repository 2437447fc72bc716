/**
 * @pegvault/reserve — Circuit breaker.
 *
 * Compares each observed volatile-asset price with a checkpoint. A drop
 * larger than the threshold inside the window latches the breaker; only an
 * explicit reset (after a human has looked at it) clears it, even if the
 * price has already recovered.
 *
 * Rules:
 * - The first observation sets the checkpoint
 * - Once the window has passed, the next observation becomes the checkpoint
 * - Rises inside the window leave the checkpoint alone
 * - While tripped, observations change nothing
 */

import { ValidationError } from "@pegvault/types";
import { BPS, mulDiv } from "@pegvault/math";
import type { CircuitBreakerConfig, CircuitBreakerState } from "./types.js";

export type BreakerVerdict = "ok" | "tripped" | "active";

export interface BreakerObservation {
  readonly verdict: BreakerVerdict;
  /** Drop from the checkpoint in bps (0 when the price rose) */
  readonly dropBps: bigint;
  /** Whether the stored state changed */
  readonly changed: boolean;
}

export const INITIAL_BREAKER_STATE: CircuitBreakerState = {
  tripped: false,
  checkpointPrice: 0n,
  checkpointTimestamp: 0,
  trippedAt: null,
  trippedPrice: null,
};

export function validateBreakerConfig(config: CircuitBreakerConfig): void {
  if (config.thresholdBps <= 0n || config.thresholdBps > BPS) {
    throw new ValidationError("InvalidParameter", "Breaker threshold must be within (0, 10000] bps", {
      thresholdBps: config.thresholdBps.toString(),
    });
  }
  if (!Number.isInteger(config.windowSeconds) || config.windowSeconds <= 0) {
    throw new ValidationError("InvalidParameter", "Breaker window must be a positive number of seconds", {
      windowSeconds: config.windowSeconds,
    });
  }
}

export class CircuitBreaker {
  private current: CircuitBreakerState;
  private settings: CircuitBreakerConfig;

  constructor(config: CircuitBreakerConfig, state: CircuitBreakerState = INITIAL_BREAKER_STATE) {
    validateBreakerConfig(config);
    this.settings = config;
    this.current = state;
  }

  get state(): CircuitBreakerState {
    return this.current;
  }

  get config(): CircuitBreakerConfig {
    return this.settings;
  }

  get tripped(): boolean {
    return this.current.tripped;
  }

  configure(config: CircuitBreakerConfig): void {
    validateBreakerConfig(config);
    this.settings = config;
  }

  observe(price: bigint, now: number): BreakerObservation {
    const state = this.current;
    if (state.tripped) {
      return { verdict: "active", dropBps: 0n, changed: false };
    }

    if (state.checkpointPrice === 0n || now - state.checkpointTimestamp > this.settings.windowSeconds) {
      this.current = { ...state, checkpointPrice: price, checkpointTimestamp: now };
      return { verdict: "ok", dropBps: 0n, changed: true };
    }

    const dropBps =
      price < state.checkpointPrice
        ? mulDiv(state.checkpointPrice - price, BPS, state.checkpointPrice)
        : 0n;

    if (dropBps > this.settings.thresholdBps) {
      this.current = { ...state, tripped: true, trippedAt: now, trippedPrice: price };
      return { verdict: "tripped", dropBps, changed: true };
    }
    return { verdict: "ok", dropBps, changed: false };
  }

  /** Clear the latch and start a fresh window at `price` */
  reset(price: bigint, now: number): void {
    this.current = {
      tripped: false,
      checkpointPrice: price,
      checkpointTimestamp: now,
      trippedAt: null,
      trippedPrice: null,
    };
  }
}
