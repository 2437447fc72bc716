/**
 * @pegvault/reserve
 *
 * Volatile and cash reserves behind the vault, with valuation and a
 * price-drop circuit breaker.
 */

export { ReserveStrategy, MAX_SLIPPAGE_BPS } from "./reserve-strategy.js";
export {
  CircuitBreaker,
  INITIAL_BREAKER_STATE,
  validateBreakerConfig,
} from "./circuit-breaker.js";
export type { BreakerObservation, BreakerVerdict } from "./circuit-breaker.js";
export {
  POSITION_STREAM,
  BREAKER_STREAM,
  PositionSnapshotSchema,
  BreakerSnapshotSchema,
  encodePosition,
  decodePosition,
  encodeBreaker,
  decodeBreaker,
} from "./persistence.js";
export type { DecodedPosition } from "./persistence.js";
export { DEFAULT_RESERVE_CONFIG } from "./types.js";
export type {
  AllocationSplit,
  CircuitBreakerConfig,
  CircuitBreakerState,
  ReserveConfig,
  ReserveStrategyDeps,
  ReserveValuation,
} from "./types.js";
