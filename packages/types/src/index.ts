/**
 * @pegvault/types — Shared domain types for the treasury stack.
 *
 * - Assets and price quotes
 * - Capability contexts
 * - Error taxonomy
 * - Domain events
 * - Ports to collaborators (clock, token bank, reserve strategy)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Asset types
export type { AssetSpec, TreasuryAssets, AssetRole, PriceQuote } from "./asset.js";

// Capabilities
export type { Capability, CallContext } from "./capability.js";
export {
  CAPABILITIES,
  createContext,
  hasCapability,
  requireCapability,
  isCapability,
} from "./capability.js";

// Errors
export type {
  ErrorKind,
  ErrorDetails,
  ValidationErrorCode,
  StateErrorCode,
  OracleErrorCode,
  ExecutionErrorCode,
  AccessErrorCode,
  TreasuryErrorCode,
} from "./errors.js";
export {
  TreasuryError,
  ValidationError,
  StateError,
  OracleError,
  ExecutionError,
  AccessError,
  isTreasuryError,
  hasErrorCode,
} from "./errors.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Ports
export type {
  Clock,
  TokenBank,
  SwapVenue,
  LendingVenue,
  ReservePosition,
  ReserveStrategyPort,
} from "./ports.js";

// Runtime type guards
export {
  isEventSource,
  isEventMetadata,
  isDomainEvent,
  isAssetSpec,
  isIntegerString,
} from "./guards.js";
