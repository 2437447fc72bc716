/**
 * Error Taxonomy
 *
 * Every rejection carries a kind and a specific code so monitoring can tell
 * "retry after waiting" (EpochNotElapsed) apart from "page a human"
 * (CircuitBreakerActive).
 *
 * Rules:
 * - ValidationError and StateError are thrown before any mutation
 * - OracleError and ExecutionError abort the whole operation; callers roll back
 * - AccessError is a failed capability precondition
 * - Nothing here is fatal to the process; every failure is scoped to one call
 */

export type ErrorKind = "validation" | "state" | "oracle" | "execution" | "access";

export type ValidationErrorCode =
  | "ZeroAmount"
  | "ZeroShares"
  | "ZeroAssets"
  | "DepositTooSmall"
  | "DepositTooLarge"
  | "DepositCapExceeded"
  | "InsufficientShares"
  | "InvalidParameter"
  | "InvalidRecipient";

export type StateErrorCode =
  | "EpochNotElapsed"
  | "MintingPaused"
  | "RedeemingPaused"
  | "CircuitBreakerActive"
  | "CircuitBreakerTripped"
  | "InsufficientReserve"
  | "ReentrantCall"
  | "StrategyNotSet";

export type OracleErrorCode = "StalePrice" | "InvalidPrice" | "UnknownAsset" | "OracleUnavailable";

export type ExecutionErrorCode =
  | "SlippageExceeded"
  | "DeadlineExpired"
  | "VenueCallFailed"
  | "MalformedVenueResponse"
  | "InsufficientLiquidity";

export type AccessErrorCode = "Unauthorized" | "NotShareOwner";

export type TreasuryErrorCode =
  | ValidationErrorCode
  | StateErrorCode
  | OracleErrorCode
  | ExecutionErrorCode
  | AccessErrorCode;

export type ErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Base class of every domain error thrown by the treasury packages.
 */
export class TreasuryError extends Error {
  readonly kind: ErrorKind;
  readonly code: TreasuryErrorCode;
  readonly details: ErrorDetails | undefined;

  constructor(kind: ErrorKind, code: TreasuryErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "TreasuryError";
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends TreasuryError {
  declare readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string, details?: ErrorDetails) {
    super("validation", code, message, details);
    this.name = "ValidationError";
  }
}

export class StateError extends TreasuryError {
  declare readonly code: StateErrorCode;

  constructor(code: StateErrorCode, message: string, details?: ErrorDetails) {
    super("state", code, message, details);
    this.name = "StateError";
  }
}

export class OracleError extends TreasuryError {
  declare readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string, details?: ErrorDetails) {
    super("oracle", code, message, details);
    this.name = "OracleError";
  }
}

export class ExecutionError extends TreasuryError {
  declare readonly code: ExecutionErrorCode;

  constructor(code: ExecutionErrorCode, message: string, details?: ErrorDetails) {
    super("execution", code, message, details);
    this.name = "ExecutionError";
  }
}

export class AccessError extends TreasuryError {
  declare readonly code: AccessErrorCode;

  constructor(code: AccessErrorCode, message: string, details?: ErrorDetails) {
    super("access", code, message, details);
    this.name = "AccessError";
  }
}

export function isTreasuryError(err: unknown): err is TreasuryError {
  return err instanceof TreasuryError;
}

/**
 * True when `err` is a TreasuryError with the given code.
 */
export function hasErrorCode(err: unknown, code: TreasuryErrorCode): err is TreasuryError {
  return err instanceof TreasuryError && err.code === code;
}
