/**
 * @pegvault/math — Fixed-point integer arithmetic.
 *
 * Every amount is a bigint in its asset's smallest unit. Rates are basis
 * points, ratios are scaled by PRECISION (1e18).
 *
 * Rules:
 * - No floating-point operations
 * - Rounding direction is always explicit; the default is toward zero
 * - Negative operands are rejected, never reinterpreted
 */

import { ValidationError } from "@pegvault/types";

export type Rounding = "down" | "up";

/** 100% in basis points */
export const BPS = 10_000n;

/** Scale of fixed-point ratios */
export const PRECISION = 10n ** 18n;

/** 365 days */
export const SECONDS_PER_YEAR = 31_536_000n;

export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new ValidationError("InvalidParameter", `Invalid decimal exponent: ${String(exponent)}`);
  }
  return 10n ** BigInt(exponent);
}

/**
 * `a * b / denominator` with full intermediate precision.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = "down",
): bigint {
  if (denominator === 0n) {
    throw new ValidationError("InvalidParameter", "mulDiv: division by zero");
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new ValidationError("InvalidParameter", "mulDiv: operands must be non-negative", {
      a: a.toString(),
      b: b.toString(),
      denominator: denominator.toString(),
    });
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "up" && product % denominator !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

/** `amount * bps / 10000`, rounded down unless told otherwise */
export function applyBps(amount: bigint, bps: bigint, rounding: Rounding = "down"): bigint {
  return mulDiv(amount, bps, BPS, rounding);
}

/** Share of `part` in `whole`, in basis points. Zero when `whole` is zero. */
export function bpsOf(part: bigint, whole: bigint): bigint {
  if (whole === 0n) return 0n;
  return mulDiv(part, BPS, whole);
}

/**
 * Re-express `value` from `fromDecimals` to `toDecimals`.
 * Narrowing the scale truncates unless rounding is "up".
 */
export function scaleDecimals(
  value: bigint,
  fromDecimals: number,
  toDecimals: number,
  rounding: Rounding = "down",
): bigint {
  if (toDecimals >= fromDecimals) {
    return value * pow10(toDecimals - fromDecimals);
  }
  return mulDiv(value, 1n, pow10(fromDecimals - toDecimals), rounding);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ─── Decimal strings ─────────────────────────────────────────────────────

const UNSIGNED_DECIMAL = /^\d+(\.\d+)?$/;

/**
 * Parse a non-negative decimal string into smallest units.
 *
 * "100.5" with decimals=6 → 100500000n
 */
export function parseUnits(value: string, decimals: number): bigint {
  const trimmed = value.trim();
  if (!UNSIGNED_DECIMAL.test(trimmed)) {
    throw new ValidationError("InvalidParameter", `Invalid decimal amount: "${value}"`);
  }

  const [whole = "0", fraction = ""] = trimmed.split(".");
  if (fraction.length > decimals) {
    throw new ValidationError(
      "InvalidParameter",
      `Amount "${trimmed}" has ${String(fraction.length)} decimal places, at most ${String(decimals)} allowed`,
    );
  }

  return BigInt(whole) * pow10(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
}

/**
 * Render smallest units as a decimal string with trailing zeros removed.
 *
 * 100500000n with decimals=6 → "100.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const unit = pow10(decimals);
  const whole = (abs / unit).toString();
  const fraction = decimals === 0 ? "" : (abs % unit).toString().padStart(decimals, "0").replace(/0+$/, "");
  const body = fraction.length > 0 ? `${whole}.${fraction}` : whole;
  return negative ? `-${body}` : body;
}
