/**
 * @pegvault/math — Self-tuning rate controller.
 *
 * Pure functions converting a price-deviation signal into a bounded
 * dividend rate. No state, no I/O.
 *
 * Rules:
 * - Rates and sensitivity are basis points
 * - The result is always clamped into [minRate, maxRate]
 * - At market == target the result is exactly baseRate
 * - Dividends truncate toward zero (small systematic under-distribution)
 */

import { ValidationError } from "@pegvault/types";
import { BPS, PRECISION, SECONDS_PER_YEAR, mulDiv } from "./fixed-point.js";

/** Highest rate any parameter set may configure (100% APR) */
export const MAX_RATE_BPS = BPS;

/** Highest accepted sensitivity */
export const MAX_SENSITIVITY_BPS = BPS;

/** Returned by collateralRatio when there are no liabilities */
export const COLLATERAL_RATIO_INFINITE = 2n ** 256n - 1n;

export interface RateParams {
  readonly baseRate: bigint;
  readonly sensitivity: bigint;
  readonly minRate: bigint;
  readonly maxRate: bigint;
}

/**
 * Throws ValidationError("InvalidParameter") unless
 * 0 ≤ minRate ≤ baseRate ≤ maxRate ≤ MAX_RATE_BPS and sensitivity is in range.
 */
export function validateRateParams(params: RateParams): void {
  const { baseRate, sensitivity, minRate, maxRate } = params;
  const details = {
    baseRate: baseRate.toString(),
    sensitivity: sensitivity.toString(),
    minRate: minRate.toString(),
    maxRate: maxRate.toString(),
  };

  if (minRate < 0n || sensitivity < 0n) {
    throw new ValidationError("InvalidParameter", "Rate parameters must be non-negative", details);
  }
  if (!(minRate <= baseRate && baseRate <= maxRate)) {
    throw new ValidationError(
      "InvalidParameter",
      "Rate parameters must satisfy minRate <= baseRate <= maxRate",
      details,
    );
  }
  if (maxRate > MAX_RATE_BPS) {
    throw new ValidationError("InvalidParameter", `maxRate exceeds ${MAX_RATE_BPS.toString()} bps`, details);
  }
  if (sensitivity > MAX_SENSITIVITY_BPS) {
    throw new ValidationError(
      "InvalidParameter",
      `sensitivity exceeds ${MAX_SENSITIVITY_BPS.toString()} bps`,
      details,
    );
  }
}

/**
 * |target − market| / target in basis points (truncated).
 */
export function deviationBps(targetPrice: bigint, marketPrice: bigint): bigint {
  assertPrices(targetPrice, marketPrice);
  const diff = marketPrice > targetPrice ? marketPrice - targetPrice : targetPrice - marketPrice;
  return mulDiv(diff, BPS, targetPrice);
}

/**
 * Variable dividend rate for the next epoch.
 *
 * Below target the rate rises by `sensitivity × deviation` to pull buyers in;
 * above target it falls by the same amount, bottoming out at `minRate`.
 * Both prices must be on the same decimal scale.
 */
export function variableRate(
  targetPrice: bigint,
  marketPrice: bigint,
  baseRate: bigint,
  sensitivity: bigint,
  minRate: bigint,
  maxRate: bigint,
): bigint {
  assertPrices(targetPrice, marketPrice);
  if (baseRate < 0n || sensitivity < 0n || minRate < 0n || maxRate < 0n) {
    throw new ValidationError("InvalidParameter", "Rate parameters must be non-negative");
  }

  // Deviation is truncated to whole bps before sensitivity is applied
  const adjustment = mulDiv(sensitivity, deviationBps(targetPrice, marketPrice), BPS);

  let rate: bigint;
  if (marketPrice <= targetPrice) {
    rate = baseRate + adjustment;
    if (rate > maxRate) rate = maxRate;
  } else {
    rate = adjustment < baseRate ? baseRate - adjustment : minRate;
  }

  // Misconfigured bounds (base outside [min, max]) still never escape them.
  if (rate < minRate) rate = minRate;
  if (rate > maxRate) rate = maxRate;
  return rate;
}

/**
 * Dividend owed for one epoch: totalAssets × rate × duration / (BPS × year).
 * Truncates toward zero.
 */
export function epochDividend(totalAssets: bigint, rate: bigint, epochDuration: bigint): bigint {
  if (totalAssets < 0n || rate < 0n || epochDuration < 0n) {
    throw new ValidationError("InvalidParameter", "epochDividend inputs must be non-negative");
  }
  return (totalAssets * rate * epochDuration) / (BPS * SECONDS_PER_YEAR);
}

/**
 * Dividend a full year at `rate` would pay on `totalAssets`.
 */
export function projectedAnnualDividend(totalAssets: bigint, rate: bigint): bigint {
  return mulDiv(totalAssets, rate, BPS);
}

/**
 * (reserve + cash) / liabilities scaled by PRECISION.
 */
export function collateralRatio(
  reserveValue: bigint,
  cashValue: bigint,
  totalLiabilities: bigint,
): bigint {
  if (totalLiabilities === 0n) return COLLATERAL_RATIO_INFINITE;
  return mulDiv(reserveValue + cashValue, PRECISION, totalLiabilities);
}

function assertPrices(targetPrice: bigint, marketPrice: bigint): void {
  if (targetPrice <= 0n) {
    throw new ValidationError("InvalidParameter", "targetPrice must be positive", {
      targetPrice: targetPrice.toString(),
    });
  }
  if (marketPrice < 0n) {
    throw new ValidationError("InvalidParameter", "marketPrice must be non-negative", {
      marketPrice: marketPrice.toString(),
    });
  }
}
