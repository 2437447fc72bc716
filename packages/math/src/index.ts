/**
 * @pegvault/math — Fixed-point arithmetic and the self-tuning rate controller.
 */

export type { Rounding } from "./fixed-point.js";
export {
  BPS,
  PRECISION,
  SECONDS_PER_YEAR,
  pow10,
  mulDiv,
  applyBps,
  bpsOf,
  scaleDecimals,
  minBigInt,
  maxBigInt,
  parseUnits,
  formatUnits,
} from "./fixed-point.js";

export type { RateParams } from "./rate-controller.js";
export {
  MAX_RATE_BPS,
  MAX_SENSITIVITY_BPS,
  COLLATERAL_RATIO_INFINITE,
  validateRateParams,
  deviationBps,
  variableRate,
  epochDividend,
  projectedAnnualDividend,
  collateralRatio,
} from "./rate-controller.js";
