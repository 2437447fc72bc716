/**
 * @pegvault/oracle — Price oracle contract and guarded reads.
 */

export type { PriceOracle } from "./price-oracle.js";
export { MAX_QUOTE_DECIMALS } from "./price-oracle.js";

export type { GuardedPriceReaderOptions } from "./guarded-reader.js";
export { GuardedPriceReader, WAD_DECIMALS, convertAmount } from "./guarded-reader.js";
