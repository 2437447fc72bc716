/**
 * @pegvault/oracle — Price oracle contract.
 *
 * Pull-based: the treasury asks for a price when it needs one and decides
 * for itself whether the answer is fresh enough. Nothing assumes a feed
 * pushes updates on time.
 */

import type { PriceQuote } from "@pegvault/types";

export interface PriceOracle {
  /**
   * Latest USD price of `assetId`. May return a stale or nonsensical quote;
   * callers go through GuardedPriceReader.
   */
  latestPrice(assetId: string): Promise<PriceQuote>;
}

/** Largest decimal scale a quote may claim */
export const MAX_QUOTE_DECIMALS = 36;
