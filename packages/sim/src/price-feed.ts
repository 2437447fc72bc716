/**
 * @pegvault/sim — Settable price feed.
 */

import type { Clock, PriceQuote } from "@pegvault/types";
import type { PriceOracle } from "@pegvault/oracle";

export class StaticPriceFeed implements PriceOracle {
  private readonly clock: Clock;
  private readonly quotes = new Map<string, PriceQuote>();
  reads = 0;

  constructor(clock: Clock) {
    this.clock = clock;
  }

  /** Publish a price stamped now unless `updatedAt` is given */
  setPrice(assetId: string, price: bigint, decimals: number, updatedAt?: number): void {
    this.quotes.set(assetId, { price, decimals, updatedAt: updatedAt ?? this.clock.now() });
  }

  /** Re-stamp every quote with the current time */
  refresh(): void {
    for (const [assetId, quote] of this.quotes) {
      this.quotes.set(assetId, { ...quote, updatedAt: this.clock.now() });
    }
  }

  quote(assetId: string): PriceQuote | undefined {
    return this.quotes.get(assetId);
  }

  async latestPrice(assetId: string): Promise<PriceQuote> {
    this.reads++;
    const quote = this.quotes.get(assetId);
    if (quote === undefined) {
      throw new Error(`No price published for ${assetId}`);
    }
    return quote;
  }
}
