/**
 * @pegvault/oracle — Guarded price reads.
 *
 * Every price the treasury acts on passes through here.
 *
 * Rules:
 * - A price must be strictly positive; zero or negative is never reinterpreted
 * - A quote older than its asset's staleness bound is rejected
 * - A quote stamped in the future is rejected
 * - Assets without a configured bound are rejected
 */

import { OracleError, ValidationError, isTreasuryError } from "@pegvault/types";
import type { Clock, PriceQuote } from "@pegvault/types";
import { mulDiv, pow10, scaleDecimals, type Rounding } from "@pegvault/math";
import { MAX_QUOTE_DECIMALS, type PriceOracle } from "./price-oracle.js";

export const WAD_DECIMALS = 18;

export interface GuardedPriceReaderOptions {
  /** Maximum quote age in seconds, per asset id */
  readonly staleness: Readonly<Record<string, number>>;
}

export class GuardedPriceReader {
  private readonly oracle: PriceOracle;
  private readonly clock: Clock;
  private readonly staleness = new Map<string, number>();

  constructor(oracle: PriceOracle, clock: Clock, options: GuardedPriceReaderOptions) {
    this.oracle = oracle;
    this.clock = clock;
    for (const [assetId, seconds] of Object.entries(options.staleness)) {
      this.setStaleness(assetId, seconds);
    }
  }

  setStaleness(assetId: string, seconds: number): void {
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new ValidationError(
        "InvalidParameter",
        `Staleness bound for ${assetId} must be a positive integer of seconds`,
        { assetId, seconds },
      );
    }
    this.staleness.set(assetId, seconds);
  }

  stalenessOf(assetId: string): number | undefined {
    return this.staleness.get(assetId);
  }

  /**
   * Read and validate the latest quote for `assetId`.
   */
  async read(assetId: string): Promise<PriceQuote> {
    const maxAge = this.staleness.get(assetId);
    if (maxAge === undefined) {
      throw new OracleError("UnknownAsset", `No price feed configured for ${assetId}`, { assetId });
    }

    let quote: PriceQuote;
    try {
      quote = await this.oracle.latestPrice(assetId);
    } catch (err) {
      if (isTreasuryError(err)) throw err;
      throw new OracleError(
        "OracleUnavailable",
        `Price oracle failed for ${assetId}: ${err instanceof Error ? err.message : String(err)}`,
        { assetId },
      );
    }

    if (quote.price <= 0n) {
      throw new OracleError("InvalidPrice", `Non-positive price for ${assetId}`, {
        assetId,
        price: quote.price.toString(),
      });
    }
    if (!Number.isInteger(quote.decimals) || quote.decimals < 0 || quote.decimals > MAX_QUOTE_DECIMALS) {
      throw new OracleError("InvalidPrice", `Invalid price decimals for ${assetId}`, {
        assetId,
        decimals: quote.decimals,
      });
    }

    const now = this.clock.now();
    if (quote.updatedAt > now) {
      throw new OracleError("InvalidPrice", `Price for ${assetId} is stamped in the future`, {
        assetId,
        updatedAt: quote.updatedAt,
        now,
      });
    }
    const age = now - quote.updatedAt;
    if (age > maxAge) {
      throw new OracleError("StalePrice", `Price for ${assetId} is stale`, {
        assetId,
        ageSec: age,
        maxAgeSec: maxAge,
      });
    }

    return quote;
  }

  /** Validated price re-expressed with `decimals` decimal places */
  async readIn(assetId: string, decimals: number, rounding: Rounding = "down"): Promise<bigint> {
    const quote = await this.read(assetId);
    return scaleDecimals(quote.price, quote.decimals, decimals, rounding);
  }

  /** Validated price scaled to 18 decimals */
  async readWad(assetId: string): Promise<bigint> {
    return this.readIn(assetId, WAD_DECIMALS);
  }
}

/**
 * Convert `amount` of one asset into another through their USD prices.
 *
 * Both prices must share a scale (e.g. both from readWad).
 */
export function convertAmount(
  amount: bigint,
  fromDecimals: number,
  fromPrice: bigint,
  toDecimals: number,
  toPrice: bigint,
  rounding: Rounding = "down",
): bigint {
  if (fromPrice <= 0n || toPrice <= 0n) {
    throw new OracleError("InvalidPrice", "convertAmount requires positive prices");
  }
  return mulDiv(
    amount * fromPrice,
    pow10(toDecimals),
    toPrice * pow10(fromDecimals),
    rounding,
  );
}
