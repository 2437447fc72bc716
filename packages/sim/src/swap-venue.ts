/**
 * @pegvault/sim — Oracle-priced swap venue.
 *
 * Fills at the feed price less a fee. Behaviour knobs let tests play a
 * venue that fills badly, ignores limits or misreports its results.
 */

import { ExecutionError, type Clock, type SwapVenue } from "@pegvault/types";
import { BPS, mulDiv, scaleDecimals } from "@pegvault/math";
import { convertAmount, type PriceOracle } from "@pegvault/oracle";
import type { InMemoryTokenBank } from "./token-bank.js";

export interface SwapBehavior {
  /** Execution shortfall on top of the fee, bps */
  readonly priceImpactBps?: bigint;
  /** Settle even when the caller's limit is violated */
  readonly ignoreLimits?: boolean;
  /** Report a result this many bps better for the caller than what settled */
  readonly misreportBps?: bigint;
}

export interface SimulatedSwapVenueOptions {
  readonly bank: InMemoryTokenBank;
  readonly feed: PriceOracle;
  readonly clock: Clock;
  /** Decimals per asset id */
  readonly decimals: Readonly<Record<string, number>>;
  readonly account?: string;
  readonly feeBps?: bigint;
}

export class SimulatedSwapVenue implements SwapVenue {
  readonly account: string;
  behavior: SwapBehavior = {};
  /** Runs after limits are checked and before settlement */
  onSwap: (() => Promise<void>) | undefined;
  swapCount = 0;

  private readonly bank: InMemoryTokenBank;
  private readonly feed: PriceOracle;
  private readonly clock: Clock;
  private readonly decimals: Readonly<Record<string, number>>;
  private readonly feeBps: bigint;

  constructor(options: SimulatedSwapVenueOptions) {
    this.bank = options.bank;
    this.feed = options.feed;
    this.clock = options.clock;
    this.decimals = options.decimals;
    this.account = options.account ?? "dex";
    this.feeBps = options.feeBps ?? 0n;
  }

  async swapExactInput(
    assetIn: string,
    assetOut: string,
    amountIn: bigint,
    minAmountOut: bigint,
    deadline: number,
    account: string,
  ): Promise<bigint> {
    this.checkDeadline(deadline);
    if (amountIn <= 0n) {
      throw new ExecutionError("VenueCallFailed", "swapExactInput: amountIn must be positive");
    }

    const atPrice = await this.convert(assetIn, assetOut, amountIn, "down");
    const amountOut = mulDiv(atPrice, BPS - this.haircutBps(), BPS);
    if (amountOut < minAmountOut && this.behavior.ignoreLimits !== true) {
      throw new ExecutionError("SlippageExceeded", "swapExactInput: output below minimum", {
        amountOut: amountOut.toString(),
        minAmountOut: minAmountOut.toString(),
      });
    }

    await this.settle(assetIn, assetOut, amountIn, amountOut, account);
    return mulDiv(amountOut, BPS + (this.behavior.misreportBps ?? 0n), BPS);
  }

  async swapExactOutput(
    assetIn: string,
    assetOut: string,
    amountOut: bigint,
    maxAmountIn: bigint,
    deadline: number,
    account: string,
  ): Promise<bigint> {
    this.checkDeadline(deadline);
    if (amountOut <= 0n) {
      throw new ExecutionError("VenueCallFailed", "swapExactOutput: amountOut must be positive");
    }

    const atPrice = await this.convert(assetOut, assetIn, amountOut, "up");
    const amountIn = mulDiv(atPrice, BPS, BPS - this.haircutBps(), "up");
    if (amountIn > maxAmountIn && this.behavior.ignoreLimits !== true) {
      throw new ExecutionError("SlippageExceeded", "swapExactOutput: input above maximum", {
        amountIn: amountIn.toString(),
        maxAmountIn: maxAmountIn.toString(),
      });
    }

    await this.settle(assetIn, assetOut, amountIn, amountOut, account);
    return mulDiv(amountIn, BPS - (this.behavior.misreportBps ?? 0n), BPS);
  }

  private async settle(
    assetIn: string,
    assetOut: string,
    amountIn: bigint,
    amountOut: bigint,
    account: string,
  ): Promise<void> {
    if (this.onSwap !== undefined) await this.onSwap();
    this.bank.transfer(assetIn, account, this.account, amountIn);
    this.bank.transfer(assetOut, this.account, account, amountOut);
    this.swapCount++;
  }

  private checkDeadline(deadline: number): void {
    if (this.clock.now() > deadline) {
      throw new ExecutionError("DeadlineExpired", "Swap deadline has passed", {
        deadline,
        now: this.clock.now(),
      });
    }
  }

  private haircutBps(): bigint {
    return this.feeBps + (this.behavior.priceImpactBps ?? 0n);
  }

  private async convert(from: string, to: string, amount: bigint, rounding: "down" | "up"): Promise<bigint> {
    const fromQuote = await this.feed.latestPrice(from);
    const toQuote = await this.feed.latestPrice(to);
    return convertAmount(
      amount,
      this.decimalsOf(from),
      scaleDecimals(fromQuote.price, fromQuote.decimals, 18),
      this.decimalsOf(to),
      scaleDecimals(toQuote.price, toQuote.decimals, 18),
      rounding,
    );
  }

  private decimalsOf(asset: string): number {
    const decimals = this.decimals[asset];
    if (decimals === undefined) {
      throw new ExecutionError("VenueCallFailed", `Unsupported asset ${asset}`);
    }
    return decimals;
  }
}
