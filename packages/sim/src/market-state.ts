/**
 * @pegvault/sim — Market state encoding.
 *
 * Token balances, lending positions and the market clock, as JSON with
 * bigints in decimal strings. Prices are not part of it: the feed is
 * reseeded from configuration.
 */

import { z } from "zod";
import type { SimulatedMarket } from "./market.js";

const amount = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer string")
  .transform((value) => BigInt(value));

export const MarketStateSchema = z.object({
  time: z.number().int().nonnegative(),
  balances: z.array(
    z.object({
      asset: z.string().min(1),
      holder: z.string().min(1),
      amount,
    }),
  ),
  lending: z.array(
    z.object({
      asset: z.string().min(1),
      holder: z.string().min(1),
      balance: amount,
      accruedAt: z.number().int().nonnegative(),
    }),
  ),
});

export function encodeMarketState(market: SimulatedMarket): Record<string, unknown> {
  return {
    time: market.clock.now(),
    balances: market.bank.entries().map((e) => ({ ...e, amount: e.amount.toString() })),
    lending: market.lending.positionEntries().map((e) => ({ ...e, balance: e.balance.toString() })),
  };
}

/**
 * Load saved balances and positions into `market`, replacing its seed
 * liquidity. The clock never moves backwards.
 */
export function restoreMarketState(market: SimulatedMarket, state: unknown): void {
  const s = MarketStateSchema.parse(state);
  market.bank.load(s.balances);
  market.lending.loadPositions(s.lending);
  if (s.time > market.clock.now()) {
    market.clock.set(s.time);
  }
}
