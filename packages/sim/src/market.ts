/**
 * @pegvault/sim — A complete simulated market.
 *
 * Wires a clock, token bank, price feed, swap venue and lending venue
 * around one AtomicScope, seeded with venue liquidity.
 */

import type { TreasuryAssets } from "@pegvault/types";
import { AtomicScope } from "@pegvault/guard";
import { ManualClock } from "./clock.js";
import { InMemoryTokenBank } from "./token-bank.js";
import { StaticPriceFeed } from "./price-feed.js";
import { SimulatedSwapVenue } from "./swap-venue.js";
import { SimulatedLendingVenue } from "./lending-venue.js";

export const DEFAULT_ASSETS: TreasuryAssets = {
  stable: { id: "USDC", decimals: 6 },
  volatile: { id: "WBTC", decimals: 8 },
  share: { id: "PEG", decimals: 6 },
};

export interface PriceSetting {
  readonly price: bigint;
  readonly decimals: number;
}

export interface SimulatedMarketOptions {
  readonly assets?: TreasuryAssets;
  readonly startTime?: number;
  /** Defaults: stable $1 (8 dp), volatile $97,000 (8 dp), share $100 (6 dp) */
  readonly prices?: {
    readonly stable?: PriceSetting;
    readonly volatile?: PriceSetting;
    readonly share?: PriceSetting;
  };
  readonly swapFeeBps?: bigint;
  readonly lendingApyBps?: bigint;
  readonly scope?: AtomicScope;
}

export interface SimulatedMarket {
  readonly assets: TreasuryAssets;
  readonly scope: AtomicScope;
  readonly clock: ManualClock;
  readonly bank: InMemoryTokenBank;
  readonly feed: StaticPriceFeed;
  readonly swap: SimulatedSwapVenue;
  readonly lending: SimulatedLendingVenue;
}

/** Venue inventory: 1e9 stable, 1e5 volatile (whole units) */
const STABLE_LIQUIDITY_UNITS = 1_000_000_000n;
const VOLATILE_LIQUIDITY_UNITS = 100_000n;

export function createSimulatedMarket(options: SimulatedMarketOptions = {}): SimulatedMarket {
  const assets = options.assets ?? DEFAULT_ASSETS;
  const scope = options.scope ?? new AtomicScope();
  const clock = new ManualClock(options.startTime);
  const bank = new InMemoryTokenBank();
  const feed = new StaticPriceFeed(clock);

  const stable = options.prices?.stable ?? { price: 100_000_000n, decimals: 8 };
  const volatile = options.prices?.volatile ?? { price: 9_700_000_000_000n, decimals: 8 };
  const share = options.prices?.share ?? { price: 100_000_000n, decimals: 6 };
  feed.setPrice(assets.stable.id, stable.price, stable.decimals);
  feed.setPrice(assets.volatile.id, volatile.price, volatile.decimals);
  feed.setPrice(assets.share.id, share.price, share.decimals);

  const swap = new SimulatedSwapVenue({
    bank,
    feed,
    clock,
    decimals: {
      [assets.stable.id]: assets.stable.decimals,
      [assets.volatile.id]: assets.volatile.decimals,
    },
    feeBps: options.swapFeeBps ?? 0n,
  });
  const lending = new SimulatedLendingVenue({ bank, clock, apyBps: options.lendingApyBps ?? 0n });

  bank.mint(assets.stable.id, swap.account, STABLE_LIQUIDITY_UNITS * 10n ** BigInt(assets.stable.decimals));
  bank.mint(
    assets.volatile.id,
    swap.account,
    VOLATILE_LIQUIDITY_UNITS * 10n ** BigInt(assets.volatile.decimals),
  );

  scope.register(bank);
  scope.register(lending);

  return { assets, scope, clock, bank, feed, swap, lending };
}
