/**
 * @pegvault/sim — In-process stand-ins for the token layer, the price
 * oracle and the trading venues. Used by tests and by paper-mode runs.
 */

export { ManualClock } from "./clock.js";
export type { BalanceEntry } from "./token-bank.js";
export { InMemoryTokenBank } from "./token-bank.js";
export { StaticPriceFeed } from "./price-feed.js";
export type { SwapBehavior, SimulatedSwapVenueOptions } from "./swap-venue.js";
export { SimulatedSwapVenue } from "./swap-venue.js";
export type { LendingPositionEntry, SimulatedLendingVenueOptions } from "./lending-venue.js";
export { SimulatedLendingVenue } from "./lending-venue.js";
export type {
  PriceSetting,
  SimulatedMarketOptions,
  SimulatedMarket,
} from "./market.js";
export { DEFAULT_ASSETS, createSimulatedMarket } from "./market.js";
export { MarketStateSchema, encodeMarketState, restoreMarketState } from "./market-state.js";
