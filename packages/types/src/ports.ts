/**
 * Ports
 *
 * Contracts between the core and the collaborators it does not own.
 */

import type { CallContext } from "./capability.js";

/**
 * Source of the current time in unix seconds.
 */
export interface Clock {
  now(): number;
}

/**
 * The token layer: balances of every holder in every asset.
 * Transfers either move the full amount or throw.
 */
export interface TokenBank {
  balanceOf(asset: string, holder: string): bigint;
  transfer(asset: string, from: string, to: string, amount: bigint): void;
}

/**
 * Decentralized exchange. Swaps settle against `account`'s balances in the
 * token bank; a swap executed after `deadline` (unix seconds) must fail.
 */
export interface SwapVenue {
  /** Sell exactly `amountIn`; returns the reported output */
  swapExactInput(
    assetIn: string,
    assetOut: string,
    amountIn: bigint,
    minAmountOut: bigint,
    deadline: number,
    account: string,
  ): Promise<bigint>;

  /** Buy exactly `amountOut`; returns the reported input spent */
  swapExactOutput(
    assetIn: string,
    assetOut: string,
    amountOut: bigint,
    maxAmountIn: bigint,
    deadline: number,
    account: string,
  ): Promise<bigint>;
}

/**
 * Yield-bearing lending venue. Interest accrues to the beneficiary's
 * balance without any call.
 */
export interface LendingVenue {
  supply(asset: string, amount: bigint, beneficiary: string): Promise<void>;

  /**
   * Redeem from `recipient`'s own position back to `recipient`.
   * Returns the amount actually sent.
   */
  withdraw(asset: string, amount: bigint, recipient: string): Promise<bigint>;

  /** Live balance including accrued interest */
  balanceOf(asset: string, holder: string): Promise<bigint>;
}

/**
 * Position quantities owned by the reserve strategy.
 */
export interface ReservePosition {
  readonly volatileAssetHeld: bigint;
  readonly cashDeployed: bigint;
}

/**
 * What the vault may ask of its reserve strategy. Every capital-moving call
 * requires the orchestrator capability; the strategy's fields are never
 * touched from outside.
 */
export interface ReserveStrategyPort {
  /** Account the strategy holds tokens under */
  readonly account: string;

  /** Deploy `amount` of the stable asset already transferred to `account` */
  deploy(amount: bigint, ctx: CallContext): Promise<void>;

  /** Send up to `amount` of the stable asset to the vault; returns what was sent */
  withdraw(amount: bigint, ctx: CallContext): Promise<bigint>;

  /** Move `amount` (stable units) between the volatile and cash reserves */
  rebalance(sellVolatile: boolean, amount: bigint, ctx: CallContext): Promise<void>;

  /** Send accrued lending interest to the vault; returns the amount sent */
  harvestYield(ctx: CallContext): Promise<bigint>;

  /** Total value in stable-asset units */
  totalValue(): Promise<bigint>;

  /** Live value of the cash reserve in stable-asset units */
  cashReserveValue(): Promise<bigint>;

  /** Value of the volatile reserve in stable-asset units */
  volatileReserveValue(): Promise<bigint>;

  position(): ReservePosition;
}
