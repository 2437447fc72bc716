/**
 * Asset Types
 *
 * Every quantity in the treasury is an integer in the smallest unit of its
 * asset (`bigint`). Decimal strings only appear at the edges (config, API,
 * persisted snapshots).
 */

/**
 * A token known to the treasury.
 */
export interface AssetSpec {
  /** Token identifier, e.g. "USDC" */
  readonly id: string;

  /** Number of decimal places of the smallest unit */
  readonly decimals: number;
}

/**
 * The three assets the treasury deals with.
 *
 * - stable: the deposit asset, also the unit of account
 * - volatile: the reserve asset bought with most deposits
 * - share: the vault share, priced on a secondary market
 */
export interface TreasuryAssets {
  readonly stable: AssetSpec;
  readonly volatile: AssetSpec;
  readonly share: AssetSpec;
}

export type AssetRole = keyof TreasuryAssets;

/**
 * A price as reported by an oracle: `price / 10^decimals` units of USD.
 */
export interface PriceQuote {
  readonly price: bigint;
  readonly decimals: number;
  /** Unix seconds of the last oracle update */
  readonly updatedAt: number;
}
