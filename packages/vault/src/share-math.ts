/**
 * Share Math
 *
 * Exchange rate between shares and assets with a virtual offset on both
 * sides. The offset makes inflating the first depositor's share price cost
 * the attacker about a thousand times what they could take.
 *
 * Rounding always favours the vault: deposit and redeem round down,
 * mint and withdraw round up.
 */

import { PRECISION, mulDiv, type Rounding } from "@pegvault/math";

export const VIRTUAL_OFFSET = 1_000n;

export interface ExchangeState {
  readonly totalShares: bigint;
  readonly totalAssets: bigint;
}

export function assetsToShares(assets: bigint, state: ExchangeState, rounding: Rounding = "down"): bigint {
  return mulDiv(assets, state.totalShares + VIRTUAL_OFFSET, state.totalAssets + VIRTUAL_OFFSET, rounding);
}

export function sharesToAssets(shares: bigint, state: ExchangeState, rounding: Rounding = "down"): bigint {
  return mulDiv(shares, state.totalAssets + VIRTUAL_OFFSET, state.totalShares + VIRTUAL_OFFSET, rounding);
}

/** Asset units per share unit, scaled by PRECISION (1:1 is 1e18) */
export function assetsPerShare(state: ExchangeState): bigint {
  return mulDiv(state.totalAssets + VIRTUAL_OFFSET, PRECISION, state.totalShares + VIRTUAL_OFFSET);
}
