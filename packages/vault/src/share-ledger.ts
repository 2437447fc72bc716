/**
 * Share Ledger
 *
 * Holder → share balance, plus the running total.
 *
 * Rules:
 * - sum(balances) == totalShares after every operation
 * - Balances never go negative; an overdraft throws before anything changes
 * - A holder whose balance reaches zero is removed
 */

import { ValidationError } from "@pegvault/types";
import type { RestoreFn, ScopeParticipant } from "@pegvault/guard";

export class ShareLedger implements ScopeParticipant {
  private balances = new Map<string, bigint>();
  private total = 0n;

  /**
   * Rebuild a ledger from persisted balances.
   */
  static fromBalances(balances: Readonly<Record<string, bigint>>): ShareLedger {
    const ledger = new ShareLedger();
    for (const [holder, shares] of Object.entries(balances)) {
      ledger.mint(holder, shares);
    }
    return ledger;
  }

  get totalShares(): bigint {
    return this.total;
  }

  get holderCount(): number {
    return this.balances.size;
  }

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  /** Holders sorted by id */
  entries(): readonly (readonly [string, bigint])[] {
    return [...this.balances.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  mint(holder: string, shares: bigint): void {
    assertNonNegative(shares);
    if (shares === 0n) return;
    this.balances.set(holder, this.balanceOf(holder) + shares);
    this.total += shares;
  }

  burn(holder: string, shares: bigint): void {
    assertNonNegative(shares);
    const balance = this.balanceOf(holder);
    if (shares > balance) {
      throw new ValidationError("InsufficientShares", `${holder} holds ${balance} shares, needs ${shares}`, {
        holder,
        balance: balance.toString(),
        required: shares.toString(),
      });
    }
    this.setBalance(holder, balance - shares);
    this.total -= shares;
  }

  transfer(from: string, to: string, shares: bigint): void {
    this.burn(from, shares);
    this.mint(to, shares);
  }

  capture(): RestoreFn {
    const balances = new Map(this.balances);
    const total = this.total;
    return () => {
      this.balances = balances;
      this.total = total;
    };
  }

  private setBalance(holder: string, shares: bigint): void {
    if (shares === 0n) {
      this.balances.delete(holder);
    } else {
      this.balances.set(holder, shares);
    }
  }
}

function assertNonNegative(shares: bigint): void {
  if (shares < 0n) {
    throw new ValidationError("InvalidParameter", "Share amounts must be non-negative", {
      shares: shares.toString(),
    });
  }
}
