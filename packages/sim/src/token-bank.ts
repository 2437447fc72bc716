/**
 * @pegvault/sim — Token balances.
 *
 * Stand-in for the token layer. Joins an AtomicScope so a failed
 * operation's transfers are undone the way a reverted transaction's are.
 */

import { ExecutionError, ValidationError } from "@pegvault/types";
import type { TokenBank } from "@pegvault/types";
import type { RestoreFn, ScopeParticipant } from "@pegvault/guard";

export interface BalanceEntry {
  readonly asset: string;
  readonly holder: string;
  readonly amount: bigint;
}

export class InMemoryTokenBank implements TokenBank, ScopeParticipant {
  private balances = new Map<string, bigint>();

  balanceOf(asset: string, holder: string): bigint {
    return this.balances.get(key(asset, holder)) ?? 0n;
  }

  totalSupply(asset: string): bigint {
    let total = 0n;
    for (const [k, amount] of this.balances) {
      if (k.startsWith(`${asset}\u0000`)) total += amount;
    }
    return total;
  }

  transfer(asset: string, from: string, to: string, amount: bigint): void {
    assertAmount(amount);
    if (amount === 0n || from === to) return;

    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw new ExecutionError(
        "InsufficientLiquidity",
        `${from} holds ${available.toString()} ${asset}, transfer needs ${amount.toString()}`,
        { asset, from, to, amount: amount.toString() },
      );
    }
    this.set(asset, from, available - amount);
    this.set(asset, to, this.balanceOf(asset, to) + amount);
  }

  mint(asset: string, holder: string, amount: bigint): void {
    assertAmount(amount);
    this.set(asset, holder, this.balanceOf(asset, holder) + amount);
  }

  burn(asset: string, holder: string, amount: bigint): void {
    assertAmount(amount);
    const available = this.balanceOf(asset, holder);
    if (available < amount) {
      throw new ExecutionError("InsufficientLiquidity", `${holder} cannot burn ${amount.toString()} ${asset}`);
    }
    this.set(asset, holder, available - amount);
  }

  /** Every non-zero balance */
  entries(): BalanceEntry[] {
    return [...this.balances].map(([k, amount]) => {
      const [asset = "", holder = ""] = k.split("\u0000");
      return { asset, holder, amount };
    });
  }

  /** Replace all balances */
  load(entries: readonly BalanceEntry[]): void {
    this.balances = new Map();
    for (const entry of entries) {
      assertAmount(entry.amount);
      this.set(entry.asset, entry.holder, this.balanceOf(entry.asset, entry.holder) + entry.amount);
    }
  }

  capture(): RestoreFn {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }

  private set(asset: string, holder: string, amount: bigint): void {
    if (amount === 0n) {
      this.balances.delete(key(asset, holder));
    } else {
      this.balances.set(key(asset, holder), amount);
    }
  }
}

function key(asset: string, holder: string): string {
  return `${asset}\u0000${holder}`;
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new ValidationError("InvalidParameter", `Negative token amount: ${amount.toString()}`);
  }
}
