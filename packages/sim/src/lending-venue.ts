/**
 * @pegvault/sim — Interest-bearing lending venue.
 *
 * Simple interest accrues per second on each position and is folded into
 * the balance whenever the position is touched. Interest is minted into the
 * venue's own account so it can always pay out.
 */

import { ExecutionError, type Clock, type LendingVenue } from "@pegvault/types";
import type { RestoreFn, ScopeParticipant } from "@pegvault/guard";
import { BPS, SECONDS_PER_YEAR } from "@pegvault/math";
import type { InMemoryTokenBank } from "./token-bank.js";

interface Position {
  readonly balance: bigint;
  readonly accruedAt: number;
}

export interface LendingPositionEntry {
  readonly asset: string;
  readonly holder: string;
  readonly balance: bigint;
  readonly accruedAt: number;
}

export interface SimulatedLendingVenueOptions {
  readonly bank: InMemoryTokenBank;
  readonly clock: Clock;
  readonly apyBps?: bigint;
  readonly account?: string;
}

export class SimulatedLendingVenue implements LendingVenue, ScopeParticipant {
  readonly account: string;
  apyBps: bigint;
  /** Report withdrawals this many bps higher than what was paid */
  misreportBps = 0n;
  /** Pay out only this share (bps) of each withdrawal */
  payoutBps = BPS;

  private positions = new Map<string, Position>();
  private readonly bank: InMemoryTokenBank;
  private readonly clock: Clock;

  constructor(options: SimulatedLendingVenueOptions) {
    this.bank = options.bank;
    this.clock = options.clock;
    this.apyBps = options.apyBps ?? 0n;
    this.account = options.account ?? "lending";
  }

  async supply(asset: string, amount: bigint, beneficiary: string): Promise<void> {
    if (amount <= 0n) {
      throw new ExecutionError("VenueCallFailed", "supply: amount must be positive");
    }
    const balance = this.accrue(asset, beneficiary);
    this.bank.transfer(asset, beneficiary, this.account, amount);
    this.positions.set(key(asset, beneficiary), {
      balance: balance + amount,
      accruedAt: this.clock.now(),
    });
  }

  async withdraw(asset: string, amount: bigint, recipient: string): Promise<bigint> {
    if (amount <= 0n) {
      throw new ExecutionError("VenueCallFailed", "withdraw: amount must be positive");
    }
    const balance = this.accrue(asset, recipient);
    const debited = amount < balance ? amount : balance;
    const paid = (debited * this.payoutBps) / BPS;

    this.positions.set(key(asset, recipient), { balance: balance - debited, accruedAt: this.clock.now() });
    this.bank.transfer(asset, this.account, recipient, paid);
    return (paid * (BPS + this.misreportBps)) / BPS;
  }

  async balanceOf(asset: string, holder: string): Promise<bigint> {
    const position = this.positions.get(key(asset, holder));
    if (position === undefined) return 0n;
    return position.balance + this.interestOn(position);
  }

  /** Positions as last accrued; interest since `accruedAt` is not folded in */
  positionEntries(): LendingPositionEntry[] {
    return [...this.positions].map(([k, position]) => {
      const [asset = "", holder = ""] = k.split("\u0000");
      return { asset, holder, ...position };
    });
  }

  loadPositions(entries: readonly LendingPositionEntry[]): void {
    this.positions = new Map(
      entries.map((e) => [key(e.asset, e.holder), { balance: e.balance, accruedAt: e.accruedAt }]),
    );
  }

  capture(): RestoreFn {
    const saved = new Map(this.positions);
    return () => {
      this.positions = saved;
    };
  }

  private accrue(asset: string, holder: string): bigint {
    const position = this.positions.get(key(asset, holder));
    if (position === undefined) return 0n;
    const interest = this.interestOn(position);
    if (interest > 0n) {
      this.bank.mint(asset, this.account, interest);
    }
    const balance = position.balance + interest;
    this.positions.set(key(asset, holder), { balance, accruedAt: this.clock.now() });
    return balance;
  }

  private interestOn(position: Position): bigint {
    const elapsed = BigInt(Math.max(0, this.clock.now() - position.accruedAt));
    return (position.balance * this.apyBps * elapsed) / (BPS * SECONDS_PER_YEAR);
  }
}

function key(asset: string, holder: string): string {
  return `${asset}\u0000${holder}`;
}
