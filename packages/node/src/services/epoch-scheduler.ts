/**
 * EpochScheduler — drives the keeper tick.
 *
 * Polls on a fixed interval. Each poll runs the tick for every epoch that
 * is due, one at a time, so missed epochs are caught up in order.
 *
 * Outcomes:
 * - EpochNotElapsed: nothing to do, wait for the next poll
 * - CircuitBreakerTripped / CircuitBreakerActive: alert once, then stay
 *   halted until the breaker is reset by an administrator
 * - any other failure: logged, retried on the next poll
 */

import type { Logger } from "pino";
import { hasErrorCode, isTreasuryError, type CallContext } from "@pegvault/types";
import type { EpochReport } from "@pegvault/vault";

// =============================================================================
// Types
// =============================================================================

/** The slice of TreasuryService the scheduler needs */
export interface KeeperTarget {
  isEpochDue(): boolean;
  breakerTripped(): boolean;
  readonly nextEpochAt: number;
  tick(ctx: CallContext): Promise<EpochReport>;
}

export interface EpochSchedulerOptions {
  readonly target: KeeperTarget;
  readonly keeper: CallContext;
  readonly logger: Logger;
  readonly pollIntervalMs: number;
  /** Upper bound on ticks in one poll (default 52) */
  readonly maxCatchUp?: number;
}

export type PollOutcome = "ticked" | "idle" | "halted" | "failed";

export interface PollResult {
  readonly outcome: PollOutcome;
  readonly reports: readonly EpochReport[];
}

// =============================================================================
// Scheduler
// =============================================================================

export class EpochScheduler {
  private readonly target: KeeperTarget;
  private readonly keeper: CallContext;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly maxCatchUp: number;

  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<PollResult> | undefined;
  private running = false;
  private alerted = false;

  constructor(options: EpochSchedulerOptions) {
    this.target = options.target;
    this.keeper = options.keeper;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs;
    this.maxCatchUp = options.maxCatchUp ?? 52;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Whether ticking is suspended on a tripped breaker */
  get halted(): boolean {
    return this.alerted;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info({ pollIntervalMs: this.pollIntervalMs }, "Epoch scheduler started");
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight !== undefined) {
      await this.inFlight;
    }
    this.logger.info("Epoch scheduler stopped");
  }

  /**
   * One pass: tick every due epoch. Never throws.
   */
  async poll(): Promise<PollResult> {
    if (this.target.breakerTripped()) {
      if (!this.alerted) {
        this.alerted = true;
        this.logger.error(
          { alert: "circuit-breaker" },
          "Circuit breaker is tripped; epoch ticks are suspended until it is reset",
        );
      }
      return { outcome: "halted", reports: [] };
    }
    if (this.alerted) {
      this.alerted = false;
      this.logger.info("Circuit breaker reset; epoch ticks resumed");
    }

    const reports: EpochReport[] = [];
    while (reports.length < this.maxCatchUp && this.target.isEpochDue()) {
      try {
        const report = await this.target.tick(this.keeper);
        reports.push(report);
        this.logger.info(
          {
            epoch: report.epoch,
            rate: report.rate.toString(),
            marketPrice: report.marketPrice.toString(),
            distributed: report.distributed.toString(),
            deployed: report.deployed.toString(),
            harvested: report.harvested.toString(),
          },
          "Epoch settled",
        );
      } catch (err) {
        return this.handleFailure(err, reports);
      }
    }

    return { outcome: reports.length > 0 ? "ticked" : "idle", reports };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private handleFailure(err: unknown, reports: readonly EpochReport[]): PollResult {
    if (hasErrorCode(err, "EpochNotElapsed")) {
      this.logger.debug({ nextEpochAt: this.target.nextEpochAt }, "Epoch not yet due");
      return { outcome: reports.length > 0 ? "ticked" : "idle", reports };
    }

    if (hasErrorCode(err, "CircuitBreakerTripped") || hasErrorCode(err, "CircuitBreakerActive")) {
      this.alerted = true;
      this.logger.error(
        { alert: "circuit-breaker", code: err.code, details: err.details },
        "Circuit breaker stopped the epoch tick; ticks are suspended until it is reset",
      );
      return { outcome: "halted", reports };
    }

    if (isTreasuryError(err)) {
      this.logger.warn({ code: err.code, kind: err.kind, details: err.details }, err.message);
    } else {
      this.logger.error({ err }, "Epoch tick failed");
    }
    return { outcome: "failed", reports };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      const pass = this.poll();
      this.inFlight = pass;
      void pass.then(() => {
        this.inFlight = undefined;
        if (this.running) this.schedule(this.pollIntervalMs);
      });
    }, delayMs);
  }
}
