import type { Clock } from "@pegvault/types";

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_750_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}
