/**
 * @pegvault/guard — Non-reentrant lock.
 *
 * One guard per component. While an entry point holds it, any other entry
 * point of the same component (typically reached through a venue or token
 * callback) is rejected instead of running on half-updated state.
 */

import { StateError } from "@pegvault/types";

export type Release = () => void;

export class ReentrancyGuard {
  private readonly component: string;
  private holder: string | undefined;

  constructor(component: string) {
    this.component = component;
  }

  get locked(): boolean {
    return this.holder !== undefined;
  }

  /**
   * Acquire the lock for `operation`. The returned release is idempotent.
   */
  enter(operation: string): Release {
    if (this.holder !== undefined) {
      throw new StateError(
        "ReentrantCall",
        `${this.component}.${operation} called while ${this.component}.${this.holder} is in progress`,
        { component: this.component, operation, heldBy: this.holder },
      );
    }
    this.holder = operation;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.holder = undefined;
    };
  }

  /**
   * Run `fn` holding the lock; released on every exit path.
   */
  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const release = this.enter(operation);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
