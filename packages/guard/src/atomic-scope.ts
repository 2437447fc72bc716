/**
 * @pegvault/guard — Transactional scope.
 *
 * Components holding mutable state register as participants. A participant
 * hands out a restore callback when captured. `run` captures every
 * participant, executes the operation, and on failure restores them all in
 * reverse order before rethrowing, so a failed operation leaves no trace.
 *
 * Rules:
 * - Nested runs join the enclosing run; their commits wait for the outermost
 * - A failed nested run restores what it captured, even if the caller recovers
 * - afterCommit work (persistence, audit) runs only once the outermost run succeeds
 * - Operations are assumed to be serialized by the caller
 */

export type RestoreFn = () => void;
export type CommitFn = () => void | Promise<void>;

export interface ScopeParticipant {
  /** Snapshot current state; the returned function puts it back */
  capture(): RestoreFn;
}

interface Frame {
  readonly restores: readonly RestoreFn[];
  readonly commits: CommitFn[];
}

export class AtomicScope {
  private readonly participants = new Set<ScopeParticipant>();
  private readonly frames: Frame[] = [];

  /**
   * Add a participant. Returns a function that removes it again.
   */
  register(participant: ScopeParticipant): () => void {
    this.participants.add(participant);
    return () => {
      this.participants.delete(participant);
    };
  }

  get active(): boolean {
    return this.frames.length > 0;
  }

  get depth(): number {
    return this.frames.length;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const frame: Frame = {
      restores: [...this.participants].map((p) => p.capture()),
      commits: [],
    };
    this.frames.push(frame);

    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this.pop(frame);
      for (const restore of [...frame.restores].reverse()) {
        restore();
      }
      throw err;
    }

    this.pop(frame);
    const parent = this.frames[this.frames.length - 1];
    if (parent !== undefined) {
      parent.commits.push(...frame.commits);
      return result;
    }

    for (const commit of frame.commits) {
      await commit();
    }
    return result;
  }

  /**
   * Defer `commit` until the outermost run succeeds. Runs it right away when
   * no run is active.
   */
  async afterCommit(commit: CommitFn): Promise<void> {
    const current = this.frames[this.frames.length - 1];
    if (current !== undefined) {
      current.commits.push(commit);
      return;
    }
    await commit();
  }

  private pop(frame: Frame): void {
    const index = this.frames.lastIndexOf(frame);
    if (index >= 0) this.frames.splice(index, 1);
  }
}
