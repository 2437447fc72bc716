/**
 * @pegvault/guard — Reentrancy guard and transactional rollback scope.
 */

export type { Release } from "./reentrancy.js";
export { ReentrancyGuard } from "./reentrancy.js";

export type { RestoreFn, CommitFn, ScopeParticipant } from "./atomic-scope.js";
export { AtomicScope } from "./atomic-scope.js";
