/**
 * @pegvault/vault — Share vault.
 *
 * Deposits mint shares against a stable asset, surplus capital is deployed
 * into a reserve strategy, and an epoch tick retunes the dividend rate to
 * pull the share's market price back to its target.
 *
 * Design rules:
 * - Share math rounds in the vault's favour
 * - Every mutation is atomic and non-reentrant
 * - All state is snapshot-able and restorable
 */

export { Vault, validateParameters } from "./vault.js";
export { ShareLedger } from "./share-ledger.js";
export { VIRTUAL_OFFSET, assetsToShares, sharesToAssets, assetsPerShare } from "./share-math.js";
export type { ExchangeState } from "./share-math.js";
export { EPOCH_PHASES, transition, observedPhase, planEpoch } from "./epoch-engine.js";
export type { EpochPhase, EpochAction, EpochInput, EpochPlan } from "./epoch-engine.js";
export { VAULT_STREAM, VaultSnapshotSchema, encodeVault, decodeVault } from "./persistence.js";
export type { DecodedVault } from "./persistence.js";
export { PRICE_DECIMALS, DEFAULT_VAULT_PARAMETERS, MAX_EPOCH_DURATION } from "./types.js";
export type {
  DepositLimits,
  VaultParameters,
  VaultDeps,
  VaultAccounting,
  VaultSummary,
  EpochReport,
} from "./types.js";
