/**
 * @pegvault/node — Keeper service.
 *
 * HTTP API over the vault, the epoch scheduler, and the composition root
 * that wires the treasury packages to paper-mode venues.
 */

export { TreasuryService, systemClock } from "./services/treasury-service.js";
export type {
  TreasuryServiceConfig,
  StalenessConfig,
  PaperMarketConfig,
  VaultOverview,
  HolderView,
  ReserveView,
  AuditReadOptions,
} from "./services/treasury-service.js";
export { EpochScheduler } from "./services/epoch-scheduler.js";
export type {
  EpochSchedulerOptions,
  KeeperTarget,
  PollOutcome,
  PollResult,
} from "./services/epoch-scheduler.js";
export {
  loadConfig,
  parseApiKeys,
  ConfigSchema,
  vaultParameters,
  reserveConfig,
} from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export * from "./types/index.js";
