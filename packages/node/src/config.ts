/**
 * @pegvault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Amounts and rates are integer strings in base units (bps for rates, the
 * asset's smallest unit for prices and amounts).
 */

import { z } from "zod";
import type { ReserveConfig } from "@pegvault/reserve";
import type { VaultParameters } from "@pegvault/vault";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const integer = (fallback: string) =>
  z
    .string()
    .regex(/^\d+$/, "expected a non-negative integer")
    .default(fallback)
    .transform((v) => BigInt(v));

const seconds = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  /** Journal and snapshot directory; in-memory when unset */
  DATA_DIR: z.string().optional(),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault parameters
  EPOCH_DURATION_SECONDS: seconds(604_800),
  TARGET_PRICE: integer("100000000"),
  BASE_RATE_BPS: integer("800"),
  SENSITIVITY_BPS: integer("2000"),
  MIN_RATE_BPS: integer("100"),
  MAX_RATE_BPS: integer("2500"),
  MIN_DEPOSIT: integer("1000000"),
  MAX_SINGLE_DEPOSIT: integer("1000000000000"),
  MAX_TOTAL_DEPOSITS: integer("100000000000000"),

  // Oracle staleness bounds
  STALENESS_STABLE_SECONDS: seconds(86_400),
  STALENESS_VOLATILE_SECONDS: seconds(3_600),
  STALENESS_SHARE_SECONDS: seconds(86_400),

  // Reserve strategy
  VOLATILE_ALLOCATION_BPS: integer("8000"),
  MAX_SLIPPAGE_BPS: integer("100"),
  SWAP_DEADLINE_SECONDS: seconds(300),
  BREAKER_THRESHOLD_BPS: integer("2000"),
  BREAKER_WINDOW_SECONDS: seconds(3_600),

  // Keeper
  KEEPER_ENABLED: z
    .string()
    .transform((v) => v === "true")
    .default("true"),
  KEEPER_POLL_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),

  // Paper mode (simulated venues)
  PAPER_VOLATILE_PRICE: integer("9700000000000"),
  PAPER_SHARE_PRICE: integer("100000000"),
  PAPER_LENDING_APY_BPS: integer("500"),
  PAPER_FUNDING: integer("1000000000000"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  /** Identity the key acts as; defaults to the role name */
  readonly actor: string;
}

const VALID_ROLES: ReadonlySet<string> = new Set<Role>(["administrator", "keeper", "depositor", "viewer"]);

function isRole(value: string): value is Role {
  return VALID_ROLES.has(value);
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1[:actor1],key2:role2[:actor2]"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, actor, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role[:actor]`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: administrator, keeper, depositor, or viewer`,
      );
    }
    if (actor === "") {
      throw new Error("Actor cannot be empty in API_KEYS");
    }

    keys.push({ key, role, actor: actor ?? role });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Domain views
// =============================================================================

export function vaultParameters(config: AppConfig): VaultParameters {
  return {
    targetPrice: config.TARGET_PRICE,
    epochDuration: config.EPOCH_DURATION_SECONDS,
    rate: {
      baseRate: config.BASE_RATE_BPS,
      sensitivity: config.SENSITIVITY_BPS,
      minRate: config.MIN_RATE_BPS,
      maxRate: config.MAX_RATE_BPS,
    },
    limits: {
      minDeposit: config.MIN_DEPOSIT,
      maxSingleDeposit: config.MAX_SINGLE_DEPOSIT,
      maxTotalDeposits: config.MAX_TOTAL_DEPOSITS,
    },
  };
}

export function reserveConfig(config: AppConfig): ReserveConfig {
  const volatileBps = config.VOLATILE_ALLOCATION_BPS;
  return {
    allocation: { volatileBps, cashBps: 10_000n - volatileBps },
    maxSlippageBps: config.MAX_SLIPPAGE_BPS,
    swapDeadlineSeconds: config.SWAP_DEADLINE_SECONDS,
    circuitBreaker: {
      thresholdBps: config.BREAKER_THRESHOLD_BPS,
      windowSeconds: config.BREAKER_WINDOW_SECONDS,
    },
  };
}
