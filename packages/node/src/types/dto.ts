/**
 * Request DTOs (Data Transfer Objects) with Zod validation schemas.
 *
 * Amounts, prices and rates are integer strings in base units.
 */

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

const UnitsSchema = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer string")
  .transform((v) => BigInt(v));

const ActorSchema = z.string().trim().min(1).max(128);

// =============================================================================
// Vault
// =============================================================================

export const DepositSchema = z.object({
  assets: UnitsSchema,
  /** Defaults to the caller */
  receiver: ActorSchema.optional(),
});

export const RedeemSchema = z.object({
  shares: UnitsSchema,
  receiver: ActorSchema.optional(),
});

// =============================================================================
// Administration
// =============================================================================

export const PauseSchema = z.object({
  mintingPaused: z.boolean(),
  redeemingPaused: z.boolean(),
});

export const DividendParamsSchema = z.object({
  baseRate: UnitsSchema,
  sensitivity: UnitsSchema,
  minRate: UnitsSchema,
  maxRate: UnitsSchema,
});

export const TargetPriceSchema = z.object({
  targetPrice: UnitsSchema,
});

export const DepositLimitsSchema = z.object({
  minDeposit: UnitsSchema,
  maxSingleDeposit: UnitsSchema,
  maxTotalDeposits: UnitsSchema,
});

// =============================================================================
// Audit
// =============================================================================

export const AuditQuerySchema = z.object({
  /** Restrict to one stream ("vault", "reserve", "circuit-breaker") */
  stream: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  order: z.enum(["asc", "desc"]).default("desc"),
});

export type DepositDto = z.infer<typeof DepositSchema>;
export type RedeemDto = z.infer<typeof RedeemSchema>;
export type PauseDto = z.infer<typeof PauseSchema>;
export type DividendParamsDto = z.infer<typeof DividendParamsSchema>;
export type TargetPriceDto = z.infer<typeof TargetPriceSchema>;
export type DepositLimitsDto = z.infer<typeof DepositLimitsSchema>;
export type AuditQuery = z.infer<typeof AuditQuerySchema>;
