/**
 * Type barrel — re-exports all public types from @pegvault/node.
 */

// DTOs
export {
  DepositSchema,
  RedeemSchema,
  PauseSchema,
  DividendParamsSchema,
  TargetPriceSchema,
  DepositLimitsSchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  RedeemDto,
  PauseDto,
  DividendParamsDto,
  TargetPriceDto,
  DepositLimitsDto,
  AuditQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Serialization
export { toJson } from "./json.js";
export type { JsonValue } from "./json.js";

// Auth
export { ROLE_PERMISSIONS, ROLE_CAPABILITIES, hasPermission, toCallContext } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
