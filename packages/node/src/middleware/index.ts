/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, KIND_STATUS } from "./error-handler.js";
export type { UnexpectedErrorListener } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseQuery, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  authMiddleware,
  anonymousMiddleware,
  requirePermission,
  ANONYMOUS,
  API_KEY_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
