/**
 * Global error handler.
 *
 * Catches everything thrown by route handlers and produces the error
 * envelope. TreasuryErrors map by kind; anything else is a 500 whose
 * message is not echoed to the client.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isTreasuryError, type ErrorKind } from "@pegvault/types";
import { createErrorEnvelope } from "../types/error.js";
import { toJson } from "../types/json.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const KIND_STATUS: Record<ErrorKind, ContentfulStatusCode> = {
  validation: 400,
  state: 409,
  oracle: 503,
  execution: 502,
  access: 403,
};

export type UnexpectedErrorListener = (err: Error, c: Context) => void;

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. `onUnexpected` sees every error that maps
 * to 500, typically to log it.
 */
export function createErrorHandler(onUnexpected?: UnexpectedErrorListener) {
  return (err: Error, c: Context): Response => {
    if (isTreasuryError(err)) {
      return c.json(
        createErrorEnvelope(err.code, err.message, { kind: err.kind, ...toDetails(err.details ?? {}) }),
        KIND_STATUS[err.kind],
      );
    }

    if (err instanceof RequestValidationError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", err.message, { issues: [...err.issues] }),
        400,
      );
    }

    onUnexpected?.(err, c);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

function toDetails(details: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const json = toJson(details);
  return json !== null && typeof json === "object" && !Array.isArray(json) ? json : {};
}
