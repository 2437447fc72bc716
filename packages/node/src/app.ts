/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests build it
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { TreasuryService } from "./services/treasury-service.js";
import { createErrorHandler, type UnexpectedErrorListener } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware, type RequestLogEntry } from "./middleware/logger.js";
import { anonymousMiddleware, authMiddleware, type AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createReserveRoutes } from "./routes/reserve.js";
import { createAuditRoutes } from "./routes/audit.js";
import { createKeeperRoutes } from "./routes/keeper.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: TreasuryService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error that becomes a 500 */
  readonly onUnexpectedError?: UnexpectedErrorListener;
  /** When provided, API routes require a key; otherwise they are read-only */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", options.auth !== undefined ? authMiddleware(options.auth) : anonymousMiddleware());

  app.route("/api/v1/vault", createVaultRoutes(service));
  app.route("/api/v1/reserve", createReserveRoutes(service));
  app.route("/api/v1/audit", createAuditRoutes(service));
  app.route("/api/v1/keeper", createKeeperRoutes(service));
  app.route("/api/v1/admin", createAdminRoutes(service));

  return app;
}
