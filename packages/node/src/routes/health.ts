/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if the server is running)
 * GET /ready  — Readiness probe: audit journal integrity and breaker state
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "degraded" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkJournal();
    const journal: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `brokenAt=${integrity.brokenAt ?? "?"}, reason=${integrity.reason ?? "unknown"}` };

    // A tripped breaker blocks capital movement but reads still work
    const breaker: SubsystemStatus = service.breakerTripped()
      ? { status: "degraded", detail: "circuit breaker tripped" }
      : { status: "ok" };

    const ready = journal.status === "ok";
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { journal, breaker },
        journalRecords: integrity.checked,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
