/**
 * GET /api/v1/reserve — Strategy valuation, configuration and breaker state.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";
import { toJson } from "../types/json.js";
import { requirePermission } from "../middleware/auth.js";

export function createReserveRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), async (c) => {
    return c.json({ data: toJson(await service.reserve()) });
  });

  return routes;
}
