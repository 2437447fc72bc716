/**
 * POST /api/v1/keeper/tick — Run one epoch tick by hand.
 *
 * Keeper keys only. Responds 409 EpochNotElapsed when the epoch is not due.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";
import { toCallContext } from "../types/auth.js";
import { toJson } from "../types/json.js";
import { requirePermission } from "../middleware/auth.js";

export function createKeeperRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/tick", requirePermission("tick"), async (c) => {
    const report = await service.tick(toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson(report) });
  });

  return routes;
}
