/**
 * Audit journal routes.
 *
 * GET /api/v1/audit           — Records, newest first (?stream, ?type, ?fromPosition, ?limit, ?order)
 * GET /api/v1/audit/integrity — Hash-chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";
import { AuditQuerySchema } from "../types/dto.js";
import { toJson } from "../types/json.js";
import { parseQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAuditRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const query = parseQuery(c, AuditQuerySchema);
    const records = service.audit(query);
    return c.json({
      data: toJson(records),
      meta: { count: records.length, headPosition: service.journal.globalPosition() },
    });
  });

  routes.get("/integrity", requirePermission("read"), (c) => {
    return c.json({ data: toJson(service.checkJournal()) });
  });

  return routes;
}
