/**
 * Vault routes.
 *
 * GET  /api/v1/vault              — Accounting summary and collateral ratio
 * GET  /api/v1/vault/holders/:id  — One holder's shares and their value
 * POST /api/v1/vault/deposit      — Deposit as the authenticated actor
 * POST /api/v1/vault/redeem       — Redeem the authenticated actor's shares
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";
import { DepositSchema, RedeemSchema } from "../types/dto.js";
import { toCallContext } from "../types/auth.js";
import { toJson } from "../types/json.js";
import { parseBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createVaultRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), async (c) => {
    return c.json({ data: toJson(await service.overview()) });
  });

  routes.get("/holders/:id", requirePermission("read"), async (c) => {
    return c.json({ data: toJson(await service.holder(c.req.param("id"))) });
  });

  routes.post("/deposit", requirePermission("write"), async (c) => {
    const body = await parseBody(c, DepositSchema);
    const ctx = toCallContext(c.get("auth"), c.get("requestId"));
    const receiver = body.receiver ?? ctx.actor;

    const shares = await service.deposit(body.assets, receiver, ctx);
    return c.json({ data: toJson({ receiver, assets: body.assets, shares }) }, 201);
  });

  routes.post("/redeem", requirePermission("write"), async (c) => {
    const body = await parseBody(c, RedeemSchema);
    const ctx = toCallContext(c.get("auth"), c.get("requestId"));
    const receiver = body.receiver ?? ctx.actor;

    const assets = await service.redeem(body.shares, receiver, ctx);
    return c.json({ data: toJson({ receiver, shares: body.shares, assets }) });
  });

  return routes;
}
