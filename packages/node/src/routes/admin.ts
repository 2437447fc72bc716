/**
 * Administrator routes.
 *
 * POST /api/v1/admin/pause               — Minting and redeeming pause flags
 * POST /api/v1/admin/dividend-params     — Rate controller parameters
 * POST /api/v1/admin/target-price        — Share price anchor
 * POST /api/v1/admin/deposit-limits      — Minimum, single and total caps
 * POST /api/v1/admin/breaker/reset       — Clear a tripped circuit breaker
 * POST /api/v1/admin/emergency-withdraw  — Unwind the strategy to the vault
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TreasuryService } from "../services/treasury-service.js";
import {
  DepositLimitsSchema,
  DividendParamsSchema,
  PauseSchema,
  TargetPriceSchema,
} from "../types/dto.js";
import { toCallContext } from "../types/auth.js";
import { toJson } from "../types/json.js";
import { parseBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAdminRoutes(service: TreasuryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/pause", async (c) => {
    const body = await parseBody(c, PauseSchema);
    await service.setPause(body.mintingPaused, body.redeemingPaused, toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: body });
  });

  routes.post("/dividend-params", async (c) => {
    const body = await parseBody(c, DividendParamsSchema);
    await service.setDividendParams(body, toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson(body) });
  });

  routes.post("/target-price", async (c) => {
    const body = await parseBody(c, TargetPriceSchema);
    await service.setTargetPrice(body.targetPrice, toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson(body) });
  });

  routes.post("/deposit-limits", async (c) => {
    const body = await parseBody(c, DepositLimitsSchema);
    await service.setDepositLimits(body, toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson(body) });
  });

  routes.post("/breaker/reset", async (c) => {
    await service.resetCircuitBreaker(toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson((await service.reserve()).circuitBreaker) });
  });

  routes.post("/emergency-withdraw", async (c) => {
    const returned = await service.emergencyWithdraw(toCallContext(c.get("auth"), c.get("requestId")));
    return c.json({ data: toJson({ returned }) });
  });

  return routes;
}
