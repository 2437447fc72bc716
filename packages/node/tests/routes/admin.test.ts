/**
 * Tests for the administrator routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, KEYS, USDC } from "../setup.js";

const admin = (path: string, body?: unknown) => jsonRequest(`/api/v1/admin${path}`, "POST", body, KEYS.admin);
const deposit = (assets: bigint) =>
  jsonRequest("/api/v1/vault/deposit", "POST", { assets: assets.toString() }, KEYS.alice);

describe("POST /api/v1/admin/pause", () => {
  it("pauses minting", async () => {
    const { app } = createTestApp();
    const paused = await app.request(admin("/pause", { mintingPaused: true, redeemingPaused: false }));
    expect(paused.status).toBe(200);

    const res = await app.request(deposit(USDC(10n)));

    expect(res.status).toBe(409);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("MintingPaused");
  });

  it("validates the body", async () => {
    const { app } = createTestApp();
    const res = await app.request(admin("/pause", { mintingPaused: "yes" }));
    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/admin/dividend-params", () => {
  it("updates the rate parameters", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      admin("/dividend-params", { baseRate: "900", sensitivity: "1500", minRate: "200", maxRate: "3000" }),
    );

    expect(res.status).toBe(200);
    expect(service.vault.parameters.rate).toEqual({ baseRate: 900n, sensitivity: 1_500n, minRate: 200n, maxRate: 3_000n });
  });

  it("rejects base outside [min, max]", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      admin("/dividend-params", { baseRate: "50", sensitivity: "2000", minRate: "100", maxRate: "2500" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("InvalidParameter");
  });
});

describe("POST /api/v1/admin/target-price", () => {
  it("moves the anchor", async () => {
    const { app, service } = createTestApp();
    await app.request(admin("/target-price", { targetPrice: "105000000" }));
    expect(service.vault.parameters.targetPrice).toBe(105_000_000n);
  });

  it("rejects zero", async () => {
    const { app } = createTestApp();
    const res = await app.request(admin("/target-price", { targetPrice: "0" }));
    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/admin/deposit-limits", () => {
  it("applies new caps", async () => {
    const { app } = createTestApp();
    await app.request(
      admin("/deposit-limits", { minDeposit: "1000000", maxSingleDeposit: "1000000000", maxTotalDeposits: "5000000000" }),
    );

    const res = await app.request(deposit(USDC(1_001n)));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("DepositTooLarge");
  });
});

describe("circuit breaker", () => {
  it("trips on a 25% volatile drop and clears on reset", async () => {
    const { app, service } = createTestApp();
    await app.request(deposit(USDC(10_000n)));
    service.market.feed.setPrice("WBTC", 7_275_000_000_000n, 8);

    const tripped = await app.request(deposit(USDC(1_000n)));
    expect(tripped.status).toBe(409);
    expect(((await tripped.json()) as { error: { code: string } }).error.code).toBe("CircuitBreakerTripped");

    const active = await app.request(deposit(USDC(1_000n)));
    expect(((await active.json()) as { error: { code: string } }).error.code).toBe("CircuitBreakerActive");

    const reset = await app.request(admin("/breaker/reset"));
    expect(reset.status).toBe(200);
    const body = (await reset.json()) as { data: { tripped: boolean; checkpointPrice: string } };
    expect(body.data.tripped).toBe(false);

    const after = await app.request(deposit(USDC(1_000n)));
    expect(after.status).toBe(201);
  });
});

describe("POST /api/v1/admin/emergency-withdraw", () => {
  it("returns everything the strategy holds to the vault", async () => {
    const { app, service } = createTestApp();
    await app.request(deposit(USDC(10_000n)));

    const res = await app.request(admin("/emergency-withdraw"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { returned: string } };
    expect(body.data.returned).toBe("9899999560");
    expect(service.vault.idleAssets()).toBe(9_999_999_560n);
    expect(service.strategy.position()).toEqual({ volatileAssetHeld: 0n, cashDeployed: 0n });
  });
});
