/**
 * Tests for API key authentication and permission guards.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, KEYS } from "../setup.js";

describe("authMiddleware", () => {
  it("rejects requests without a key", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/vault");

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects an unknown key", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/vault", "GET", undefined, "not-a-key"));

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Invalid API key");
  });

  it("lets every role read", async () => {
    const { app } = createTestApp();
    for (const key of Object.values(KEYS)) {
      const res = await app.request(jsonRequest("/api/v1/vault", "GET", undefined, key));
      expect(res.status).toBe(200);
    }
  });
});

describe("requirePermission", () => {
  it("keeps viewers out of deposits", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/vault/deposit", "POST", { assets: "5000000" }, KEYS.viewer));

    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "FORBIDDEN", message: "Role 'viewer' lacks 'write' permission" });
  });

  it("keeps keeper keys out of administration", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/admin/pause", "POST", { mintingPaused: true, redeemingPaused: false }, KEYS.keeper),
    );

    expect(res.status).toBe(403);
  });

  it("keeps administrators off the keeper tick", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/keeper/tick", "POST", undefined, KEYS.admin));

    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Role 'administrator' lacks 'tick' permission");
  });
});

describe("unsecured mode", () => {
  it("serves reads anonymously", async () => {
    const { app } = createTestApp({ secured: false });
    const res = await app.request("/api/v1/reserve");
    expect(res.status).toBe(200);
  });

  it("refuses writes", async () => {
    const { app } = createTestApp({ secured: false });
    const res = await app.request(jsonRequest("/api/v1/vault/deposit", "POST", { assets: "5000000" }));
    expect(res.status).toBe(403);
  });
});
