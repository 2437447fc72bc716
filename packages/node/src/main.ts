/**
 * @pegvault/node — Entry point.
 *
 * Loads config, wires the service, starts the HTTP server and the epoch
 * scheduler, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { createContext } from "@pegvault/types";
import { loadConfig, parseApiKeys, reserveConfig, vaultParameters } from "./config.js";
import { createApp } from "./app.js";
import { TreasuryService } from "./services/treasury-service.js";
import { EpochScheduler } from "./services/epoch-scheduler.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Auth
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; the API is read-only");
  }

  const service = new TreasuryService({
    parameters: vaultParameters(config),
    reserve: reserveConfig(config),
    staleness: {
      stable: config.STALENESS_STABLE_SECONDS,
      volatile: config.STALENESS_VOLATILE_SECONDS,
      share: config.STALENESS_SHARE_SECONDS,
    },
    paper: {
      volatilePrice: config.PAPER_VOLATILE_PRICE,
      sharePrice: config.PAPER_SHARE_PRICE,
      lendingApyBps: config.PAPER_LENDING_APY_BPS,
      funding: config.PAPER_FUNDING,
      fundedActors: parsedKeys.filter((k) => k.role === "depositor").map((k) => k.actor),
    },
    dataDir: config.DATA_DIR,
  });

  const app = createApp({
    service,
    auth: authConfig,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const scheduler = new EpochScheduler({
    target: service,
    keeper: createContext("keeper-scheduler", ["keeper"]),
    logger: logger.child({ component: "epoch-scheduler" }),
    pollIntervalMs: config.KEEPER_POLL_INTERVAL_MS,
  });
  if (config.KEEPER_ENABLED) {
    scheduler.start();
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, nextEpochAt: service.nextEpochAt },
    "PegVault keeper started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await scheduler.stop();
    await service.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
