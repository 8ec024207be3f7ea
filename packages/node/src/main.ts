/**
 * @capvault/node — Entry point.
 *
 * Loads config and the market file, starts the HTTP server, and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadMarketFile, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { VaultService } from "./services/vault-service.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

const DEFAULT_MARKET_FILE = new URL("../market.json", import.meta.url);

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    auth = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in open mode");
  }

  const marketFile = config.MARKET_FILE ?? DEFAULT_MARKET_FILE;
  const service = await VaultService.fromMarketFile(
    {
      vaultAddress: config.VAULT_ADDRESS,
      referenceAsset: config.REFERENCE_ASSET,
      referenceDecimals: config.REFERENCE_DECIMALS,
      capDecimals: config.CAP_DECIMALS,
      bankCap: config.BANK_CAP,
      admins: config.ADMIN_ADDRESSES,
    },
    loadMarketFile(marketFile),
    logger,
  );
  logger.info(
    {
      marketFile: String(marketFile),
      pools: service.market.factory.listPools().length,
      bankCap: config.BANK_CAP.toString(),
    },
    "Market loaded",
  );

  const { app } = createApp({ service, logger, auth, openCaller: config.ADMIN_ADDRESSES[0] });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "CapVault node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
