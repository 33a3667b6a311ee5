/**
 * @concord/node — Entry point.
 *
 * Loads config, bootstraps the Hono app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseGenesisBalances } from "./config.js";
import { createApp } from "./app.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const genesisBalances = parseGenesisBalances(config.GENESIS_BALANCES);

  const { app, service } = createApp({
    serviceConfig: {
      owner: config.OWNER_ADDRESS,
      storageFee: BigInt(config.STORAGE_FEE),
      genesisBalances,
      logger: logger.child({ component: "ledger" }),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      owner: service.owner(),
      storageFee: config.STORAGE_FEE,
      fundedAccounts: genesisBalances.length,
    },
    "Concord node started",
  );

  // Graceful shutdown
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

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
