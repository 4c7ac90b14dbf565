/**
 * @popchain/node: Entry point.
 *
 * Loads config, bootstraps the service and Hono app, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { levelForStatus } from "./middleware/logger.js";
import { PopchainService } from "./services/popchain-service.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const service = new PopchainService({
    serviceWallet: config.SERVICE_WALLET_ADDRESS,
    logger,
  });

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger[levelForStatus(entry.status)](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, serviceWallet: service.serviceWallet },
    "Popchain node started",
  );

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
