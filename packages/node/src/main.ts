/**
 * @splitrelay/node — Entry point.
 *
 * Loads .env and config, bootstraps the Hono app, starts the HTTP
 * server, and handles graceful shutdown.
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createForwardingService } from "./bootstrap.js";
import { createApp } from "./app.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.LEDGER_ACCESS_TOKEN === undefined) {
    logger.warn("LEDGER_ACCESS_TOKEN is not set; ledger calls will fail until it is");
  }
  if (config.ANTHROPIC_API_KEY === undefined) {
    logger.warn("ANTHROPIC_API_KEY is not set; email forwarding is disabled");
  }

  const service = createForwardingService(config, { logger });
  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, defaultGroupId: config.DEFAULT_GROUP_ID },
    "splitrelay node started",
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
