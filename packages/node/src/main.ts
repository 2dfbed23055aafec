/**
 * @vigil/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      currency: config.ESCROW_CURRENCY,
      decimals: config.ESCROW_DECIMALS,
      claimScope: config.CLAIM_SCOPE,
      shareBasis: config.SHARE_BASIS,
      logger: logger.child({ component: "escrow" }),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
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
      currency: config.ESCROW_CURRENCY,
      claimScope: config.CLAIM_SCOPE,
      shareBasis: config.SHARE_BASIS,
    },
    "Vigil escrow node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
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
