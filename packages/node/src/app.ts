/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can drive the app without an HTTP
 * server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { EscrowService } from "./services/escrow-service.js";
import type { EscrowServiceConfig } from "./services/escrow-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPlanRoutes } from "./routes/plans.js";
import { createStatsRoutes } from "./routes/stats.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: EscrowServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: EscrowService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new EscrowService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no caller required) ─────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", callerMiddleware());

  app.route("/api/v1/plans", createPlanRoutes());
  app.route("/api/v1", createStatsRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
