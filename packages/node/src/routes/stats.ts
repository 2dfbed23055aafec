/**
 * Escrow-wide figures.
 *
 * GET /api/v1/stats       Active plans, locked total, custody balance
 * GET /api/v1/snapshot    Full ledger snapshot for export/audit
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createStatsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/stats", (c) => {
    return c.json({ data: c.get("service").getStats() });
  });

  routes.get("/snapshot", (c) => {
    return c.json({ data: c.get("service").snapshot() });
  });

  return routes;
}
