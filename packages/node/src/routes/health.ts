/**
 * Health check routes.
 *
 * GET /health   Liveness probe (always 200 if server is running)
 * GET /ready    Readiness probe: hash chain, event catalog, authorization
 *               index and custody balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { EscrowService } from "../services/escrow-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

function subsystem(ok: boolean, detail: string): SubsystemStatus {
  return ok ? { status: "ok" } : { status: "down", detail };
}

export function createHealthRoutes(service: EscrowService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.checkHealth();

    const subsystems: Record<string, SubsystemStatus> = {
      eventStore: subsystem(
        report.integrity.valid,
        `chain errors=${String(report.integrity.errors.length)}`,
      ),
      catalog: subsystem(
        report.invalidEvents === 0,
        `invalid events=${String(report.invalidEvents)}`,
      ),
      index: subsystem(report.index.consistent, report.index.issues.join("; ")),
      custody: subsystem(report.custodyBalanced, "custody balance differs from total locked"),
    };

    const ready =
      service.isReady() && Object.values(subsystems).every((s) => s.status === "ok");

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        lastVerifiedPosition: report.integrity.lastVerifiedPosition,
        subsystems,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
