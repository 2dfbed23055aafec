/**
 * Structured request logging middleware.
 *
 * Emits one entry per request; main.ts hands the entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CALLER_HEADER } from "./caller.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** As claimed by the request; absent on anonymous routes */
  readonly caller?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: c.req.header(CALLER_HEADER),
    });
  };
}
