/**
 * Caller identity middleware.
 *
 * Authentication happens upstream (gateway or wallet signature check);
 * this service trusts the X-Caller-Id header it forwards. Requests
 * without one get 401.
 */

import type { MiddlewareHandler } from "hono";
import { isIdentity } from "@vigil/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Id";

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER);
    if (!isIdentity(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing or blank ${CALLER_HEADER} header`),
        401,
      );
    }

    c.set("caller", caller.trim());
    return next();
  };
}
