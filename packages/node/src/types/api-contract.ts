/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { EscrowService } from "../services/escrow-service.js";

/**
 * Hono environment type for the escrow app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The escrow service (set for every /api route) */
    service: EscrowService;

    /** Authenticated caller identity (set by caller middleware) */
    caller: string;
  };
}
