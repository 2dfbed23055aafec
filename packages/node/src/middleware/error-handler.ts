/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (EscrowError, LedgerError, EventStoreError)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { EscrowError } from "@vigil/escrow";
import type { EscrowErrorCode } from "@vigil/escrow";
import { LedgerError } from "@vigil/ledger";
import { EventStoreError } from "@vigil/event-store";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<EscrowErrorCode, ContentfulStatusCode> = {
  INHERITANCE_NOT_FOUND: 404,
  UNAUTHORIZED_ACCESS: 403,
  INVALID_PARAMETERS: 400,
  INSUFFICIENT_FUNDS: 422,
  TIME_LOCK_NOT_EXPIRED: 409,
  EMERGENCY_MODE_ACTIVE: 423,
};

interface Mapped {
  readonly status: ContentfulStatusCode;
  readonly code: ApiErrorCode;
  readonly message: string;
}

function mapError(err: Error): Mapped {
  if (err instanceof EscrowError) {
    return { status: STATUS_MAP[err.code], code: err.code, message: err.message };
  }
  // Money math rejects malformed amounts before the ledger sees them
  if (err instanceof LedgerError) {
    return { status: 400, code: "VALIDATION_ERROR", message: err.message };
  }
  if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
    return { status: 409, code: "CONFLICT", message: err.message };
  }
  // Don't leak internal details
  return { status: 500, code: "INTERNAL_ERROR", message: "Internal server error" };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, code, message } = mapError(err);
  return c.json(createErrorEnvelope(code, message), status);
}
