/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, details? } }
 *
 * Escrow error codes pass through unchanged, so clients see the same
 * names the ledger throws.
 */

import type { EscrowErrorCode } from "@vigil/escrow";

export type ApiErrorCode =
  | EscrowErrorCode
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/** One failed zod check, `path` dot-joined ("shares.0"). */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

export function validationEnvelope(
  message: string,
  issues?: readonly ValidationIssue[],
): ErrorEnvelope {
  return createErrorEnvelope(
    "VALIDATION_ERROR",
    message,
    issues === undefined ? undefined : { issues },
  );
}
