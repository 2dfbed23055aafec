/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used where values cross
 * a trust boundary: request identities and restored snapshots.
 */

import type { Money } from "./financial.js";
import type { Identity } from "./identity.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Financial guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    typeof value.currency === "string" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

// =============================================================================
// Identity guards
// =============================================================================

export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && value.trim().length > 0;
}
