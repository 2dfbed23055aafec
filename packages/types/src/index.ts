/**
 * @vigil/types: Shared domain types for the Vigil escrow stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type { Money, Currency } from "./financial.js";

// Identity
export type { Identity, CallContext } from "./identity.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export { isMoney, isIdentity } from "./guards.js";
