/**
 * @vigil/escrow: Time-locked inheritance escrow.
 *
 * Provides:
 * - EscrowLedger: the plan state machine (create, proof of life,
 *   top-up, beneficiary updates, emergency gate, claims)
 * - PlanStore / InMemoryPlanStore
 * - AuthorizationIndex and ClaimRegistry
 * - Parameter validation and its bounds
 *
 * @packageDocumentation
 */

export { EscrowLedger, planStreamId } from "./escrow-ledger.js";
export type { EscrowLedgerOptions } from "./escrow-ledger.js";

export { InMemoryPlanStore } from "./plan-store.js";
export type { PlanStore } from "./plan-store.js";

export { AuthorizationIndex } from "./authorization-index.js";
export { ClaimRegistry } from "./claim-registry.js";

export {
  MIN_LOCK_DURATION,
  MAX_LOCK_DURATION,
  MAX_BENEFICIARIES,
  TOTAL_SHARES,
  validateLockDuration,
  validateListShape,
  validateEntries,
  validateEmergencyContact,
} from "./validation.js";

export type {
  InheritancePlan,
  CreatePlanParams,
  ClaimScope,
  ShareBasis,
  ClaimRecord,
  FundsTransfer,
  EscrowLogger,
  EscrowLedgerConfig,
  EscrowStats,
  IndexConsistencyResult,
  EscrowSnapshot,
  EscrowErrorCode,
} from "./types.js";
export { EscrowError } from "./types.js";
