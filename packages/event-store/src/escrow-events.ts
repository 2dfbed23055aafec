/**
 * @vigil/event-store: Escrow Domain Event Definitions.
 *
 * The audit contract of the escrow ledger. External monitors key on these
 * type strings and payload fields; they are append-only and versioned.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface PlanCreatedPayload {
  readonly owner: string;
  readonly beneficiaries: readonly string[];
  readonly shares: readonly number[];
  readonly lockDuration: number;
  readonly emergencyContact: string;
  readonly totalAmount: string;
  readonly currency: string;
}

export interface ProofOfLifeSubmittedPayload {
  readonly owner: string;
  readonly timestamp: number;
}

export interface ClaimExecutedPayload {
  readonly owner: string;
  readonly beneficiary: string;
  readonly amount: string;
  readonly remaining: string;
  readonly currency: string;
}

export interface EmergencyActivatedPayload {
  readonly owner: string;
  readonly activatedBy: string;
}

export interface EmergencyDeactivatedPayload {
  readonly owner: string;
  readonly deactivatedBy: string;
}

export interface FundsAddedPayload {
  readonly owner: string;
  readonly amount: string;
  readonly totalAmount: string;
  readonly currency: string;
}

export interface BeneficiariesUpdatedPayload {
  readonly owner: string;
  readonly beneficiaries: readonly string[];
  readonly shares: readonly number[];
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const ESCROW_EVENTS = {
  PLAN_CREATED: "escrow.plan.created",
  PROOF_OF_LIFE_SUBMITTED: "escrow.proof-of-life.submitted",
  CLAIM_EXECUTED: "escrow.claim.executed",
  EMERGENCY_ACTIVATED: "escrow.emergency.activated",
  EMERGENCY_DEACTIVATED: "escrow.emergency.deactivated",
  FUNDS_ADDED: "escrow.funds.added",
  BENEFICIARIES_UPDATED: "escrow.beneficiaries.updated",
} as const;

export type EscrowEventType =
  (typeof ESCROW_EVENTS)[keyof typeof ESCROW_EVENTS];

/**
 * Maps each event type to its payload shape.
 */
export interface EscrowEventPayloads {
  "escrow.plan.created": PlanCreatedPayload;
  "escrow.proof-of-life.submitted": ProofOfLifeSubmittedPayload;
  "escrow.claim.executed": ClaimExecutedPayload;
  "escrow.emergency.activated": EmergencyActivatedPayload;
  "escrow.emergency.deactivated": EmergencyDeactivatedPayload;
  "escrow.funds.added": FundsAddedPayload;
  "escrow.beneficiaries.updated": BeneficiariesUpdatedPayload;
}

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

function hasList(
  obj: Record<string, unknown>,
  key: string,
  item: "string" | "number",
): boolean {
  const value = obj[key];
  return Array.isArray(value) && value.every((v) => typeof v === item);
}

const ESCROW_SCHEMAS: readonly EventSchema[] = [
  {
    type: ESCROW_EVENTS.PLAN_CREATED,
    version: 1,
    description: "An inheritance plan was created and funded",
    source: "escrow",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "owner") &&
      hasList(p, "beneficiaries", "string") &&
      hasList(p, "shares", "number") &&
      hasNumber(p, "lockDuration") &&
      hasString(p, "emergencyContact") &&
      hasString(p, "totalAmount"),
  },
  {
    type: ESCROW_EVENTS.PROOF_OF_LIFE_SUBMITTED,
    version: 1,
    description: "The owner reset the inactivity clock",
    source: "escrow",
    validate: (p) => isObject(p) && hasString(p, "owner") && hasNumber(p, "timestamp"),
  },
  {
    type: ESCROW_EVENTS.CLAIM_EXECUTED,
    version: 1,
    description: "A beneficiary claimed their share and funds were transferred",
    source: "escrow",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "owner") &&
      hasString(p, "beneficiary") &&
      hasString(p, "amount") &&
      hasString(p, "remaining"),
  },
  {
    type: ESCROW_EVENTS.EMERGENCY_ACTIVATED,
    version: 1,
    description: "The emergency contact paused claims on a plan",
    source: "escrow",
    validate: (p) => isObject(p) && hasString(p, "owner") && hasString(p, "activatedBy"),
  },
  {
    type: ESCROW_EVENTS.EMERGENCY_DEACTIVATED,
    version: 1,
    description: "Claims on a plan were resumed",
    source: "escrow",
    validate: (p) => isObject(p) && hasString(p, "owner") && hasString(p, "deactivatedBy"),
  },
  {
    type: ESCROW_EVENTS.FUNDS_ADDED,
    version: 1,
    description: "The owner topped up a plan",
    source: "escrow",
    validate: (p) =>
      isObject(p) && hasString(p, "owner") && hasString(p, "amount") && hasString(p, "totalAmount"),
  },
  {
    type: ESCROW_EVENTS.BENEFICIARIES_UPDATED,
    version: 1,
    description: "The owner replaced the beneficiary list",
    source: "escrow",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "owner") &&
      hasList(p, "beneficiaries", "string") &&
      hasList(p, "shares", "number"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * A catalog pre-populated with every escrow event at version 1.
 */
export function createEscrowCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of ESCROW_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
