/**
 * @vigil/escrow: Types for the time-locked inheritance escrow.
 */

import type { CallContext, Currency, Identity, Money } from "@vigil/types";

// =============================================================================
// Plan
// =============================================================================

/**
 * One inheritance plan. Keyed by its owner; at most one per owner.
 *
 * `beneficiaries` and `shares` are parallel sequences. Timestamps are
 * unix seconds taken from the `now` of the call that set them.
 */
export interface InheritancePlan {
  readonly owner: Identity;
  readonly beneficiaries: readonly Identity[];

  /** Integer percentages in (0, 100], summing to exactly 100 */
  readonly shares: readonly number[];

  /** Required inactivity interval in seconds */
  readonly lockDuration: number;

  readonly lastProofOfLife: number;

  /** Remaining unclaimed balance held by the plan */
  readonly totalAmount: Money;

  /** Deposit plus every top-up. Claims never lower it. */
  readonly fundedAmount: Money;

  readonly creationTime: number;

  /** False once `totalAmount` has reached zero. Never set back. */
  readonly isActive: boolean;

  /** Claims are blocked while true */
  readonly emergencyMode: boolean;

  readonly emergencyContact: Identity;
  readonly description: string;
}

/**
 * Input to createPlan. The caller becomes the owner.
 */
export interface CreatePlanParams {
  readonly beneficiaries: readonly Identity[];
  readonly shares: readonly number[];
  readonly lockDuration: number;
  readonly emergencyContact: Identity;
  readonly description?: string;
  readonly deposit: Money;
}

// =============================================================================
// Claims
// =============================================================================

/**
 * How far a claim blocks further claims by the same beneficiary.
 *
 * - per-plan: once per (owner, beneficiary)
 * - global: once per beneficiary across every plan
 */
export type ClaimScope = "per-plan" | "global";

/**
 * What a share is a percentage of.
 *
 * - funded: everything paid into the plan, so a [60, 40] plan of 100
 *   pays 60 then 40 and drains
 * - remaining: the balance left at claim time, so the same plan pays
 *   60 then 16
 *
 * Either way a payout never exceeds the remaining balance.
 */
export type ShareBasis = "funded" | "remaining";

export interface ClaimRecord {
  readonly owner: Identity;
  readonly beneficiary: Identity;
  readonly amount: Money;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Moves funds out of custody. Returns false (or throws) when the
 * transfer did not happen; either outcome rolls the claim back.
 * `ctx` is the claim's own context, so the payout shares its time.
 */
export interface FundsTransfer {
  transfer(ctx: CallContext, to: Identity, amount: Money): boolean;
}

/**
 * The subset of a pino logger the ledger writes to.
 */
export interface EscrowLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

// =============================================================================
// Configuration, stats & snapshot
// =============================================================================

export interface EscrowLedgerConfig {
  readonly currency: Currency;
  readonly decimals: number;

  /** Default: "per-plan" */
  readonly claimScope?: ClaimScope;

  /** Default: "funded" */
  readonly shareBasis?: ShareBasis;
}

export interface EscrowStats {
  readonly activePlans: number;
  readonly totalLocked: Money;
}

export interface IndexConsistencyResult {
  readonly consistent: boolean;
  readonly issues: readonly string[];
}

/**
 * Serializable ledger state. Restorable with EscrowLedger.fromSnapshot().
 */
export interface EscrowSnapshot {
  readonly version: 1;
  readonly currency: Currency;
  readonly decimals: number;
  readonly claimScope: ClaimScope;
  readonly shareBasis: ShareBasis;
  readonly plans: readonly InheritancePlan[];
  readonly authorizations: readonly (readonly [Identity, Identity])[];
  readonly claims: readonly ClaimRecord[];
  readonly activePlans: number;
  readonly totalLocked: string;
}

// =============================================================================
// Errors
// =============================================================================

export type EscrowErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "UNAUTHORIZED_ACCESS"
  | "INVALID_PARAMETERS"
  | "INHERITANCE_NOT_FOUND"
  | "TIME_LOCK_NOT_EXPIRED"
  | "EMERGENCY_MODE_ACTIVE";

export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;
  constructor(code: EscrowErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EscrowError";
    this.code = code;
  }
}
