/**
 * Escrow Ledger: time-locked inheritance plans.
 *
 * One plan per owner. Beneficiaries can claim their share once the
 * owner has been inactive for the plan's lock duration. Proof of life
 * resets that clock; the emergency contact can pause claims.
 *
 * Rules:
 * - Every call is a synchronous transaction: checks, then effects,
 *   then (for claims) the transfer
 * - A rejected call leaves no effect and emits no event
 * - Claim effects are applied before the transfer, so a re-entrant
 *   call from inside the transfer sees the post-claim state
 * - A failed transfer is compensated by delta, which keeps the effects
 *   of nested calls that succeeded
 * - All arithmetic uses bigint (via @vigil/ledger money-math)
 */

import { randomUUID } from "node:crypto";
import {
  addMoney,
  subtractMoney,
  percentOf,
  isPositive,
  isZero,
  compareMoney,
  zeroMoney,
  toMoney,
  LedgerError,
} from "@vigil/ledger";
import { isIdentity, isMoney } from "@vigil/types";
import type { CallContext, Currency, DomainEvent, Identity, Money } from "@vigil/types";
import { ESCROW_EVENTS } from "@vigil/event-store";
import type {
  EventStore,
  EscrowEventType,
  PlanCreatedPayload,
  ProofOfLifeSubmittedPayload,
  ClaimExecutedPayload,
  EmergencyActivatedPayload,
  EmergencyDeactivatedPayload,
  FundsAddedPayload,
  BeneficiariesUpdatedPayload,
} from "@vigil/event-store";
import { AuthorizationIndex } from "./authorization-index.js";
import { ClaimRegistry } from "./claim-registry.js";
import { InMemoryPlanStore } from "./plan-store.js";
import type { PlanStore } from "./plan-store.js";
import {
  validateEmergencyContact,
  validateEntries,
  validateListShape,
  validateLockDuration,
} from "./validation.js";
import type {
  ClaimScope,
  ShareBasis,
  CreatePlanParams,
  EscrowLedgerConfig,
  EscrowLogger,
  EscrowSnapshot,
  EscrowStats,
  FundsTransfer,
  IndexConsistencyResult,
  InheritancePlan,
} from "./types.js";
import { EscrowError } from "./types.js";

/** Latest unix second a Date can represent; event timestamps need one. */
export const MAX_TIMESTAMP = 8_640_000_000_000;

export interface EscrowLedgerOptions {
  readonly config: EscrowLedgerConfig;
  readonly transfer: FundsTransfer;

  /** Default: a fresh InMemoryPlanStore */
  readonly plans?: PlanStore;

  /** Audit log. Each successful mutation appends to `plan:<owner>`. */
  readonly events?: EventStore;

  readonly logger?: EscrowLogger;
}

export function planStreamId(owner: Identity): string {
  return `plan:${owner}`;
}

export class EscrowLedger {
  private readonly plans: PlanStore;
  private readonly index = new AuthorizationIndex();
  private readonly claims: ClaimRegistry;
  private readonly funds: FundsTransfer;
  private readonly events: EventStore | undefined;
  private readonly logger: EscrowLogger | undefined;
  private readonly currency: Currency;
  private readonly decimals: number;
  private readonly shareBasis: ShareBasis;

  private activePlans = 0;
  private totalLocked: Money;

  constructor(options: EscrowLedgerOptions) {
    const { config } = options;
    this.currency = config.currency;
    this.decimals = config.decimals;
    this.claims = new ClaimRegistry(config.claimScope ?? "per-plan");
    this.shareBasis = config.shareBasis ?? "funded";
    this.plans = options.plans ?? new InMemoryPlanStore();
    this.funds = options.transfer;
    this.events = options.events;
    this.logger = options.logger;
    this.totalLocked = zeroMoney(this.currency, this.decimals);
  }

  get claimScope(): ClaimScope {
    return this.claims.claimScope;
  }

  get basis(): ShareBasis {
    return this.shareBasis;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Plan lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create and fund the caller's plan.
   */
  createPlan(ctx: CallContext, params: CreatePlanParams): InheritancePlan {
    this.checkContext(ctx);
    const deposit = this.toLedgerMoney(params.deposit, "Deposit");
    if (!isPositive(deposit)) {
      throw new EscrowError(
        "INSUFFICIENT_FUNDS",
        `Deposit must be greater than zero, got ${deposit.amount}`,
      );
    }

    validateListShape(params.beneficiaries, params.shares);
    validateLockDuration(params.lockDuration);
    if (!isIdentity(params.emergencyContact)) {
      throw new EscrowError("INVALID_PARAMETERS", "Emergency contact is required");
    }
    if (this.plans.has(ctx.caller)) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `'${ctx.caller}' already has an inheritance plan`,
      );
    }
    validateEntries(params.beneficiaries, params.shares);
    validateEmergencyContact(ctx.caller, params.emergencyContact, params.beneficiaries);

    const plan: InheritancePlan = {
      owner: ctx.caller,
      beneficiaries: [...params.beneficiaries],
      shares: [...params.shares],
      lockDuration: params.lockDuration,
      lastProofOfLife: ctx.now,
      totalAmount: deposit,
      fundedAmount: deposit,
      creationTime: ctx.now,
      isActive: true,
      emergencyMode: false,
      emergencyContact: params.emergencyContact,
      description: params.description ?? "",
    };

    this.plans.put(plan);
    for (const beneficiary of plan.beneficiaries) {
      this.index.grant(plan.owner, beneficiary);
    }
    this.activePlans += 1;
    this.totalLocked = addMoney(this.totalLocked, deposit);

    this.emit(ctx, plan.owner, ESCROW_EVENTS.PLAN_CREATED, {
      owner: plan.owner,
      beneficiaries: plan.beneficiaries,
      shares: plan.shares,
      lockDuration: plan.lockDuration,
      emergencyContact: plan.emergencyContact,
      totalAmount: deposit.amount,
      currency: this.currency,
    } satisfies PlanCreatedPayload);
    this.logger?.info(
      { owner: plan.owner, beneficiaries: plan.beneficiaries.length, deposit: deposit.amount },
      "Inheritance plan created",
    );

    return plan;
  }

  /**
   * Reset the caller's inactivity clock.
   */
  submitProofOfLife(ctx: CallContext): InheritancePlan {
    this.checkContext(ctx);
    const plan = this.requirePlan(ctx.caller);
    this.requireActive(plan);
    if (plan.emergencyMode) {
      throw new EscrowError(
        "EMERGENCY_MODE_ACTIVE",
        `Plan of '${plan.owner}' is in emergency mode`,
      );
    }

    const updated: InheritancePlan = { ...plan, lastProofOfLife: ctx.now };
    this.plans.put(updated);

    this.emit(ctx, plan.owner, ESCROW_EVENTS.PROOF_OF_LIFE_SUBMITTED, {
      owner: plan.owner,
      timestamp: ctx.now,
    } satisfies ProofOfLifeSubmittedPayload);
    this.logger?.info({ owner: plan.owner, at: ctx.now }, "Proof of life submitted");

    return updated;
  }

  /**
   * Top up the caller's plan. Allowed in emergency mode; a drained plan
   * stays inactive.
   */
  addFunds(ctx: CallContext, amount: Money): InheritancePlan {
    this.checkContext(ctx);
    const plan = this.requirePlan(ctx.caller);
    this.requireActive(plan);
    const topUp = this.toLedgerMoney(amount, "Amount");
    if (!isPositive(topUp)) {
      throw new EscrowError(
        "INSUFFICIENT_FUNDS",
        `Amount must be greater than zero, got ${topUp.amount}`,
      );
    }

    const updated: InheritancePlan = {
      ...plan,
      totalAmount: addMoney(plan.totalAmount, topUp),
      fundedAmount: addMoney(plan.fundedAmount, topUp),
    };
    this.plans.put(updated);
    this.totalLocked = addMoney(this.totalLocked, topUp);

    this.emit(ctx, plan.owner, ESCROW_EVENTS.FUNDS_ADDED, {
      owner: plan.owner,
      amount: topUp.amount,
      totalAmount: updated.totalAmount.amount,
      currency: this.currency,
    } satisfies FundsAddedPayload);
    this.logger?.info(
      { owner: plan.owner, amount: topUp.amount, totalAmount: updated.totalAmount.amount },
      "Funds added",
    );

    return updated;
  }

  /**
   * Replace the caller's beneficiary list. Claim records are untouched,
   * so a re-added beneficiary who already claimed stays blocked.
   */
  updateBeneficiaries(
    ctx: CallContext,
    beneficiaries: readonly Identity[],
    shares: readonly number[],
  ): InheritancePlan {
    this.checkContext(ctx);
    const plan = this.requirePlan(ctx.caller);
    if (plan.emergencyMode) {
      throw new EscrowError(
        "EMERGENCY_MODE_ACTIVE",
        `Plan of '${plan.owner}' is in emergency mode`,
      );
    }
    validateListShape(beneficiaries, shares);
    validateEntries(beneficiaries, shares);
    validateEmergencyContact(plan.owner, plan.emergencyContact, beneficiaries);

    for (const previous of plan.beneficiaries) {
      this.index.revoke(plan.owner, previous);
    }
    for (const next of beneficiaries) {
      this.index.grant(plan.owner, next);
    }

    const updated: InheritancePlan = {
      ...plan,
      beneficiaries: [...beneficiaries],
      shares: [...shares],
    };
    this.plans.put(updated);

    this.emit(ctx, plan.owner, ESCROW_EVENTS.BENEFICIARIES_UPDATED, {
      owner: plan.owner,
      beneficiaries: updated.beneficiaries,
      shares: updated.shares,
    } satisfies BeneficiariesUpdatedPayload);
    this.logger?.info(
      { owner: plan.owner, beneficiaries: updated.beneficiaries.length },
      "Beneficiaries updated",
    );

    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Emergency gate
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pause claims on `owner`'s plan. Only its emergency contact may.
   */
  activateEmergencyRecovery(ctx: CallContext, owner: Identity): InheritancePlan {
    this.checkContext(ctx);
    const plan = this.requirePlan(owner);
    if (ctx.caller !== plan.emergencyContact) {
      throw new EscrowError(
        "UNAUTHORIZED_ACCESS",
        `'${ctx.caller}' is not the emergency contact of '${owner}'`,
      );
    }
    this.requireActive(plan);
    if (plan.emergencyMode) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `Plan of '${owner}' is already in emergency mode`,
      );
    }

    const updated: InheritancePlan = { ...plan, emergencyMode: true };
    this.plans.put(updated);

    this.emit(ctx, owner, ESCROW_EVENTS.EMERGENCY_ACTIVATED, {
      owner,
      activatedBy: ctx.caller,
    } satisfies EmergencyActivatedPayload);
    this.logger?.info({ owner, activatedBy: ctx.caller }, "Emergency mode activated");

    return updated;
  }

  /**
   * Resume claims. The plan is `owner`'s when given, else the caller's
   * own; the caller must be its owner or emergency contact.
   */
  deactivateEmergencyRecovery(ctx: CallContext, owner?: Identity): InheritancePlan {
    this.checkContext(ctx);
    const plan = this.requirePlan(owner ?? ctx.caller);
    if (ctx.caller !== plan.owner && ctx.caller !== plan.emergencyContact) {
      throw new EscrowError(
        "UNAUTHORIZED_ACCESS",
        `'${ctx.caller}' may not lift emergency mode on the plan of '${plan.owner}'`,
      );
    }
    if (!plan.emergencyMode) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `Plan of '${plan.owner}' is not in emergency mode`,
      );
    }

    const updated: InheritancePlan = { ...plan, emergencyMode: false };
    this.plans.put(updated);

    this.emit(ctx, plan.owner, ESCROW_EVENTS.EMERGENCY_DEACTIVATED, {
      owner: plan.owner,
      deactivatedBy: ctx.caller,
    } satisfies EmergencyDeactivatedPayload);
    this.logger?.info(
      { owner: plan.owner, deactivatedBy: ctx.caller },
      "Emergency mode deactivated",
    );

    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Claims
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Claim the caller's share of `owner`'s plan.
   *
   * Returns the amount transferred: floor(base × share / 100), where the
   * base follows the configured ShareBasis, capped at the remaining
   * balance. Rounding dust stays in the plan.
   */
  claimInheritance(ctx: CallContext, owner: Identity): Money {
    this.checkContext(ctx);
    const { caller } = ctx;

    const plan = this.requirePlan(owner);
    if (!this.index.isAuthorized(owner, caller)) {
      throw new EscrowError(
        "UNAUTHORIZED_ACCESS",
        `'${caller}' is not an authorized beneficiary of '${owner}'`,
      );
    }
    if (plan.emergencyMode) {
      throw new EscrowError("EMERGENCY_MODE_ACTIVE", `Plan of '${owner}' is in emergency mode`);
    }
    this.requireActive(plan);
    const unlockAt = plan.lastProofOfLife + plan.lockDuration;
    if (ctx.now < unlockAt) {
      throw new EscrowError(
        "TIME_LOCK_NOT_EXPIRED",
        `Plan of '${owner}' unlocks in ${String(unlockAt - ctx.now)} seconds`,
      );
    }
    if (this.claims.hasClaimed(owner, caller)) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        this.claims.claimScope === "global"
          ? `'${caller}' has already claimed an inheritance`
          : `'${caller}' has already claimed from '${owner}'`,
      );
    }

    const amount = this.payoutFor(plan, caller);
    const remaining = subtractMoney(plan.totalAmount, amount);
    const drained = isZero(remaining);

    // Effects
    const previousClaim = this.claims.record(owner, caller, amount);
    this.plans.put({ ...plan, totalAmount: remaining, isActive: !drained });
    this.totalLocked = subtractMoney(this.totalLocked, amount);
    this.index.revoke(owner, caller);
    if (drained) {
      this.activePlans -= 1;
    }

    // Interaction
    if (!isZero(amount)) {
      let transferred = false;
      let failure: unknown;
      try {
        transferred = this.funds.transfer(ctx, caller, amount);
      } catch (err) {
        failure = err;
      }

      if (!transferred) {
        this.compensateClaim(owner, caller, amount, previousClaim);
        this.logger?.warn(
          { owner, beneficiary: caller, amount: amount.amount },
          "Claim transfer failed, rolled back",
        );
        throw new EscrowError(
          "INSUFFICIENT_FUNDS",
          `Transfer of ${amount.amount} ${this.currency} to '${caller}' failed`,
          failure === undefined ? undefined : { cause: failure },
        );
      }
    }

    this.emit(ctx, owner, ESCROW_EVENTS.CLAIM_EXECUTED, {
      owner,
      beneficiary: caller,
      amount: amount.amount,
      remaining: remaining.amount,
      currency: this.currency,
    } satisfies ClaimExecutedPayload);
    this.logger?.info(
      { owner, beneficiary: caller, amount: amount.amount, remaining: remaining.amount },
      "Inheritance claimed",
    );

    return amount;
  }

  private payoutFor(plan: InheritancePlan, beneficiary: Identity): Money {
    const share = this.getBeneficiaryShare(plan.owner, beneficiary);
    const base = this.shareBasis === "funded" ? plan.fundedAmount : plan.totalAmount;
    const portion = percentOf(base, share);
    return compareMoney(portion, plan.totalAmount) > 0 ? plan.totalAmount : portion;
  }

  /**
   * Undo one claim's effects against the current state, which may
   * already carry the effects of re-entrant calls.
   */
  private compensateClaim(
    owner: Identity,
    beneficiary: Identity,
    amount: Money,
    previousClaim: Money | undefined,
  ): void {
    const current = this.plans.get(owner);
    if (current !== undefined) {
      const restored = addMoney(current.totalAmount, amount);
      // The plan was active when the claim started; only a drain could
      // have deactivated it since.
      const reactivate = !current.isActive && isPositive(restored);
      this.plans.put({
        ...current,
        totalAmount: restored,
        isActive: current.isActive || reactivate,
      });
      if (reactivate) {
        this.activePlans += 1;
      }
      if (current.beneficiaries.includes(beneficiary)) {
        this.index.grant(owner, beneficiary);
      }
    }
    this.totalLocked = addMoney(this.totalLocked, amount);
    this.claims.restore(owner, beneficiary, previousClaim);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getPlanDetails(owner: Identity): InheritancePlan | undefined {
    return this.plans.get(owner);
  }

  hasPlan(owner: Identity): boolean {
    return this.plans.has(owner);
  }

  listPlans(): readonly InheritancePlan[] {
    return this.plans.list();
  }

  /**
   * Whether any beneficiary could claim from `owner`'s plan at `now`.
   */
  canClaim(owner: Identity, now: number): boolean {
    const plan = this.plans.get(owner);
    if (plan === undefined) return false;
    return (
      plan.isActive &&
      !plan.emergencyMode &&
      isPositive(plan.totalAmount) &&
      now >= plan.lastProofOfLife + plan.lockDuration
    );
  }

  /**
   * Seconds until the lock expires; 0 once expired or when inactive.
   */
  timeUntilClaimable(owner: Identity, now: number): number {
    const plan = this.requirePlan(owner);
    if (!plan.isActive) return 0;
    return Math.max(0, plan.lastProofOfLife + plan.lockDuration - now);
  }

  /**
   * Share percentage of `beneficiary` in `owner`'s plan, 0 if absent.
   */
  getBeneficiaryShare(owner: Identity, beneficiary: Identity): number {
    const plan = this.plans.get(owner);
    if (plan === undefined) return 0;
    const i = plan.beneficiaries.indexOf(beneficiary);
    return i === -1 ? 0 : (plan.shares[i] ?? 0);
  }

  isAuthorized(owner: Identity, beneficiary: Identity): boolean {
    return this.index.isAuthorized(owner, beneficiary);
  }

  /** Owners whose plans the beneficiary may currently claim from. */
  plansForBeneficiary(beneficiary: Identity): readonly Identity[] {
    return this.index.ownersFor(beneficiary);
  }

  getClaimedAmount(owner: Identity, beneficiary: Identity): Money {
    return this.claims.amountFor(owner, beneficiary) ?? zeroMoney(this.currency, this.decimals);
  }

  getStats(): EscrowStats {
    return {
      activePlans: this.activePlans,
      totalLocked: this.totalLocked,
    };
  }

  /**
   * Check the authorization index and the aggregates against the plans.
   *
   * - Every index entry names a listed beneficiary of an existing plan
   * - Every listed beneficiary without an index entry has claimed from
   *   that plan
   * - activePlans and totalLocked match the plans
   */
  verifyIndexConsistency(): IndexConsistencyResult {
    const issues: string[] = [];

    for (const [owner, beneficiary] of this.index.entries()) {
      const plan = this.plans.get(owner);
      if (plan === undefined) {
        issues.push(`Index authorizes '${beneficiary}' on missing plan '${owner}'`);
      } else if (!plan.beneficiaries.includes(beneficiary)) {
        issues.push(`Index authorizes '${beneficiary}' who is not listed on plan '${owner}'`);
      }
    }

    let active = 0;
    let locked = zeroMoney(this.currency, this.decimals);
    for (const plan of this.plans.list()) {
      if (plan.isActive) active += 1;
      locked = addMoney(locked, plan.totalAmount);
      for (const beneficiary of plan.beneficiaries) {
        if (
          !this.index.isAuthorized(plan.owner, beneficiary) &&
          this.claims.amountFor(plan.owner, beneficiary) === undefined
        ) {
          issues.push(`'${beneficiary}' is listed on plan '${plan.owner}' but neither authorized nor claimed`);
        }
      }
    }

    if (active !== this.activePlans) {
      issues.push(`activePlans is ${String(this.activePlans)}, plans show ${String(active)}`);
    }
    if (compareMoney(locked, this.totalLocked) !== 0) {
      issues.push(`totalLocked is ${this.totalLocked.amount}, plans hold ${locked.amount}`);
    }

    return { consistent: issues.length === 0, issues };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Serialize the ledger state. Authorizations are listed in plan and
   * beneficiary order, so equal states give equal snapshots.
   */
  snapshot(): EscrowSnapshot {
    const plans = this.plans.list();
    const authorizations: (readonly [Identity, Identity])[] = [];
    for (const plan of plans) {
      for (const beneficiary of plan.beneficiaries) {
        if (this.index.isAuthorized(plan.owner, beneficiary)) {
          authorizations.push([plan.owner, beneficiary]);
        }
      }
    }

    return {
      version: 1,
      currency: this.currency,
      decimals: this.decimals,
      claimScope: this.claims.claimScope,
      shareBasis: this.shareBasis,
      plans,
      authorizations,
      claims: this.claims.list(),
      activePlans: this.activePlans,
      totalLocked: this.totalLocked.amount,
    };
  }

  /**
   * Restore a ledger from a snapshot. Collaborators are supplied anew.
   * Snapshots usually come from storage, so plans and claims are checked
   * before anything is restored.
   */
  static fromSnapshot(
    snapshot: EscrowSnapshot,
    options: Omit<EscrowLedgerOptions, "config">,
  ): EscrowLedger {
    checkSnapshot(snapshot);
    const ledger = new EscrowLedger({
      ...options,
      config: {
        currency: snapshot.currency,
        decimals: snapshot.decimals,
        claimScope: snapshot.claimScope,
        shareBasis: snapshot.shareBasis,
      },
    });

    for (const plan of snapshot.plans) {
      ledger.plans.put(plan);
    }
    for (const [owner, beneficiary] of snapshot.authorizations) {
      ledger.index.grant(owner, beneficiary);
    }
    for (const claim of snapshot.claims) {
      ledger.claims.record(claim.owner, claim.beneficiary, claim.amount);
    }
    ledger.activePlans = snapshot.activePlans;
    ledger.totalLocked = toMoney(snapshot.totalLocked, snapshot.currency, snapshot.decimals);

    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private checkContext(ctx: CallContext): void {
    if (!isIdentity(ctx.caller)) {
      throw new EscrowError("UNAUTHORIZED_ACCESS", "Caller identity is required");
    }
    if (!Number.isInteger(ctx.now) || ctx.now < 0 || ctx.now > MAX_TIMESTAMP) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `Current time must be an integer between 0 and ${String(MAX_TIMESTAMP)}, got ${String(ctx.now)}`,
      );
    }
  }

  private requirePlan(owner: Identity): InheritancePlan {
    const plan = this.plans.get(owner);
    if (plan === undefined) {
      throw new EscrowError("INHERITANCE_NOT_FOUND", `No inheritance plan for '${owner}'`);
    }
    return plan;
  }

  private requireActive(plan: InheritancePlan): void {
    if (!plan.isActive) {
      throw new EscrowError("INVALID_PARAMETERS", `Plan of '${plan.owner}' is no longer active`);
    }
  }

  /**
   * Normalize an amount into the ledger currency.
   */
  private toLedgerMoney(money: Money, label: string): Money {
    if (money.currency !== this.currency || money.decimals !== this.decimals) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `${label} must be in ${this.currency} with ${String(this.decimals)} decimals`,
      );
    }
    try {
      return toMoney(money.amount, this.currency, this.decimals);
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new EscrowError("INVALID_PARAMETERS", err.message, { cause: err });
      }
      throw err;
    }
  }

  private emit(
    ctx: CallContext,
    owner: Identity,
    type: EscrowEventType,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    if (this.events === undefined) return;

    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(ctx.now * 1000).toISOString(),
        actor: ctx.caller,
        correlationId: ctx.correlationId ?? randomUUID(),
        source: "escrow",
      },
      payload,
    };
    this.events.append(planStreamId(owner), [event]);
  }
}

function checkSnapshot(snapshot: EscrowSnapshot): void {
  const inLedgerCurrency = (value: unknown): boolean =>
    isMoney(value) &&
    value.currency === snapshot.currency &&
    value.decimals === snapshot.decimals;

  for (const plan of snapshot.plans) {
    if (
      !isIdentity(plan.owner) ||
      !plan.beneficiaries.every(isIdentity) ||
      !inLedgerCurrency(plan.totalAmount) ||
      !inLedgerCurrency(plan.fundedAmount)
    ) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `Snapshot plan of '${plan.owner}' is malformed`,
      );
    }
  }
  for (const claim of snapshot.claims) {
    if (
      !isIdentity(claim.owner) ||
      !isIdentity(claim.beneficiary) ||
      !inLedgerCurrency(claim.amount)
    ) {
      throw new EscrowError(
        "INVALID_PARAMETERS",
        `Snapshot claim of '${claim.beneficiary}' on '${claim.owner}' is malformed`,
      );
    }
  }
}
