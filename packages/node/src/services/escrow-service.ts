/**
 * EscrowService: Composition root for the escrow packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. It owns the ledger, the audit log and the custody
 * wallet, and turns request identity and clock time into a CallContext.
 */

import { EscrowLedger } from "@vigil/escrow";
import type {
  ClaimScope,
  EscrowLogger,
  EscrowStats,
  EscrowSnapshot,
  IndexConsistencyResult,
  InheritancePlan,
  ShareBasis,
} from "@vigil/escrow";
import { InMemoryEventStore, createEscrowCatalog } from "@vigil/event-store";
import type {
  EventCatalog,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
} from "@vigil/event-store";
import { subtractMoney } from "@vigil/ledger";
import type { CallContext, Identity, Money } from "@vigil/types";
import { CustodyWallet, registerCustodyEvents } from "./custody-wallet.js";
import type {
  AddFundsDto,
  CreatePlanDto,
  UpdateBeneficiariesDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EscrowServiceConfig {
  readonly currency: string;
  readonly decimals: number;
  readonly claimScope?: ClaimScope;
  readonly shareBasis?: ShareBasis;

  /** Unix seconds. Default: wall clock. */
  readonly clock?: () => number;

  readonly logger?: EscrowLogger;
}

export interface PlanView extends InheritancePlan {
  readonly canClaim: boolean;
  readonly timeUntilClaimable: number;
}

export interface ServiceStats extends EscrowStats {
  readonly custodyBalance: Money;
  readonly claimScope: ClaimScope;
  readonly shareBasis: ShareBasis;
}

export interface HealthReport {
  readonly integrity: EventStoreIntegrityResult;
  readonly index: IndexConsistencyResult;
  /** Events whose payload the catalog rejects */
  readonly invalidEvents: number;
  /** Custody holds exactly what the plans lock */
  readonly custodyBalanced: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class EscrowService {
  readonly ledger: EscrowLedger;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly custody: CustodyWallet;

  private readonly clock: () => number;
  private readonly currency: string;
  private readonly decimals: number;
  private _ready = false;

  constructor(config: EscrowServiceConfig) {
    this.currency = config.currency;
    this.decimals = config.decimals;
    this.clock = config.clock ?? (() => Math.floor(Date.now() / 1000));
    this.eventStore = new InMemoryEventStore();
    this.catalog = createEscrowCatalog();
    registerCustodyEvents(this.catalog);

    this.custody = new CustodyWallet({
      currency: config.currency,
      decimals: config.decimals,
      events: this.eventStore,
    });

    this.ledger = new EscrowLedger({
      config: {
        currency: config.currency,
        decimals: config.decimals,
        ...(config.claimScope !== undefined ? { claimScope: config.claimScope } : {}),
        ...(config.shareBasis !== undefined ? { shareBasis: config.shareBasis } : {}),
      },
      transfer: this.custody,
      events: this.eventStore,
      ...(config.logger !== undefined ? { logger: config.logger } : {}),
    });

    this._ready = true;
  }

  /**
   * Build the context of one call. Time is read once, here.
   */
  context(caller: Identity, correlationId: string): CallContext {
    return { caller, now: this.clock(), correlationId };
  }

  private money(amount: string): Money {
    return { amount, currency: this.currency, decimals: this.decimals };
  }

  // ─── Plan Lifecycle ────────────────────────────────────────────────

  createPlan(ctx: CallContext, dto: CreatePlanDto): InheritancePlan {
    const plan = this.ledger.createPlan(ctx, {
      beneficiaries: dto.beneficiaries,
      shares: dto.shares,
      lockDuration: dto.lockDuration,
      emergencyContact: dto.emergencyContact,
      deposit: this.money(dto.deposit),
      ...(dto.description !== undefined ? { description: dto.description } : {}),
    });
    this.custody.deposit(ctx, plan.totalAmount);
    return plan;
  }

  submitProofOfLife(ctx: CallContext): InheritancePlan {
    return this.ledger.submitProofOfLife(ctx);
  }

  addFunds(ctx: CallContext, dto: AddFundsDto): InheritancePlan {
    const before = this.ledger.getPlanDetails(ctx.caller);
    const plan = this.ledger.addFunds(ctx, this.money(dto.amount));
    // addFunds succeeded, so the plan existed before it
    if (before !== undefined) {
      this.custody.deposit(ctx, subtractMoney(plan.fundedAmount, before.fundedAmount));
    }
    return plan;
  }

  updateBeneficiaries(ctx: CallContext, dto: UpdateBeneficiariesDto): InheritancePlan {
    return this.ledger.updateBeneficiaries(ctx, dto.beneficiaries, dto.shares);
  }

  activateEmergency(ctx: CallContext, owner: Identity): InheritancePlan {
    return this.ledger.activateEmergencyRecovery(ctx, owner);
  }

  deactivateEmergency(ctx: CallContext, owner: Identity): InheritancePlan {
    return this.ledger.deactivateEmergencyRecovery(ctx, owner);
  }

  claim(ctx: CallContext, owner: Identity): Money {
    return this.ledger.claimInheritance(ctx, owner);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getPlan(owner: Identity): PlanView | undefined {
    const plan = this.ledger.getPlanDetails(owner);
    if (plan === undefined) return undefined;
    const now = this.clock();
    return {
      ...plan,
      canClaim: this.ledger.canClaim(owner, now),
      timeUntilClaimable: this.ledger.timeUntilClaimable(owner, now),
    };
  }

  listPlans(beneficiary?: Identity): readonly InheritancePlan[] {
    if (beneficiary === undefined) {
      return this.ledger.listPlans();
    }
    const owners = new Set(this.ledger.plansForBeneficiary(beneficiary));
    return this.ledger.listPlans().filter((plan) => owners.has(plan.owner));
  }

  getShare(
    owner: Identity,
    beneficiary: Identity,
  ): { share: number; authorized: boolean; claimed: Money } {
    return {
      share: this.ledger.getBeneficiaryShare(owner, beneficiary),
      authorized: this.ledger.isAuthorized(owner, beneficiary),
      claimed: this.ledger.getClaimedAmount(owner, beneficiary),
    };
  }

  getStats(): ServiceStats {
    return {
      ...this.ledger.getStats(),
      custodyBalance: this.custody.getBalance(),
      claimScope: this.ledger.claimScope,
      shareBasis: this.ledger.basis,
    };
  }

  snapshot(): EscrowSnapshot {
    return this.ledger.snapshot();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  /**
   * Deep check used by /ready: hash chain, catalog, index and custody.
   */
  checkHealth(): HealthReport {
    const integrity = this.eventStore.verifyIntegrity();
    const invalidEvents = this.eventStore
      .readAll()
      .filter((stored) => !this.catalog.validate(stored.event.type, stored.event.payload))
      .length;
    const locked = this.ledger.getStats().totalLocked;
    const balance = this.custody.getBalance();

    return {
      integrity,
      index: this.ledger.verifyIndexConsistency(),
      invalidEvents,
      custodyBalanced: locked.amount === balance.amount,
    };
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}
