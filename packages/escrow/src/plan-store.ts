/**
 * Plan storage.
 *
 * The ledger owns a PlanStore handle and goes through it for every read
 * and write. Plans are immutable values; an update replaces the record.
 */

import type { Identity } from "@vigil/types";
import type { InheritancePlan } from "./types.js";

export interface PlanStore {
  get(owner: Identity): InheritancePlan | undefined;
  has(owner: Identity): boolean;
  put(plan: InheritancePlan): void;
  list(): readonly InheritancePlan[];
  readonly size: number;
}

/**
 * Map-backed PlanStore. State is lost when the process exits.
 */
export class InMemoryPlanStore implements PlanStore {
  private readonly plans = new Map<Identity, InheritancePlan>();

  get(owner: Identity): InheritancePlan | undefined {
    return this.plans.get(owner);
  }

  has(owner: Identity): boolean {
    return this.plans.has(owner);
  }

  put(plan: InheritancePlan): void {
    this.plans.set(plan.owner, plan);
  }

  /** Plans in creation order. */
  list(): readonly InheritancePlan[] {
    return [...this.plans.values()];
  }

  get size(): number {
    return this.plans.size;
  }
}
