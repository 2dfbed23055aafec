/**
 * Claim registry.
 *
 * Records are always kept per (owner, beneficiary). The scope only
 * changes what counts as "already claimed": any record on the same plan,
 * or a positive total across all plans.
 */

import { addMoney, isPositive } from "@vigil/ledger";
import type { Identity, Money } from "@vigil/types";
import type { ClaimRecord, ClaimScope } from "./types.js";

export class ClaimRegistry {
  private readonly records = new Map<Identity, Map<Identity, Money>>();
  private readonly scope: ClaimScope;

  constructor(scope: ClaimScope) {
    this.scope = scope;
  }

  get claimScope(): ClaimScope {
    return this.scope;
  }

  /** Returns the record this one replaces, if any. */
  record(owner: Identity, beneficiary: Identity, amount: Money): Money | undefined {
    let claims = this.records.get(owner);
    if (claims === undefined) {
      claims = new Map();
      this.records.set(owner, claims);
    }
    const previous = claims.get(beneficiary);
    claims.set(beneficiary, amount);
    return previous;
  }

  /**
   * Put back the record a failed claim replaced, or drop it when there
   * was none.
   */
  restore(owner: Identity, beneficiary: Identity, previous: Money | undefined): void {
    if (previous !== undefined) {
      this.record(owner, beneficiary, previous);
      return;
    }
    const claims = this.records.get(owner);
    if (claims === undefined) return;
    claims.delete(beneficiary);
    if (claims.size === 0) {
      this.records.delete(owner);
    }
  }

  amountFor(owner: Identity, beneficiary: Identity): Money | undefined {
    return this.records.get(owner)?.get(beneficiary);
  }

  /**
   * Whether a claim by `beneficiary` against `owner` is blocked by an
   * earlier one.
   */
  hasClaimed(owner: Identity, beneficiary: Identity): boolean {
    if (this.scope === "per-plan") {
      return this.records.get(owner)?.has(beneficiary) ?? false;
    }
    let total: Money | undefined;
    for (const claims of this.records.values()) {
      const amount = claims.get(beneficiary);
      if (amount === undefined) continue;
      total = total === undefined ? amount : addMoney(total, amount);
    }
    return total !== undefined && isPositive(total);
  }

  list(): readonly ClaimRecord[] {
    const result: ClaimRecord[] = [];
    for (const [owner, claims] of this.records) {
      for (const [beneficiary, amount] of claims) {
        result.push({ owner, beneficiary, amount });
      }
    }
    return result;
  }
}
