/**
 * Authorization index: (owner, beneficiary) → authorized.
 *
 * A secondary index over plan beneficiaries, updated by the ledger in
 * the same call as the plan record. Absent entries are false.
 */

import type { Identity } from "@vigil/types";

export class AuthorizationIndex {
  private readonly byOwner = new Map<Identity, Set<Identity>>();

  grant(owner: Identity, beneficiary: Identity): void {
    let set = this.byOwner.get(owner);
    if (set === undefined) {
      set = new Set();
      this.byOwner.set(owner, set);
    }
    set.add(beneficiary);
  }

  revoke(owner: Identity, beneficiary: Identity): void {
    const set = this.byOwner.get(owner);
    if (set === undefined) return;
    set.delete(beneficiary);
    if (set.size === 0) {
      this.byOwner.delete(owner);
    }
  }

  isAuthorized(owner: Identity, beneficiary: Identity): boolean {
    return this.byOwner.get(owner)?.has(beneficiary) ?? false;
  }

  /** Owners whose plans currently authorize the beneficiary. */
  ownersFor(beneficiary: Identity): readonly Identity[] {
    const owners: Identity[] = [];
    for (const [owner, set] of this.byOwner) {
      if (set.has(beneficiary)) owners.push(owner);
    }
    return owners;
  }

  entries(): readonly (readonly [Identity, Identity])[] {
    const result: (readonly [Identity, Identity])[] = [];
    for (const [owner, set] of this.byOwner) {
      for (const beneficiary of set) {
        result.push([owner, beneficiary]);
      }
    }
    return result;
  }
}
