/**
 * Property-Based Tests for @vigil/escrow
 *
 * 1. Creation succeeds exactly when shares are valid and sum to 100
 * 2. Claims conserve funds: paid + remaining == funded
 * 3. The authorization index and aggregates stay consistent, including
 *    across failed transfers
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { EscrowError } from "../src/types.js";
import { LOCK, T0, ctx, makeLedger, planParams, unit } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbShares: fc.Arbitrary<number[]> = fc
  .uniqueArray(fc.integer({ min: 1, max: 99 }), { minLength: 0, maxLength: 19 })
  .map((cuts) => {
    const points = [0, ...[...cuts].sort((a, b) => a - b), 100];
    const shares: number[] = [];
    for (let i = 1; i < points.length; i++) {
      shares.push((points[i] ?? 100) - (points[i - 1] ?? 0));
    }
    return shares;
  });

const arbDeposit = fc.bigInt({ min: 1n, max: 10n ** 20n }).map((v) => unit(v.toString()));

function heirs(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `heir-${String(i)}`);
}

// =============================================================================
// Properties
// =============================================================================

describe("share validation", () => {
  it("accepts a list exactly when its shares sum to 100", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 1, max: 100 }), { minLength: 1, maxLength: 20 }),
        (shares) => {
          const { ledger } = makeLedger();
          const sum = shares.reduce((a, b) => a + b, 0);
          let accepted = true;
          try {
            ledger.createPlan(
              ctx("alice"),
              planParams({ beneficiaries: heirs(shares.length), shares }),
            );
          } catch (err) {
            expect(err).toBeInstanceOf(EscrowError);
            expect(err instanceof EscrowError ? err.code : "").toBe("INVALID_PARAMETERS");
            accepted = false;
          }
          expect(accepted).toBe(sum === 100);
        },
      ),
    );
  });
});

describe("claims", () => {
  it("conserve funds and keep the index consistent", () => {
    fc.assert(
      fc.property(
        arbDeposit,
        arbShares,
        fc.array(fc.boolean(), { minLength: 20, maxLength: 20 }),
        fc.constantFrom("funded" as const, "remaining" as const),
        (deposit, shares, failures, shareBasis) => {
          const { ledger, transfer } = makeLedger({ shareBasis });
          const beneficiaries = heirs(shares.length);
          ledger.createPlan(ctx("alice"), planParams({ beneficiaries, shares, deposit }));

          let paid = 0n;
          beneficiaries.forEach((heir, i) => {
            transfer.mode = failures[i] === true ? "fail" : "ok";
            try {
              paid += BigInt(ledger.claimInheritance(ctx(heir, T0 + LOCK), "alice").amount);
            } catch (err) {
              expect(err instanceof EscrowError ? err.code : "").toBe("INSUFFICIENT_FUNDS");
            }
            expect(ledger.verifyIndexConsistency()).toEqual({ consistent: true, issues: [] });
          });

          const plan = ledger.getPlanDetails("alice");
          const remaining = BigInt(plan?.totalAmount.amount ?? "0");
          expect(remaining >= 0n).toBe(true);
          expect(paid + remaining).toBe(BigInt(deposit.amount));
          expect(plan?.isActive).toBe(remaining > 0n);
        },
      ),
    );
  });
});
