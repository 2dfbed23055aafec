/**
 * Tests for claimInheritance: time lock, payouts, claim scope,
 * rollback and re-entrancy.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EscrowError } from "../src/types.js";
import { EscrowLedger } from "../src/escrow-ledger.js";
import { DAY, LOCK, T0, RecordingTransfer, ctx, makeLedger, planParams, unit } from "./helpers.js";

const UNLOCKED = T0 + LOCK;

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EscrowError ? err.code : "NOT_AN_ESCROW_ERROR";
  }
  return undefined;
}

describe("claimInheritance", () => {
  let ledger: EscrowLedger;
  let transfer: RecordingTransfer;

  beforeEach(() => {
    ({ ledger, transfer } = makeLedger());
  });

  // ─── Scenarios ─────────────────────────────────────────────────────

  describe("two beneficiaries at 60/40", () => {
    beforeEach(() => {
      ledger.createPlan(ctx("alice"), planParams());
    });

    it("rejects an out-of-range call time without paying or recording", () => {
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", 9_000_000_000_000), "alice"))).toBe(
        "INVALID_PARAMETERS",
      );
      expect(transfer.payouts).toEqual([]);
      expect(ledger.isAuthorized("alice", "bob")).toBe(true);
      expect(ledger.getStats()).toEqual({ activePlans: 1, totalLocked: unit("100") });
    });

    it("stays locked until 30 days of inactivity have passed", () => {
      expect(ledger.canClaim("alice", T0 + 29 * DAY)).toBe(false);
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", T0 + 29 * DAY), "alice"))).toBe(
        "TIME_LOCK_NOT_EXPIRED",
      );
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED - 1), "alice"))).toBe(
        "TIME_LOCK_NOT_EXPIRED",
      );
      expect(transfer.payouts).toEqual([]);
    });

    it("pays 60 then 40 and deactivates the drained plan", () => {
      expect(ledger.canClaim("alice", UNLOCKED)).toBe(true);

      expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("60"));
      expect(ledger.getPlanDetails("alice")?.isActive).toBe(true);
      expect(ledger.getStats()).toEqual({ activePlans: 1, totalLocked: unit("40") });

      expect(ledger.claimInheritance(ctx("carol", UNLOCKED + DAY), "alice")).toEqual(unit("40"));

      const plan = ledger.getPlanDetails("alice");
      expect(plan?.totalAmount).toEqual(unit("0"));
      expect(plan?.isActive).toBe(false);
      expect(ledger.getStats()).toEqual({ activePlans: 0, totalLocked: unit("0") });
      expect(ledger.canClaim("alice", UNLOCKED)).toBe(false);
      expect(ledger.timeUntilClaimable("alice", T0)).toBe(0);
      expect(transfer.payouts).toEqual([
        { to: "bob", amount: "60" },
        { to: "carol", amount: "40" },
      ]);
    });

    it("revokes the claimant and records the amount", () => {
      ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");

      expect(ledger.isAuthorized("alice", "bob")).toBe(false);
      expect(ledger.isAuthorized("alice", "carol")).toBe(true);
      expect(ledger.getClaimedAmount("alice", "bob")).toEqual(unit("60"));
      expect(ledger.getClaimedAmount("alice", "carol")).toEqual(unit("0"));
    });

    it("rejects a repeat claim", () => {
      ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "alice"))).toBe(
        "UNAUTHORIZED_ACCESS",
      );
    });

    it("rejects callers who are not beneficiaries", () => {
      expect(codeOf(() => ledger.claimInheritance(ctx("dave", UNLOCKED), "alice"))).toBe(
        "UNAUTHORIZED_ACCESS",
      );
      expect(codeOf(() => ledger.claimInheritance(ctx("alice", UNLOCKED), "alice"))).toBe(
        "UNAUTHORIZED_ACCESS",
      );
    });

    it("fails for an unknown owner", () => {
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "nobody"))).toBe(
        "INHERITANCE_NOT_FOUND",
      );
    });

    it("reports emergency mode before an unexpired lock", () => {
      ledger.activateEmergencyRecovery(ctx("dave"), "alice");
      expect(codeOf(() => ledger.claimInheritance(ctx("bob", T0), "alice"))).toBe(
        "EMERGENCY_MODE_ACTIVE",
      );
    });
  });

  describe("rounding", () => {
    it("pays 33, 33, 34 from a deposit of 100", () => {
      ledger.createPlan(
        ctx("alice"),
        planParams({ beneficiaries: ["bob", "carol", "erin"], shares: [33, 33, 34] }),
      );

      const paid = ["bob", "carol", "erin"].map(
        (b) => ledger.claimInheritance(ctx(b, UNLOCKED), "alice").amount,
      );

      expect(paid).toEqual(["33", "33", "34"]);
      expect(ledger.getPlanDetails("alice")?.isActive).toBe(false);
    });

    it("pays 3, 3, 3 from a deposit of 10 and strands 1 unit", () => {
      ledger.createPlan(
        ctx("alice"),
        planParams({
          beneficiaries: ["bob", "carol", "erin"],
          shares: [33, 33, 34],
          deposit: unit("10"),
        }),
      );

      const paid = ["bob", "carol", "erin"].map(
        (b) => ledger.claimInheritance(ctx(b, UNLOCKED), "alice").amount,
      );

      expect(paid).toEqual(["3", "3", "3"]);
      const plan = ledger.getPlanDetails("alice");
      expect(plan?.totalAmount).toEqual(unit("1"));
      expect(plan?.isActive).toBe(true);
      expect(ledger.getStats()).toEqual({ activePlans: 1, totalLocked: unit("1") });
    });

    it("floors at the smallest unit of the currency", () => {
      const usdc = new EscrowLedger({
        config: { currency: "USDC", decimals: 6 },
        transfer: new RecordingTransfer(),
      });
      usdc.createPlan(
        ctx("alice"),
        planParams({
          beneficiaries: ["bob", "carol", "erin"],
          shares: [33, 33, 34],
          deposit: { amount: "0.000007", currency: "USDC", decimals: 6 },
        }),
      );

      expect(usdc.claimInheritance(ctx("erin", UNLOCKED), "alice")).toEqual({
        amount: "0.000002",
        currency: "USDC",
        decimals: 6,
      });
    });

    it("succeeds with a zero payout and skips the transfer", () => {
      ledger.createPlan(ctx("alice"), planParams({ deposit: unit("1") }));

      expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("0"));
      expect(transfer.payouts).toEqual([]);
      expect(ledger.isAuthorized("alice", "bob")).toBe(false);
      expect(ledger.getPlanDetails("alice")?.totalAmount).toEqual(unit("1"));
      expect(ledger.verifyIndexConsistency().consistent).toBe(true);
    });
  });

  describe("remaining share basis", () => {
    it("takes each share of the balance left at claim time", () => {
      const { ledger: remaining } = makeLedger({ shareBasis: "remaining" });
      remaining.createPlan(ctx("alice"), planParams());

      expect(remaining.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("60"));
      expect(remaining.claimInheritance(ctx("carol", UNLOCKED), "alice")).toEqual(unit("16"));
      expect(remaining.getPlanDetails("alice")?.totalAmount).toEqual(unit("24"));
      expect(remaining.getPlanDetails("alice")?.isActive).toBe(true);
    });
  });

  describe("funded share basis", () => {
    it("includes top-ups in the base", () => {
      ledger.createPlan(ctx("alice"), planParams());
      ledger.addFunds(ctx("alice"), unit("100"));

      expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("120"));
      expect(ledger.claimInheritance(ctx("carol", UNLOCKED), "alice")).toEqual(unit("80"));
      expect(ledger.getPlanDetails("alice")?.isActive).toBe(false);
    });

    it("never pays more than the remaining balance", () => {
      ledger.createPlan(ctx("alice"), planParams());
      ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");
      ledger.updateBeneficiaries(ctx("alice", UNLOCKED), ["carol", "erin"], [50, 50]);

      expect(ledger.claimInheritance(ctx("carol", UNLOCKED), "alice")).toEqual(unit("40"));
      expect(ledger.getPlanDetails("alice")?.totalAmount).toEqual(unit("0"));
      expect(codeOf(() => ledger.claimInheritance(ctx("erin", UNLOCKED), "alice"))).toBe(
        "INVALID_PARAMETERS",
      );
    });
  });

  // ─── Emergency scenario ────────────────────────────────────────────

  it("blocks claims in emergency mode until the owner lifts it", () => {
    ledger.createPlan(ctx("alice"), planParams());
    ledger.activateEmergencyRecovery(ctx("dave", T0 + 10 * DAY), "alice");

    expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "alice"))).toBe(
      "EMERGENCY_MODE_ACTIVE",
    );
    expect(ledger.canClaim("alice", UNLOCKED)).toBe(false);

    ledger.deactivateEmergencyRecovery(ctx("alice", UNLOCKED));

    expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("60"));
  });

  // ─── Claim scope ───────────────────────────────────────────────────

  describe("claim scope", () => {
    function twoPlans(l: EscrowLedger): void {
      l.createPlan(ctx("alice"), planParams());
      l.createPlan(
        ctx("frank"),
        planParams({ beneficiaries: ["bob"], shares: [100], emergencyContact: "gina" }),
      );
    }

    it("per-plan: a beneficiary claims once from each plan", () => {
      twoPlans(ledger);
      expect(ledger.claimScope).toBe("per-plan");

      ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");
      expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "frank")).toEqual(unit("100"));
    });

    it("global: a beneficiary who claimed anywhere cannot claim again", () => {
      const { ledger: global } = makeLedger({ claimScope: "global" });
      twoPlans(global);

      global.claimInheritance(ctx("bob", UNLOCKED), "alice");

      expect(global.isAuthorized("frank", "bob")).toBe(true);
      expect(codeOf(() => global.claimInheritance(ctx("bob", UNLOCKED), "frank"))).toBe(
        "INVALID_PARAMETERS",
      );
      expect(global.getPlanDetails("frank")?.totalAmount).toEqual(unit("100"));
    });

    it("global: a zero payout does not use up the beneficiary's claim", () => {
      const { ledger: global } = makeLedger({ claimScope: "global" });
      global.createPlan(
        ctx("alice"),
        planParams({ shares: [50, 50], deposit: unit("1") }),
      );
      global.createPlan(
        ctx("frank"),
        planParams({ beneficiaries: ["bob"], shares: [100], emergencyContact: "gina" }),
      );

      expect(global.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("0"));
      expect(global.getClaimedAmount("alice", "bob")).toEqual(unit("0"));

      expect(global.claimInheritance(ctx("bob", UNLOCKED), "frank")).toEqual(unit("100"));
      expect(codeOf(() => global.claimInheritance(ctx("carol", UNLOCKED), "frank"))).toBe(
        "UNAUTHORIZED_ACCESS",
      );
    });
  });

  // ─── Rollback ──────────────────────────────────────────────────────

  describe("failed transfer", () => {
    beforeEach(() => {
      ledger.createPlan(ctx("alice"), planParams());
    });

    it("rolls back every effect when the transfer returns false", () => {
      const before = ledger.snapshot();
      transfer.mode = "fail";

      expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "alice"))).toBe(
        "INSUFFICIENT_FUNDS",
      );
      expect(ledger.snapshot()).toEqual(before);
      expect(ledger.isAuthorized("alice", "bob")).toBe(true);
    });

    it("rolls back and keeps the cause when the transfer throws", () => {
      const before = ledger.snapshot();
      transfer.mode = "throw";

      let caught: unknown;
      try {
        ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(EscrowError);
      const cause = caught instanceof EscrowError ? caught.cause : undefined;
      expect(cause).toBeInstanceOf(Error);
      expect(cause instanceof Error ? cause.message : "").toBe("transfer exploded");
      expect(ledger.snapshot()).toEqual(before);
    });

    it("reactivates a plan whose draining claim failed", () => {
      ledger.claimInheritance(ctx("bob", UNLOCKED), "alice");
      transfer.mode = "fail";

      expect(codeOf(() => ledger.claimInheritance(ctx("carol", UNLOCKED), "alice"))).toBe(
        "INSUFFICIENT_FUNDS",
      );
      expect(ledger.getPlanDetails("alice")?.isActive).toBe(true);
      expect(ledger.getStats()).toEqual({ activePlans: 1, totalLocked: unit("40") });

      transfer.mode = "ok";
      expect(ledger.claimInheritance(ctx("carol", UNLOCKED), "alice")).toEqual(unit("40"));
    });
  });

  // ─── Re-entrancy ───────────────────────────────────────────────────

  describe("re-entrant calls during the transfer", () => {
    beforeEach(() => {
      ledger.createPlan(ctx("alice"), planParams());
    });

    it("see the post-claim state and cannot claim twice", () => {
      const observed: { balance?: string; code?: string } = {};
      transfer.onTransfer = () => {
        transfer.onTransfer = undefined;
        observed.balance = ledger.getPlanDetails("alice")?.totalAmount.amount;
        observed.code = codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "alice"));
      };

      expect(ledger.claimInheritance(ctx("bob", UNLOCKED), "alice")).toEqual(unit("60"));
      expect(observed).toEqual({ balance: "40", code: "UNAUTHORIZED_ACCESS" });
      expect(transfer.payouts).toEqual([{ to: "bob", amount: "60" }]);
    });

    it("keep a nested claim that succeeded when the outer transfer fails", () => {
      transfer.onTransfer = (to) => {
        if (to !== "bob") return;
        transfer.onTransfer = undefined;
        ledger.claimInheritance(ctx("carol", UNLOCKED), "alice");
        transfer.mode = "fail";
      };

      expect(codeOf(() => ledger.claimInheritance(ctx("bob", UNLOCKED), "alice"))).toBe(
        "INSUFFICIENT_FUNDS",
      );

      expect(transfer.payouts).toEqual([{ to: "carol", amount: "40" }]);
      expect(ledger.getClaimedAmount("alice", "carol")).toEqual(unit("40"));
      expect(ledger.getClaimedAmount("alice", "bob")).toEqual(unit("0"));
      expect(ledger.isAuthorized("alice", "bob")).toBe(true);

      const plan = ledger.getPlanDetails("alice");
      expect(plan?.totalAmount).toEqual(unit("60"));
      expect(plan?.isActive).toBe(true);
      expect(ledger.getStats()).toEqual({ activePlans: 1, totalLocked: unit("60") });
      expect(ledger.verifyIndexConsistency()).toEqual({ consistent: true, issues: [] });
    });
  });
});
