/**
 * Shared fixtures for escrow tests.
 *
 * Amounts use a zero-decimal "UNIT" currency so percentages floor at
 * whole units.
 */

import type { CallContext, Identity, Money } from "@vigil/types";
import type { EventStore } from "@vigil/event-store";
import { EscrowLedger } from "../src/escrow-ledger.js";
import type { ClaimScope, CreatePlanParams, FundsTransfer, ShareBasis } from "../src/types.js";

export const DAY = 24 * 60 * 60;
export const LOCK = 30 * DAY;
export const T0 = 1_700_000_000;

export function unit(amount: string): Money {
  return { amount, currency: "UNIT", decimals: 0 };
}

export function ctx(caller: Identity, now: number = T0): CallContext {
  return { caller, now };
}

/**
 * Transfer stand-in that records payouts and can be told to fail or to
 * call back into the ledger.
 */
export class RecordingTransfer implements FundsTransfer {
  readonly payouts: { to: Identity; amount: string }[] = [];
  mode: "ok" | "fail" | "throw" = "ok";
  onTransfer: ((to: Identity, amount: Money) => void) | undefined;

  transfer(_ctx: CallContext, to: Identity, amount: Money): boolean {
    this.onTransfer?.(to, amount);
    if (this.mode === "throw") {
      throw new Error("transfer exploded");
    }
    if (this.mode === "fail") {
      return false;
    }
    this.payouts.push({ to, amount: amount.amount });
    return true;
  }
}

export function makeLedger(options?: {
  claimScope?: ClaimScope;
  shareBasis?: ShareBasis;
  events?: EventStore;
}): { ledger: EscrowLedger; transfer: RecordingTransfer } {
  const transfer = new RecordingTransfer();
  const ledger = new EscrowLedger({
    config: {
      currency: "UNIT",
      decimals: 0,
      claimScope: options?.claimScope ?? "per-plan",
      shareBasis: options?.shareBasis ?? "funded",
    },
    transfer,
    ...(options?.events !== undefined ? { events: options.events } : {}),
  });
  return { ledger, transfer };
}

export function planParams(overrides?: Partial<CreatePlanParams>): CreatePlanParams {
  return {
    beneficiaries: ["bob", "carol"],
    shares: [60, 40],
    lockDuration: LOCK,
    emergencyContact: "dave",
    description: "test plan",
    deposit: unit("100"),
    ...overrides,
  };
}
