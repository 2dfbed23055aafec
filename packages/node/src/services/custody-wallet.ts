/**
 * Custody wallet: the funds the service holds on behalf of plans.
 *
 * Deposits and top-ups credit it; claim payouts debit it. A payout the
 * balance cannot cover returns false, which makes the ledger roll the
 * claim back.
 */

import { randomUUID } from "node:crypto";
import { addMoney, subtractMoney, compareMoney, zeroMoney } from "@vigil/ledger";
import type { CallContext, Currency, DomainEvent, Identity, Money } from "@vigil/types";
import type { EventCatalog, EventStore } from "@vigil/event-store";
import type { FundsTransfer } from "@vigil/escrow";

export const CUSTODY_STREAM = "custody";

export const CUSTODY_EVENTS = {
  DEPOSIT_RECEIVED: "custody.deposit.received",
  PAYOUT_SENT: "custody.payout.sent",
} as const;

export interface CustodyMovementPayload {
  readonly counterparty: string;
  readonly amount: string;
  readonly balance: string;
  readonly currency: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isMovement(p: unknown): boolean {
  return (
    isRecord(p) &&
    ["counterparty", "amount", "balance", "currency"].every(
      (key) => typeof p[key] === "string",
    )
  );
}

/**
 * Add the custody event schemas to a catalog.
 */
export function registerCustodyEvents(catalog: EventCatalog): void {
  catalog.register({
    type: CUSTODY_EVENTS.DEPOSIT_RECEIVED,
    version: 1,
    description: "Funds entered custody with a plan deposit or top-up",
    source: "custody",
    validate: isMovement,
  });
  catalog.register({
    type: CUSTODY_EVENTS.PAYOUT_SENT,
    version: 1,
    description: "Funds left custody to a claiming beneficiary",
    source: "custody",
    validate: isMovement,
  });
}

export interface CustodyWalletOptions {
  readonly currency: Currency;
  readonly decimals: number;
  readonly events: EventStore;
}

export class CustodyWallet implements FundsTransfer {
  private balance: Money;
  private readonly events: EventStore;

  constructor(options: CustodyWalletOptions) {
    this.balance = zeroMoney(options.currency, options.decimals);
    this.events = options.events;
  }

  getBalance(): Money {
    return this.balance;
  }

  /**
   * Credit funds received from the caller of `ctx`.
   */
  deposit(ctx: CallContext, amount: Money): void {
    this.balance = addMoney(this.balance, amount);
    this.record(CUSTODY_EVENTS.DEPOSIT_RECEIVED, ctx.caller, amount, ctx.now, ctx.correlationId);
  }

  /**
   * Pay `to` out of custody, stamped with the claim's time and
   * correlation id. False when the balance is short.
   */
  transfer(ctx: CallContext, to: Identity, amount: Money): boolean {
    if (compareMoney(this.balance, amount) < 0) {
      return false;
    }
    this.balance = subtractMoney(this.balance, amount);
    this.record(CUSTODY_EVENTS.PAYOUT_SENT, to, amount, ctx.now, ctx.correlationId);
    return true;
  }

  private record(
    type: string,
    counterparty: Identity,
    amount: Money,
    at: number,
    correlationId?: string,
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(at * 1000).toISOString(),
        actor: counterparty,
        correlationId: correlationId ?? randomUUID(),
        source: "custody",
      },
      payload: {
        counterparty,
        amount: amount.amount,
        balance: this.balance.amount,
        currency: amount.currency,
      } satisfies CustodyMovementPayload,
    };
    this.events.append(CUSTODY_STREAM, [event]);
  }
}
