/**
 * @vigil/ledger: Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all binary operations
 * - Division truncates toward zero at the smallest unit
 */

import type { Money } from "@vigil/types";
import { LedgerError } from "./types.js";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=0 → 100n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100n with decimals=0 → "100"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

// ─── Currency ────────────────────────────────────────────────────────────

/**
 * Assert two Money values have the same currency and decimals.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(sum, a.decimals), currency: a.currency, decimals: a.decimals };
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const diff = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return { amount: formatAmount(diff, a.decimals), currency: a.currency, decimals: a.decimals };
}

/**
 * Integer percentage of an amount, floored at the smallest unit.
 *
 * percentOf(10, 33) → 3   (3.3 truncated)
 * percentOf(100.00, 33) with decimals=2 → 33.00
 *
 * The remainder is not redistributed; callers own any dust.
 */
export function percentOf(money: Money, percent: number): Money {
  if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
    throw new LedgerError(
      "INVALID_PERCENT",
      `Percent must be an integer in [0, 100], got ${String(percent)}`,
    );
  }

  const scaled = parseAmount(money.amount, money.decimals);
  if (scaled < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Cannot take a percentage of negative amount "${money.amount}"`);
  }

  const portion = (scaled * BigInt(percent)) / 100n;
  return { amount: formatAmount(portion, money.decimals), currency: money.currency, decimals: money.decimals };
}

// ─── Predicates ──────────────────────────────────────────────────────────

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseAmount(a.amount, a.decimals);
  const vb = parseAmount(b.amount, b.decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

// ─── Constructors ────────────────────────────────────────────────────────

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}

/**
 * Normalize a raw amount string into canonical Money for a currency.
 * "1.5" with decimals=6 → { amount: "1.500000", ... }
 */
export function toMoney(amount: string, currency: string, decimals: number): Money {
  return { amount: formatAmount(parseAmount(amount, decimals), decimals), currency, decimals };
}
