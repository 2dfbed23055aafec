/**
 * Financial Types
 *
 * Monetary primitives for deterministic escrow accounting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Escrow balances are single-currency per ledger
 */

/**
 * Currency identifier (e.g., "ETH", "USDC").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Use bigint arithmetic (see @vigil/ledger) for computation.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * ETH = 18 (wei), USDC = 6. Zero for whole units.
   */
  readonly decimals: number;
}
