/**
 * @vigil/ledger: Deterministic money arithmetic for escrow accounting.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Amounts travel as decimal strings
 * - Fail-closed: invalid amounts throw, never silently succeed
 * - Zero runtime dependencies
 */

export {
  parseAmount,
  formatAmount,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  percentOf,
  isZero,
  isPositive,
  compareMoney,
  zeroMoney,
  toMoney,
} from "./money-math.js";

export type { LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";
