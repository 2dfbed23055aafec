/**
 * @vigil/ledger: Error types for money arithmetic.
 */

/** Error codes for money operations. */
export type LedgerErrorCode =
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_PERCENT";

/**
 * Structured error from the arithmetic layer.
 * Always thrown; never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
