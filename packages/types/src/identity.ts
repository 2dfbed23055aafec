/**
 * Identity Types
 *
 * Identities are opaque, already-authenticated strings supplied by the
 * caller's transport (an address, an account ID, a key fingerprint).
 * Nothing in the escrow core interprets them beyond equality.
 */

export type Identity = string;

/**
 * Who is calling, and when.
 *
 * `now` is read once per operation (unix seconds) and is the only clock
 * any state transition consults.
 */
export interface CallContext {
  readonly caller: Identity;
  readonly now: number;

  /** Groups the events of one request; generated when absent */
  readonly correlationId?: string;
}
