/**
 * Plan parameter validation.
 *
 * Every check throws EscrowError("INVALID_PARAMETERS"). Deposit checks
 * live in the ledger, since a zero deposit is INSUFFICIENT_FUNDS.
 */

import { isIdentity } from "@vigil/types";
import type { Identity } from "@vigil/types";
import { EscrowError } from "./types.js";

const DAY = 24 * 60 * 60;

/** 30 days */
export const MIN_LOCK_DURATION = 30 * DAY;

/** 10 × 365 days */
export const MAX_LOCK_DURATION = 3650 * DAY;

export const MAX_BENEFICIARIES = 20;

export const TOTAL_SHARES = 100;

function invalid(message: string): never {
  throw new EscrowError("INVALID_PARAMETERS", message);
}

// ─── Lock duration ───────────────────────────────────────────────────────

export function validateLockDuration(lockDuration: number): void {
  if (!Number.isInteger(lockDuration)) {
    invalid(`Lock duration must be an integer number of seconds, got ${String(lockDuration)}`);
  }
  if (lockDuration < MIN_LOCK_DURATION || lockDuration > MAX_LOCK_DURATION) {
    invalid(
      `Lock duration must be between ${String(MIN_LOCK_DURATION)} and ${String(MAX_LOCK_DURATION)} seconds, got ${String(lockDuration)}`,
    );
  }
}

// ─── Beneficiaries & shares ──────────────────────────────────────────────

/**
 * Validate list shape: bounds and parallel lengths.
 */
export function validateListShape(
  beneficiaries: readonly Identity[],
  shares: readonly number[],
): void {
  if (beneficiaries.length < 1 || beneficiaries.length > MAX_BENEFICIARIES) {
    invalid(
      `A plan needs between 1 and ${String(MAX_BENEFICIARIES)} beneficiaries, got ${String(beneficiaries.length)}`,
    );
  }
  if (beneficiaries.length !== shares.length) {
    invalid(
      `Beneficiaries (${String(beneficiaries.length)}) and shares (${String(shares.length)}) differ in length`,
    );
  }
}

/**
 * Validate each entry, uniqueness and the share total.
 */
export function validateEntries(
  beneficiaries: readonly Identity[],
  shares: readonly number[],
): void {
  const seen = new Set<Identity>();
  let total = 0;

  beneficiaries.forEach((beneficiary, i) => {
    if (!isIdentity(beneficiary)) {
      invalid(`Beneficiary at index ${String(i)} is empty`);
    }
    if (seen.has(beneficiary)) {
      invalid(`Beneficiary '${beneficiary}' is listed more than once`);
    }
    seen.add(beneficiary);

    const share = shares[i];
    if (share === undefined || !Number.isInteger(share) || share <= 0 || share > TOTAL_SHARES) {
      invalid(`Share for '${beneficiary}' must be an integer in (0, 100], got ${String(share)}`);
    }
    total += share;
  });

  if (total !== TOTAL_SHARES) {
    invalid(`Shares must sum to ${String(TOTAL_SHARES)}, got ${String(total)}`);
  }
}

/**
 * The emergency contact can be neither the owner nor a beneficiary.
 */
export function validateEmergencyContact(
  owner: Identity,
  emergencyContact: Identity,
  beneficiaries: readonly Identity[],
): void {
  if (emergencyContact === owner) {
    invalid("Emergency contact cannot be the plan owner");
  }
  if (beneficiaries.includes(emergencyContact)) {
    invalid(`Emergency contact '${emergencyContact}' cannot also be a beneficiary`);
  }
}
