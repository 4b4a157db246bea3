/**
 * @splitledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @splitledger/types with ledger-specific
 * structures used by this package and its direct consumers.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored expenses
 * - Fallible operations return a LedgerResult, they never throw
 */

import type { Expense, UserId } from "@splitledger/types";

// ─── Tolerances ──────────────────────────────────────────────────────────

/** Balances closer to zero than this are snapped to exactly 0. */
export const BALANCE_NOISE = 1e-9;

/** Balances and payments at or below this magnitude count as settled. */
export const SETTLEMENT_EPSILON = 1e-6;

/** Allowed gap between an exact split's share total and its amount. */
export const SHARE_TOLERANCE = 0.01;

/** Decimal places used when amounts are written out. */
export const AMOUNT_DECIMALS = 2;

// ─── Directory ───────────────────────────────────────────────────────────

/**
 * Anything that can answer "is this a registered user?".
 * The expense recorder only needs this much of the store.
 */
export interface UserDirectory {
  isUser(name: UserId): boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_USER"
  | "EMPTY_PARTICIPANTS"
  | "EMPTY_SHARES"
  | "MALFORMED_TOKEN"
  | "SHARE_MISMATCH"
  | "INVALID_AMOUNT"
  | "CORRUPT_PERSISTED_STATE"
  | "STORAGE_UNAVAILABLE"
  | "UNSTORABLE_NAME";

/**
 * Structured error from the ledger engine.
 * Returned inside a failed LedgerResult, never thrown by the core.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Outcome of a fallible ledger operation.
 */
export type LedgerResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: LedgerError };

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: LedgerErrorCode, message: string): LedgerResult<T> {
  return { ok: false, error: new LedgerError(code, message) };
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Full ledger state: users in registration order and expenses in
 * insertion order. Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly users: readonly UserId[];
  readonly expenses: readonly Expense[];
}
