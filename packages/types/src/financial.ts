/**
 * Financial Types
 *
 * Core primitives for a shared-expense ledger.
 *
 * Rules:
 * - Amounts are plain numbers in a single implicit currency
 * - Tolerances, not exact equality, decide whether two amounts match
 * - Expenses are append-only by contract
 */

/**
 * Opaque user identifier.
 * Any non-empty string; registered users are never removed.
 */
export type UserId = string;

/**
 * A recorded expense.
 * The payer fronted `amount`; each share key owes its share back.
 */
export interface Expense {
  /** Who paid the full amount up front */
  readonly payer: UserId;

  /** Total paid, always > 0 */
  readonly amount: number;

  /**
   * What each participant owes, in insertion order.
   * A participant named twice in the input owes the accumulated sum.
   */
  readonly shares: ReadonlyMap<UserId, number>;
}

/**
 * Net balance per user.
 * Positive: the user is owed money. Negative: the user owes money.
 */
export type NetBalances = ReadonlyMap<UserId, number>;

/**
 * A single payment instruction: `from` pays `to` the given amount.
 */
export interface Settlement {
  readonly from: UserId;
  readonly to: UserId;
  readonly amount: number;
}
