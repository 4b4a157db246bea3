/**
 * @splitledger/ledger — Ledger store.
 *
 * Holds the set of known users and the ordered sequence of expenses.
 *
 * Rules:
 * - Registering a user twice is a no-op
 * - Users and expenses are never removed individually
 * - append() trusts its caller: expenses are validated upstream
 */

import type { Expense, UserId } from "@splitledger/types";
import type { LedgerSnapshot, UserDirectory } from "./types.js";

/**
 * In-memory store of users and expenses.
 * Append-only apart from the wholesale clear/replace used when loading.
 */
export class LedgerStore implements UserDirectory {
  private readonly _users: Set<UserId> = new Set();
  private readonly _expenses: Expense[] = [];

  /**
   * Register a user. Idempotent.
   */
  registerUser(name: UserId): void {
    this._users.add(name);
  }

  isUser(name: UserId): boolean {
    return this._users.has(name);
  }

  /**
   * Append an already-validated expense.
   */
  append(expense: Expense): void {
    this._expenses.push(expense);
  }

  /**
   * Registered users, in registration order.
   */
  getUsers(): readonly UserId[] {
    return [...this._users];
  }

  getExpenses(): readonly Expense[] {
    return [...this._expenses];
  }

  get userCount(): number {
    return this._users.size;
  }

  get expenseCount(): number {
    return this._expenses.length;
  }

  /**
   * Drop all users and expenses.
   */
  clear(): void {
    this._users.clear();
    this._expenses.length = 0;
  }

  /**
   * Replace the whole state with a snapshot.
   */
  replace(snapshot: LedgerSnapshot): void {
    this.clear();
    for (const user of snapshot.users) {
      this._users.add(user);
    }
    this._expenses.push(...snapshot.expenses);
  }
}
