/**
 * @splitledger/ledger — Core Ledger class.
 *
 * The single owner of a group's users and expenses. Balances and
 * settlements are derived on demand and never cached.
 *
 * API surface:
 * - registerUser() — Add a member (idempotent)
 * - recordEqualExpense() — Validate and append an equal split
 * - recordExactExpense() — Validate and append an exact split
 * - getBalances() — Net balance per user
 * - getSettlement() — Payment plan that zeroes all balances
 * - snapshot() / restore() / fromSnapshot() — Persistence hooks
 *
 * Expenses cannot be edited or removed once recorded.
 */

import type { Expense, NetBalances, Settlement, UserId } from "@splitledger/types";
import { computeNet } from "./balance-calculator.js";
import { buildEqualSplit, buildExactSplit } from "./expense-recorder.js";
import { settle } from "./settlement.js";
import { LedgerStore } from "./store.js";
import type { LedgerResult, LedgerSnapshot } from "./types.js";

/**
 * Shared-expense ledger.
 *
 * Every record operation validates first and commits only on success,
 * so a failed call leaves the ledger exactly as it was.
 */
export class Ledger {
  private readonly _store: LedgerStore = new LedgerStore();

  // ─── Users ───────────────────────────────────────────────────────────

  registerUser(name: UserId): void {
    this._store.registerUser(name);
  }

  hasUser(name: UserId): boolean {
    return this._store.isUser(name);
  }

  getUsers(): readonly UserId[] {
    return this._store.getUsers();
  }

  // ─── Recording ───────────────────────────────────────────────────────

  /**
   * Record an expense split evenly across `participants`.
   */
  recordEqualExpense(
    payer: UserId,
    amount: number,
    participants: readonly UserId[],
  ): LedgerResult<Expense> {
    return this._commit(buildEqualSplit(this._store, payer, amount, participants));
  }

  /**
   * Record an expense split by "name:amount" tokens.
   */
  recordExactExpense(
    payer: UserId,
    amount: number,
    tokens: readonly string[],
  ): LedgerResult<Expense> {
    return this._commit(buildExactSplit(this._store, payer, amount, tokens));
  }

  private _commit(result: LedgerResult<Expense>): LedgerResult<Expense> {
    if (result.ok) {
      this._store.append(result.value);
    }
    return result;
  }

  getExpenses(): readonly Expense[] {
    return this._store.getExpenses();
  }

  get expenseCount(): number {
    return this._store.expenseCount;
  }

  // ─── Derived Views ───────────────────────────────────────────────────

  getBalances(): NetBalances {
    return computeNet(this._store.getUsers(), this._store.getExpenses());
  }

  getSettlement(): readonly Settlement[] {
    return settle(this.getBalances());
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      users: this._store.getUsers(),
      expenses: this._store.getExpenses(),
    };
  }

  /**
   * Drop every user and expense.
   */
  clear(): void {
    this._store.clear();
  }

  /**
   * Replace the current state with a snapshot. No validation is
   * performed: snapshots are trusted as written.
   */
  restore(snapshot: LedgerSnapshot): void {
    this._store.replace(snapshot);
  }

  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger();
    ledger.restore(snapshot);
    return ledger;
  }
}
