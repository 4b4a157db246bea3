/**
 * @splitledger/ledger — Shared-expense ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies:
 * - Users are registered once and never removed
 * - Expenses are equal or exact splits, immutable once appended
 * - Net balances are folded from the expense sequence on demand
 * - Settlements match the largest creditor with the largest debtor
 *
 * Design rules:
 * - All types are readonly
 * - Validate-then-commit: a failed operation changes nothing
 * - Errors are returned as LedgerResult values, never thrown
 * - The engine never logs or prints
 */

// Core engine
export { Ledger } from "./ledger.js";

// Store
export { LedgerStore } from "./store.js";

// Expense construction
export { buildEqualSplit, buildExactSplit, parseShareToken } from "./expense-recorder.js";
export type { ShareToken } from "./expense-recorder.js";

// Balances and settlement
export { computeNet } from "./balance-calculator.js";
export { settle } from "./settlement.js";
export { PriorityQueue } from "./priority-queue.js";
export type { Comparator } from "./priority-queue.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  isValidAmount,
  clampNoise,
  sumAmounts,
  amountsMatch,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  LedgerResult,
  LedgerSnapshot,
  UserDirectory,
} from "./types.js";

export {
  LedgerError,
  ok,
  fail,
  BALANCE_NOISE,
  SETTLEMENT_EPSILON,
  SHARE_TOLERANCE,
  AMOUNT_DECIMALS,
} from "./types.js";
