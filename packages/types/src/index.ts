/**
 * @splitledger/types — Shared domain types for the splitledger stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  UserId,
  Expense,
  NetBalances,
  Settlement,
} from "./financial.js";
