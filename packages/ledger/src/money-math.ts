/**
 * @splitledger/ledger — Tolerance-based monetary arithmetic.
 *
 * Amounts are IEEE 754 numbers in a single implicit currency.
 * Equality between amounts is always decided by a tolerance,
 * never by `===`.
 *
 * Rules:
 * - Amount literals are plain decimal strings ("12", "12.50", "-3.1")
 * - Written amounts always carry AMOUNT_DECIMALS places
 * - Zero runtime dependencies
 */

import { AMOUNT_DECIMALS, BALANCE_NOISE, SHARE_TOLERANCE } from "./types.js";

const DECIMAL_LITERAL = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal literal into a number.
 *
 * "100.50" → 100.5
 * "-3" → -3
 * "1e3", "12abc", "" → undefined
 * digit strings too long to be finite → undefined
 */
export function parseAmount(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Render an amount with a fixed number of decimals.
 *
 * 30 → "30.00"
 * 33.333333 → "33.33"
 * -0.001 → "0.00" (no negative zero)
 */
export function formatAmount(value: number, decimals: number = AMOUNT_DECIMALS): string {
  const text = value.toFixed(decimals);
  return Number(text) === 0 ? (0).toFixed(decimals) : text;
}

/**
 * A usable expense amount: finite and strictly positive.
 */
export function isValidAmount(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Snap floating-point noise to exactly zero.
 */
export function clampNoise(value: number, threshold: number = BALANCE_NOISE): number {
  return Math.abs(value) < threshold ? 0 : value;
}

/**
 * Sum a list of amounts, in order.
 */
export function sumAmounts(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Whether two amounts agree within a tolerance (inclusive).
 */
export function amountsMatch(
  a: number,
  b: number,
  tolerance: number = SHARE_TOLERANCE,
): boolean {
  return Math.abs(a - b) <= tolerance;
}
