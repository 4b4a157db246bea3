/**
 * @splitledger/ledger — Expense construction.
 *
 * Builds validated Expense records for the two split strategies.
 * Both builders are pure: they read the user directory but never
 * touch the store. The caller appends the returned expense.
 *
 * Validation is fail-fast, in a fixed order:
 * 1. Payer must be registered
 * 2. Amount must be finite and positive
 * 3. Participant / share list must be non-empty
 * 4. Every participant must be registered (exact: every token well-formed)
 * 5. Exact only: shares must add up to the amount within SHARE_TOLERANCE
 */

import type { Expense, UserId } from "@splitledger/types";
import { amountsMatch, formatAmount, isValidAmount, parseAmount, sumAmounts } from "./money-math.js";
import type { LedgerResult, UserDirectory } from "./types.js";
import { fail, ok } from "./types.js";

/**
 * A parsed "name:amount" share token.
 */
export interface ShareToken {
  readonly name: UserId;
  readonly amount: number;
}

/**
 * Parse a "name:amount" token.
 *
 * The name is everything before the first ':'; the amount must be a
 * positive decimal literal.
 */
export function parseShareToken(token: string): LedgerResult<ShareToken> {
  const separator = token.indexOf(":");
  if (separator === -1) {
    return fail("MALFORMED_TOKEN", `Bad token '${token}', expected name:amount`);
  }

  const name = token.slice(0, separator);
  const amount = parseAmount(token.slice(separator + 1));

  if (name === "" || amount === undefined || amount <= 0) {
    return fail("MALFORMED_TOKEN", `Bad token '${token}', expected name:amount`);
  }

  return ok({ name, amount });
}

function checkPayer(
  directory: UserDirectory,
  payer: UserId,
  amount: number,
): LedgerResult<void> {
  if (!directory.isUser(payer)) {
    return fail("UNKNOWN_USER", `Unknown payer: ${payer}`);
  }
  if (!isValidAmount(amount)) {
    return fail("INVALID_AMOUNT", `Expense amount must be a positive number, got: ${String(amount)}`);
  }
  return ok(undefined);
}

function accumulate(shares: Map<UserId, number>, name: UserId, amount: number): void {
  shares.set(name, (shares.get(name) ?? 0) + amount);
}

/**
 * Split `amount` evenly across `participants`.
 *
 * Each occurrence of a name contributes one share, so a name listed
 * twice owes twice. Division residue is not redistributed.
 */
export function buildEqualSplit(
  directory: UserDirectory,
  payer: UserId,
  amount: number,
  participants: readonly UserId[],
): LedgerResult<Expense> {
  const payerCheck = checkPayer(directory, payer, amount);
  if (!payerCheck.ok) {
    return payerCheck;
  }

  if (participants.length === 0) {
    return fail("EMPTY_PARTICIPANTS", "No participants.");
  }

  for (const participant of participants) {
    if (!directory.isUser(participant)) {
      return fail("UNKNOWN_USER", `Unknown participant: ${participant}`);
    }
  }

  const share = amount / participants.length;
  const shares = new Map<UserId, number>();
  for (const participant of participants) {
    accumulate(shares, participant, share);
  }

  return ok({ payer, amount, shares });
}

/**
 * Split `amount` by explicit "name:amount" tokens.
 *
 * Repeated names accumulate. The token total must match the amount
 * within SHARE_TOLERANCE.
 */
export function buildExactSplit(
  directory: UserDirectory,
  payer: UserId,
  amount: number,
  tokens: readonly string[],
): LedgerResult<Expense> {
  const payerCheck = checkPayer(directory, payer, amount);
  if (!payerCheck.ok) {
    return payerCheck;
  }

  if (tokens.length === 0) {
    return fail("EMPTY_SHARES", "No shares provided.");
  }

  const shares = new Map<UserId, number>();
  const parsed: number[] = [];

  for (const token of tokens) {
    const result = parseShareToken(token);
    if (!result.ok) {
      return result;
    }

    const { name, amount: share } = result.value;
    if (!directory.isUser(name)) {
      return fail("UNKNOWN_USER", `Unknown participant: ${name}`);
    }

    accumulate(shares, name, share);
    parsed.push(share);
  }

  const total = sumAmounts(parsed);
  if (!amountsMatch(total, amount)) {
    return fail(
      "SHARE_MISMATCH",
      `Share sum (${formatAmount(total)}) != amount (${formatAmount(amount)})`,
    );
  }

  return ok({ payer, amount, shares });
}
