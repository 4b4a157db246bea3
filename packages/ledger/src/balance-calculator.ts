/**
 * @splitledger/ledger — Balance calculation engine.
 *
 * Folds the expense sequence into one net balance per user.
 *
 * Rules:
 * - Every registered user appears, even with no expenses (balance 0)
 * - The payer is credited the full amount, each participant debited its share
 * - Results within BALANCE_NOISE of zero are snapped to exactly 0
 * - Pure: same inputs, same output, no matter the expense order
 */

import type { Expense, NetBalances, UserId } from "@splitledger/types";
import { clampNoise } from "./money-math.js";

function adjust(net: Map<UserId, number>, user: UserId, delta: number): void {
  net.set(user, (net.get(user) ?? 0) + delta);
}

/**
 * Compute each user's net balance.
 *
 * Users come out in registration order; names that only occur in
 * expenses (e.g. from a hand-edited file) follow in order of first sight.
 */
export function computeNet(
  users: readonly UserId[],
  expenses: readonly Expense[],
): NetBalances {
  const net = new Map<UserId, number>();

  for (const user of users) {
    net.set(user, 0);
  }

  for (const expense of expenses) {
    adjust(net, expense.payer, expense.amount);
    for (const [participant, share] of expense.shares) {
      adjust(net, participant, -share);
    }
  }

  for (const [user, balance] of net) {
    net.set(user, clampNoise(balance));
  }

  return net;
}
