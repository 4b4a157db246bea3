/**
 * @splitledger/ledger — Settlement solver.
 *
 * Turns net balances into payment instructions by repeatedly matching
 * the largest creditor with the largest debtor.
 *
 * Properties:
 * - At most (creditors + debtors - 1) transactions
 * - Applying every transaction brings each balance within SETTLEMENT_EPSILON of 0
 * - Greedy: not minimal for every distribution of balances
 * - Ties between equal balances come out in heap order (unspecified)
 */

import type { NetBalances, Settlement, UserId } from "@splitledger/types";
import { PriorityQueue } from "./priority-queue.js";
import { SETTLEMENT_EPSILON } from "./types.js";

/**
 * Working balance for one side of the match.
 * Creditors hold a positive amount, debtors a negative one.
 */
interface Party {
  readonly user: UserId;
  balance: number;
}

/**
 * Compute the settlement plan for a set of net balances.
 * The input is not modified.
 */
export function settle(
  balances: NetBalances,
  epsilon: number = SETTLEMENT_EPSILON,
): readonly Settlement[] {
  // Largest credit first
  const creditors = new PriorityQueue<Party>((a, b) => b.balance - a.balance);
  // Most negative first
  const debtors = new PriorityQueue<Party>((a, b) => a.balance - b.balance);

  for (const [user, balance] of balances) {
    if (balance > epsilon) {
      creditors.push({ user, balance });
    } else if (balance < -epsilon) {
      debtors.push({ user, balance });
    }
  }

  const transactions: Settlement[] = [];

  for (;;) {
    const creditor = creditors.pop();
    const debtor = debtors.pop();
    if (creditor === undefined || debtor === undefined) {
      break;
    }

    const pay = Math.min(creditor.balance, -debtor.balance);
    if (pay > epsilon) {
      transactions.push({ from: debtor.user, to: creditor.user, amount: pay });
    }

    creditor.balance -= pay;
    debtor.balance += pay;

    if (creditor.balance > epsilon) {
      creditors.push(creditor);
    }
    if (debtor.balance < -epsilon) {
      debtors.push(debtor);
    }
  }

  return transactions;
}
