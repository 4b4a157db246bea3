/**
 * @splitledger/persistence — Line-oriented ledger text format.
 *
 * File format:
 *
 *   USERS <n>
 *   <user name>                     (n lines, blank lines skipped)
 *   EXPENSES <k>
 *   PAYER <name> AMT <amount>       (k times, each followed by)
 *   SHARES <m>
 *   <name> <amount>                 (m lines)
 *
 * Amounts are written with AMOUNT_DECIMALS places. After the user
 * section the reader is token-based, so line breaks there carry no
 * meaning. Anything after the last expense is ignored.
 *
 * User lines are read verbatim, so a user name may hold spaces but not
 * a line break. Payer and share names are single tokens.
 */

import type { Expense, UserId } from "@splitledger/types";
import type { LedgerResult, LedgerSnapshot } from "@splitledger/ledger";
import { fail, formatAmount, ok, parseAmount } from "@splitledger/ledger";
import { TextCursor } from "./text-cursor.js";

const COUNT = /^\d+$/;
const LINE_BREAK = /[\r\n]/;
const WHITESPACE = /\s/;

// =============================================================================
// Encoding
// =============================================================================

function unstorable(name: UserId, where: string): LedgerResult<never> {
  return fail("UNSTORABLE_NAME", `Cannot save ${where} name ${JSON.stringify(name)}`);
}

function checkNames(snapshot: LedgerSnapshot): LedgerResult<void> {
  for (const name of snapshot.users) {
    if (name === "" || LINE_BREAK.test(name)) {
      return unstorable(name, "user");
    }
  }
  for (const expense of snapshot.expenses) {
    for (const name of [expense.payer, ...expense.shares.keys()]) {
      if (name === "" || WHITESPACE.test(name)) {
        return unstorable(name, "expense");
      }
    }
  }
  return ok(undefined);
}

/**
 * Serialize a ledger snapshot to text.
 * Fails with UNSTORABLE_NAME when a name could not be read back.
 */
export function encodeLedger(snapshot: LedgerSnapshot): LedgerResult<string> {
  const names = checkNames(snapshot);
  if (!names.ok) {
    return names;
  }

  const lines: string[] = [];

  lines.push(`USERS ${String(snapshot.users.length)}`);
  lines.push(...snapshot.users);

  lines.push(`EXPENSES ${String(snapshot.expenses.length)}`);
  for (const expense of snapshot.expenses) {
    lines.push(`PAYER ${expense.payer} AMT ${formatAmount(expense.amount)}`);
    lines.push(`SHARES ${String(expense.shares.size)}`);
    for (const [name, share] of expense.shares) {
      lines.push(`${name} ${formatAmount(share)}`);
    }
  }

  return ok(lines.join("\n") + "\n");
}

// =============================================================================
// Decoding
// =============================================================================

function corrupt(section: string): LedgerResult<never> {
  return fail("CORRUPT_PERSISTED_STATE", section);
}

function readCount(cursor: TextCursor, tag: string): number | undefined {
  const seen = cursor.nextToken();
  const count = cursor.nextToken();
  if (seen !== tag || count === undefined || !COUNT.test(count)) {
    return undefined;
  }
  return Number(count);
}

function readAmount(cursor: TextCursor): number | undefined {
  const token = cursor.nextToken();
  return token === undefined ? undefined : parseAmount(token);
}

function readExpense(cursor: TextCursor): LedgerResult<Expense> {
  const payerTag = cursor.nextToken();
  const payer = cursor.nextToken();
  const amountTag = cursor.nextToken();
  const amount = readAmount(cursor);

  if (payerTag !== "PAYER" || payer === undefined || amountTag !== "AMT" || amount === undefined) {
    return corrupt("Corrupt expense header.");
  }

  const shareCount = readCount(cursor, "SHARES");
  if (shareCount === undefined) {
    return corrupt("Corrupt shares tag.");
  }

  const shares = new Map<UserId, number>();
  for (let i = 0; i < shareCount; i++) {
    const name = cursor.nextToken();
    const share = readAmount(cursor);
    if (name === undefined || share === undefined) {
      return corrupt("Corrupt share entry.");
    }
    shares.set(name, share);
  }

  return ok({ payer, amount, shares });
}

/**
 * Parse ledger text back into a snapshot.
 * Fails with CORRUPT_PERSISTED_STATE on the first structural problem.
 */
export function decodeLedger(text: string): LedgerResult<LedgerSnapshot> {
  const cursor = new TextCursor(text);

  const userCount = readCount(cursor, "USERS");
  if (userCount === undefined) {
    return corrupt("Corrupt file (USERS).");
  }
  // Drop the rest of the header line
  cursor.nextLine();

  const users: UserId[] = [];
  while (users.length < userCount) {
    const line = cursor.nextLine();
    if (line === undefined) {
      return corrupt("Corrupt file (USERS).");
    }
    if (line !== "") {
      users.push(line);
    }
  }

  const expenseCount = readCount(cursor, "EXPENSES");
  if (expenseCount === undefined) {
    return corrupt("Corrupt file (EXPENSES).");
  }

  const expenses: Expense[] = [];
  for (let i = 0; i < expenseCount; i++) {
    const result = readExpense(cursor);
    if (!result.ok) {
      return result;
    }
    expenses.push(result.value);
  }

  return ok({ users, expenses });
}
