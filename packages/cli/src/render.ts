/**
 * @splitledger/cli — Console rendering.
 *
 * Pure string builders. Colors come from the chalk instance passed in,
 * so tests can render with color disabled.
 */

import type { ChalkInstance } from "chalk";
import type { NetBalances, Settlement } from "@splitledger/types";
import type { LedgerError } from "@splitledger/ledger";
import { formatAmount, SETTLEMENT_EPSILON } from "@splitledger/ledger";

const NAME_WIDTH = 12;

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function renderBalances(balances: NetBalances, c: ChalkInstance): string[] {
  const lines = [c.bold("Balances (+ receive, - pay)")];

  for (const name of [...balances.keys()].sort(byName)) {
    const raw = balances.get(name) ?? 0;
    const value = Math.abs(raw) < SETTLEMENT_EPSILON ? 0 : raw;
    const amount = formatAmount(value);
    const colored = value > 0 ? c.green(amount) : value < 0 ? c.red(amount) : amount;
    lines.push(`  ${name.padEnd(NAME_WIDTH)} : ${colored}`);
  }

  return lines;
}

export function renderSettlement(plan: readonly Settlement[], c: ChalkInstance): string[] {
  if (plan.length === 0) {
    return [c.green("Everyone is settled.")];
  }

  const lines = [c.bold("Settlement transactions:")];
  for (const { from, to, amount } of plan) {
    lines.push(`  ${from} -> ${to} : ${c.yellow(formatAmount(amount))}`);
  }
  return lines;
}

export function renderSuccess(message: string, c: ChalkInstance): string {
  return c.green(message);
}

export function renderError(error: LedgerError, c: ChalkInstance): string {
  return c.red(`Error: ${error.message}`);
}

export function renderNotice(message: string, c: ChalkInstance): string {
  return c.yellow(message);
}
