/**
 * Tests for expense construction.
 *
 * Covers:
 * - Equal split: even shares, duplicate names, validation order
 * - Exact split: token parsing, accumulation, share tolerance
 * - Builders never touch the directory they read
 */

import { describe, it, expect } from "vitest";
import type { Expense } from "@splitledger/types";
import { buildEqualSplit, buildExactSplit, parseShareToken } from "../src/expense-recorder.js";
import { LedgerStore } from "../src/store.js";
import type { LedgerErrorCode, LedgerResult } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function group(...names: string[]): LedgerStore {
  const store = new LedgerStore();
  for (const name of names) {
    store.registerUser(name);
  }
  return store;
}

function expectExpense(result: LedgerResult<Expense>): Expense {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

function expectFailure(result: LedgerResult<unknown>, code: LedgerErrorCode): string {
  if (result.ok) {
    throw new Error(`expected ${code}, got success`);
  }
  expect(result.error.code).toBe(code);
  expect(result.error.name).toBe("LedgerError");
  return result.error.message;
}

const users = group("alice", "bob", "carol");

// ─── parseShareToken ─────────────────────────────────────────────────────

describe("parseShareToken", () => {
  it("splits name and amount at the colon", () => {
    const result = parseShareToken("alice:12.50");
    expect(result).toEqual({ ok: true, value: { name: "alice", amount: 12.5 } });
  });

  it.each(["alice50", ":50", "alice:", "alice:abc", "alice:-5", "a:b:3", "bob:0", "bob:0.00"])(
    "rejects %j",
    (token) => {
      const message = expectFailure(parseShareToken(token), "MALFORMED_TOKEN");
      expect(message).toBe(`Bad token '${token}', expected name:amount`);
    },
  );
});

// ─── buildEqualSplit ─────────────────────────────────────────────────────

describe("buildEqualSplit", () => {
  it("divides the amount evenly", () => {
    const expense = expectExpense(buildEqualSplit(users, "alice", 90, ["alice", "bob", "carol"]));
    expect(expense.payer).toBe("alice");
    expect(expense.amount).toBe(90);
    expect([...expense.shares]).toEqual([
      ["alice", 30],
      ["bob", 30],
      ["carol", 30],
    ]);
  });

  it("leaves division residue in place", () => {
    const expense = expectExpense(buildEqualSplit(users, "bob", 100, ["alice", "bob", "carol"]));
    for (const share of expense.shares.values()) {
      expect(share).toBeCloseTo(100 / 3, 12);
    }
    const total = [...expense.shares.values()].reduce((a, b) => a + b, 0);
    expect(total).toBeCloseTo(100, 9);
  });

  it("accumulates a repeated participant", () => {
    const expense = expectExpense(buildEqualSplit(users, "alice", 90, ["alice", "bob", "bob"]));
    expect(expense.shares.get("alice")).toBe(30);
    expect(expense.shares.get("bob")).toBe(60);
    expect(expense.shares.size).toBe(2);
  });

  it("allows the payer to stay out of the split", () => {
    const expense = expectExpense(buildEqualSplit(users, "carol", 40, ["alice", "bob"]));
    expect(expense.shares.has("carol")).toBe(false);
    expect(expense.shares.get("alice")).toBe(20);
  });

  it("rejects an unknown payer", () => {
    const message = expectFailure(buildEqualSplit(users, "dave", 90, ["alice"]), "UNKNOWN_USER");
    expect(message).toBe("Unknown payer: dave");
  });

  it("checks the payer before the participant list", () => {
    expectFailure(buildEqualSplit(users, "dave", 90, []), "UNKNOWN_USER");
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])("rejects amount %d", (amount) => {
    expectFailure(buildEqualSplit(users, "alice", amount, ["bob"]), "INVALID_AMOUNT");
  });

  it("rejects an empty participant list", () => {
    const message = expectFailure(buildEqualSplit(users, "alice", 90, []), "EMPTY_PARTICIPANTS");
    expect(message).toBe("No participants.");
  });

  it("reports the first unknown participant", () => {
    const message = expectFailure(
      buildEqualSplit(users, "alice", 90, ["bob", "dave", "erin"]),
      "UNKNOWN_USER",
    );
    expect(message).toBe("Unknown participant: dave");
  });
});

// ─── buildExactSplit ─────────────────────────────────────────────────────

describe("buildExactSplit", () => {
  it("uses the given shares", () => {
    const expense = expectExpense(buildExactSplit(users, "alice", 90, ["alice:50", "bob:40"]));
    expect([...expense.shares]).toEqual([
      ["alice", 50],
      ["bob", 40],
    ]);
  });

  it("accumulates repeated names", () => {
    const expense = expectExpense(
      buildExactSplit(users, "carol", 90, ["bob:10", "alice:60", "bob:20"]),
    );
    expect(expense.shares.get("bob")).toBe(30);
    expect(expense.shares.get("alice")).toBe(60);
  });

  it("accepts share totals within one cent", () => {
    const expense = expectExpense(buildExactSplit(users, "alice", 90, ["alice:50", "bob:39.995"]));
    expect(expense.amount).toBe(90);
  });

  it("rejects share totals further off", () => {
    const message = expectFailure(
      buildExactSplit(users, "alice", 90, ["alice:50", "bob:30"]),
      "SHARE_MISMATCH",
    );
    expect(message).toBe("Share sum (80.00) != amount (90.00)");
  });

  it("rejects an unknown payer", () => {
    const message = expectFailure(buildExactSplit(users, "dave", 10, ["alice:10"]), "UNKNOWN_USER");
    expect(message).toBe("Unknown payer: dave");
  });

  it("rejects a non-positive amount", () => {
    expectFailure(buildExactSplit(users, "alice", 0, ["bob:0"]), "INVALID_AMOUNT");
  });

  it("rejects an empty token list", () => {
    const message = expectFailure(buildExactSplit(users, "alice", 10, []), "EMPTY_SHARES");
    expect(message).toBe("No shares provided.");
  });

  it("rejects a malformed token", () => {
    expectFailure(buildExactSplit(users, "alice", 10, ["bob:5", "carol5"]), "MALFORMED_TOKEN");
  });

  it("rejects a zero share even when the total matches", () => {
    const message = expectFailure(
      buildExactSplit(users, "alice", 10, ["bob:10", "carol:0"]),
      "MALFORMED_TOKEN",
    );
    expect(message).toBe("Bad token 'carol:0', expected name:amount");
  });

  it("rejects an unknown participant", () => {
    const message = expectFailure(
      buildExactSplit(users, "alice", 10, ["dave:10"]),
      "UNKNOWN_USER",
    );
    expect(message).toBe("Unknown participant: dave");
  });

  it("stops at the first bad token", () => {
    expectFailure(buildExactSplit(users, "alice", 10, ["dave:5", "carol"]), "UNKNOWN_USER");
  });

  it("does not register anyone or record anything", () => {
    const store = group("alice", "bob");
    buildExactSplit(store, "alice", 10, ["bob:10"]);
    buildEqualSplit(store, "alice", 10, ["bob"]);
    expect(store.expenseCount).toBe(0);
    expect(store.getUsers()).toEqual(["alice", "bob"]);
  });
});
