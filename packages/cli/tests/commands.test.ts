/**
 * Tests for command line parsing.
 */

import { describe, it, expect } from "vitest";
import { parseCommand, USAGE } from "../src/commands.js";

describe("parseCommand", () => {
  it("treats blank lines as empty", () => {
    expect(parseCommand("")).toEqual({ kind: "empty" });
    expect(parseCommand("   \t ")).toEqual({ kind: "empty" });
  });

  it("parses simple commands", () => {
    expect(parseCommand("help")).toEqual({ kind: "help" });
    expect(parseCommand("balances")).toEqual({ kind: "balances" });
    expect(parseCommand("  settle  ")).toEqual({ kind: "settle" });
  });

  it("maps exit and quit to exit", () => {
    expect(parseCommand("exit")).toEqual({ kind: "exit" });
    expect(parseCommand("quit")).toEqual({ kind: "exit" });
  });

  describe("add-user", () => {
    it("takes the rest of the line as the name", () => {
      expect(parseCommand("add-user Mary Ann ")).toEqual({ kind: "add-user", name: "Mary Ann" });
    });

    it("asks for a name when none is given", () => {
      expect(parseCommand("add-user")).toEqual({ kind: "usage", message: USAGE.addUser });
    });
  });

  describe("add-expense", () => {
    it("parses an equal split", () => {
      expect(parseCommand("add-expense equal A 90 A B C")).toEqual({
        kind: "add-equal",
        payer: "A",
        amount: "90",
        participants: ["A", "B", "C"],
      });
    });

    it("parses an exact split", () => {
      expect(parseCommand("add-expense exact B 15 A:5 C:10")).toEqual({
        kind: "add-exact",
        payer: "B",
        amount: "15",
        tokens: ["A:5", "C:10"],
      });
    });

    it("keeps the amount as text", () => {
      const command = parseCommand("add-expense equal A ten A");
      expect(command).toMatchObject({ kind: "add-equal", amount: "ten" });
    });

    it("allows an empty participant list", () => {
      expect(parseCommand("add-expense equal A 10")).toMatchObject({ participants: [] });
    });

    it.each(["add-expense", "add-expense equal", "add-expense equal A", "add-expense split A 10 B"])(
      "reports usage for %j",
      (line) => {
        expect(parseCommand(line)).toEqual({ kind: "usage", message: USAGE.addExpense });
      },
    );
  });

  it("parses save and load with an optional file", () => {
    expect(parseCommand("save trip.txt")).toEqual({ kind: "save", file: "trip.txt" });
    expect(parseCommand("save")).toEqual({ kind: "save", file: undefined });
    expect(parseCommand("load trip.txt")).toEqual({ kind: "load", file: "trip.txt" });
  });

  it("reports unknown words", () => {
    expect(parseCommand("frobnicate now")).toEqual({ kind: "unknown", word: "frobnicate" });
  });
});
