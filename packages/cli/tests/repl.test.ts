/**
 * Tests for the prompt loop, driven through in-memory streams.
 */

import { describe, it, expect } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { Chalk } from "chalk";
import pino from "pino";
import { Ledger } from "@splitledger/ledger";
import { CommandInterpreter } from "../src/interpreter.js";
import { runRepl } from "../src/repl.js";

async function session(input: string): Promise<{ output: string; lines: number; ledger: Ledger }> {
  const ledger = new Ledger();
  const logger = pino({ level: "silent" });
  const interpreter = new CommandInterpreter({ ledger, logger, chalk: new Chalk({ level: 0 }) });

  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  const stdin = new PassThrough();
  stdin.end(input);

  const lines = await runRepl({ interpreter, input: stdin, output, logger });
  return { output: chunks.join(""), lines, ledger };
}

describe("runRepl", () => {
  it("prints the banner, prompts and farewell", async () => {
    const { output, lines } = await session("add-user A\nexit\n");
    expect(output).toBe("Splitledger. Type 'help' for commands.\n> Added user: A\n> Bye!\n");
    expect(lines).toBe(2);
  });

  it("stops reading after exit", async () => {
    const { ledger, lines } = await session("add-user A\nquit\nadd-user B\n");
    expect(ledger.getUsers()).toEqual(["A"]);
    expect(lines).toBe(2);
  });

  it("ends on end of input", async () => {
    const { output } = await session("add-user A\n");
    expect(output).toBe("Splitledger. Type 'help' for commands.\n> Added user: A\n> Bye!\n");
  });

  it("prints nothing for blank lines", async () => {
    const { output } = await session("\n\nexit\n");
    expect(output).toBe("Splitledger. Type 'help' for commands.\n> > > Bye!\n");
  });

  it("prints multi-line replies", async () => {
    const { output } = await session("add-user A\nadd-user B\nadd-expense equal A 10 A B\nsettle\n");
    expect(output).toBe(
      [
        "Splitledger. Type 'help' for commands.",
        "> Added user: A",
        "> Added user: B",
        "> Added equal expense.",
        "> Settlement transactions:",
        "  B -> A : 5.00",
        "> Bye!",
        "",
      ].join("\n"),
    );
  });
});
