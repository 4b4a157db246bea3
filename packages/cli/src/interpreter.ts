/**
 * @splitledger/cli — Command interpreter.
 *
 * Executes parsed commands against a Ledger and turns the outcome into
 * output lines. The interpreter owns no state of its own beyond the
 * ledger it was given; it never writes to a stream directly.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { Expense } from "@splitledger/types";
import type { Ledger, LedgerResult } from "@splitledger/ledger";
import { LedgerError, parseAmount } from "@splitledger/ledger";
import { LedgerFileStore } from "@splitledger/persistence";
import type { Logger } from "pino";
import type { Command } from "./commands.js";
import { HELP_TEXT, USAGE, parseCommand } from "./commands.js";
import {
  renderBalances,
  renderError,
  renderNotice,
  renderSettlement,
  renderSuccess,
} from "./render.js";

export interface InterpreterOptions {
  readonly ledger: Ledger;
  readonly logger: Logger;
  /** Used by `save` / `load` when no file argument is given */
  readonly defaultFile?: string | undefined;
  readonly chalk?: ChalkInstance | undefined;
}

/**
 * Result of one command.
 */
export interface Reply {
  readonly lines: readonly string[];
  /** True when the session should end */
  readonly exit: boolean;
}

function reply(...lines: string[]): Reply {
  return { lines, exit: false };
}

export class CommandInterpreter {
  private readonly _ledger: Ledger;
  private readonly _logger: Logger;
  private readonly _defaultFile: string | undefined;
  private readonly _c: ChalkInstance;

  constructor(options: InterpreterOptions) {
    this._ledger = options.ledger;
    this._logger = options.logger;
    this._defaultFile = options.defaultFile;
    this._c = options.chalk ?? chalk;
  }

  /**
   * Parse and run one line of input.
   */
  execute(line: string): Reply {
    return this.run(parseCommand(line));
  }

  run(command: Command): Reply {
    if (command.kind !== "empty") {
      this._logger.debug({ command: command.kind }, "Command received");
    }

    switch (command.kind) {
      case "empty":
        return reply();
      case "help":
        return reply(HELP_TEXT.trimEnd());
      case "exit":
        return { lines: [], exit: true };
      case "add-user":
        this._ledger.registerUser(command.name);
        return reply(renderSuccess(`Added user: ${command.name}`, this._c));
      case "add-equal": {
        const { payer, participants } = command;
        return this._record("equal", command.amount, (amount) =>
          this._ledger.recordEqualExpense(payer, amount, participants),
        );
      }
      case "add-exact": {
        const { payer, tokens } = command;
        return this._record("exact", command.amount, (amount) =>
          this._ledger.recordExactExpense(payer, amount, tokens),
        );
      }
      case "balances":
        return reply(...renderBalances(this._ledger.getBalances(), this._c));
      case "settle":
        return reply(...renderSettlement(this._ledger.getSettlement(), this._c));
      case "save":
        return this._save(command.file ?? this._defaultFile);
      case "load":
        return this._load(command.file ?? this._defaultFile);
      case "usage":
        return reply(renderNotice(command.message, this._c));
      case "unknown":
        return reply(renderNotice("Unknown command. Type 'help'.", this._c));
    }
  }

  private _record(
    split: "equal" | "exact",
    amountText: string,
    record: (amount: number) => LedgerResult<Expense>,
  ): Reply {
    const amount = parseAmount(amountText);
    if (amount === undefined) {
      return this._rejected(new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amountText}"`));
    }

    const result = record(amount);
    if (!result.ok) {
      return this._rejected(result.error);
    }

    this._logger.info(
      { split, payer: result.value.payer, amount, participants: result.value.shares.size },
      "Expense recorded",
    );
    return reply(renderSuccess(`Added ${split} expense.`, this._c));
  }

  private _save(file: string | undefined): Reply {
    if (file === undefined) {
      return reply(renderNotice(USAGE.save, this._c));
    }

    const result = new LedgerFileStore({ filePath: file }).save(this._ledger);
    if (!result.ok) {
      return this._rejected(result.error);
    }

    this._logger.info(result.value, "Ledger saved");
    return reply(renderSuccess(`Saved to ${file}`, this._c));
  }

  private _load(file: string | undefined): Reply {
    if (file === undefined) {
      return reply(renderNotice(USAGE.load, this._c));
    }

    const result = new LedgerFileStore({ filePath: file }).load(this._ledger);
    if (!result.ok) {
      return this._rejected(result.error);
    }

    this._logger.info(result.value, "Ledger loaded");
    return reply(renderSuccess(`Loaded from ${file}`, this._c));
  }

  private _rejected(error: LedgerError): Reply {
    this._logger.warn({ code: error.code }, error.message);
    return reply(renderError(error, this._c));
  }
}
