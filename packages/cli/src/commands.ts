/**
 * @splitledger/cli — Command line parsing.
 *
 * Turns one line of user input into a Command. Parsing never fails:
 * malformed input becomes a "usage" or "unknown" command that the
 * interpreter reports back.
 */

export type Command =
  | { readonly kind: "empty" }
  | { readonly kind: "help" }
  | { readonly kind: "exit" }
  | { readonly kind: "add-user"; readonly name: string }
  | {
      readonly kind: "add-equal";
      readonly payer: string;
      readonly amount: string;
      readonly participants: readonly string[];
    }
  | {
      readonly kind: "add-exact";
      readonly payer: string;
      readonly amount: string;
      readonly tokens: readonly string[];
    }
  | { readonly kind: "balances" }
  | { readonly kind: "settle" }
  | { readonly kind: "save"; readonly file: string | undefined }
  | { readonly kind: "load"; readonly file: string | undefined }
  | { readonly kind: "usage"; readonly message: string }
  | { readonly kind: "unknown"; readonly word: string };

export type CommandKind = Command["kind"];

export const USAGE = {
  addUser: "Usage: add-user <name>",
  addExpense: "Usage: add-expense equal|exact ...  (see 'help')",
  save: "Usage: save <file>",
  load: "Usage: load <file>",
} as const;

export const HELP_TEXT = `Commands:
  add-user <name>
  add-expense equal <payer> <amount> <p1> <p2> ...
  add-expense exact <payer> <amount> <name1:share1> <name2:share2> ...
  balances
  settle
  save <file>
  load <file>
  help
  exit
`;

function parseExpense(words: readonly string[]): Command {
  const [type, payer, amount, ...rest] = words;
  if (payer === undefined || amount === undefined) {
    return { kind: "usage", message: USAGE.addExpense };
  }
  if (type === "equal") {
    return { kind: "add-equal", payer, amount, participants: rest };
  }
  if (type === "exact") {
    return { kind: "add-exact", payer, amount, tokens: rest };
  }
  return { kind: "usage", message: USAGE.addExpense };
}

/**
 * Parse one input line.
 *
 * `add-user` takes the rest of the line as the name, so names may
 * contain spaces; every other command is split on whitespace.
 */
export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (trimmed === "") {
    return { kind: "empty" };
  }

  const [word = "", ...args] = trimmed.split(/\s+/);

  switch (word) {
    case "help":
      return { kind: "help" };
    case "exit":
    case "quit":
      return { kind: "exit" };
    case "add-user": {
      const name = trimmed.slice(word.length).trim();
      return name === ""
        ? { kind: "usage", message: USAGE.addUser }
        : { kind: "add-user", name };
    }
    case "add-expense":
      return parseExpense(args);
    case "balances":
      return { kind: "balances" };
    case "settle":
      return { kind: "settle" };
    case "save":
      return { kind: "save", file: args[0] };
    case "load":
      return { kind: "load", file: args[0] };
    default:
      return { kind: "unknown", word };
  }
}
