/**
 * @splitledger/cli — Interactive command interpreter for the ledger.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { parseCommand, HELP_TEXT, USAGE } from "./commands.js";
export type { Command, CommandKind } from "./commands.js";
export { CommandInterpreter } from "./interpreter.js";
export type { InterpreterOptions, Reply } from "./interpreter.js";
export {
  renderBalances,
  renderSettlement,
  renderSuccess,
  renderError,
  renderNotice,
} from "./render.js";
export { runRepl, BANNER, PROMPT, FAREWELL } from "./repl.js";
export type { ReplOptions } from "./repl.js";
