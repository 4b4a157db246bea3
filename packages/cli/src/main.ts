#!/usr/bin/env -S node --import tsx
/**
 * @splitledger/cli — Entry point.
 *
 * Loads config, builds the logger and an empty ledger, optionally
 * loads LEDGER_FILE, then hands stdin/stdout to the prompt loop.
 */

import { Ledger } from "@splitledger/ledger";
import { loadConfig } from "./config.js";
import { CommandInterpreter } from "./interpreter.js";
import { createLogger } from "./logger.js";
import { runRepl } from "./repl.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const interpreter = new CommandInterpreter({
    ledger: new Ledger(),
    logger,
    defaultFile: config.LEDGER_FILE,
  });

  if (config.AUTOLOAD) {
    if (config.LEDGER_FILE === undefined) {
      logger.warn("AUTOLOAD is set but LEDGER_FILE is not; starting empty");
    } else {
      for (const line of interpreter.run({ kind: "load", file: config.LEDGER_FILE }).lines) {
        process.stdout.write(`${line}\n`);
      }
    }
  }

  await runRepl({
    interpreter,
    input: process.stdin,
    output: process.stdout,
    logger,
  });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
