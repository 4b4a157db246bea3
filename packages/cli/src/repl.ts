/**
 * @splitledger/cli — Interactive prompt loop.
 *
 * Reads commands line by line until `exit`, `quit` or end of input,
 * writing replies and prompts to the output stream.
 */

import { createInterface } from "node:readline";
import type { Logger } from "pino";
import type { CommandInterpreter } from "./interpreter.js";

export const BANNER = "Splitledger. Type 'help' for commands.";
export const PROMPT = "> ";
export const FAREWELL = "Bye!";

export interface ReplOptions {
  readonly interpreter: CommandInterpreter;
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  readonly logger: Logger;
}

/**
 * Run the session. Resolves with the number of lines read.
 */
export async function runRepl(options: ReplOptions): Promise<number> {
  const { interpreter, input, output, logger } = options;
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });

  logger.info("Session started");
  output.write(`${BANNER}\n`);
  output.write(PROMPT);

  let count = 0;
  try {
    for await (const line of rl) {
      count++;
      const reply = interpreter.execute(line);
      for (const text of reply.lines) {
        output.write(`${text}\n`);
      }
      if (reply.exit) {
        break;
      }
      output.write(PROMPT);
    }
  } finally {
    rl.close();
  }

  output.write(`${FAREWELL}\n`);
  logger.info({ lines: count }, "Session ended");
  return count;
}
