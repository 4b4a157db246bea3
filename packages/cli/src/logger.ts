/**
 * @splitledger/cli — Structured logging.
 *
 * pino writes to stderr so that stdout stays reserved for the
 * interactive session. Development mode pretty-prints via pino-pretty.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger };

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
