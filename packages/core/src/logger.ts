/**
 * Structured JSON logging.
 */

import { pino, type Logger } from "pino";

export type { Logger };

const root: Logger = pino({
  name: "erpsync",
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger tagged with the component name.
 */
export function createLogger(component: string): Logger {
  return root.child({ component });
}

/**
 * Logger that discards everything (tests, dry runs).
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
