/**
 * Structured logging for the playback core, built on pino.
 *
 * Components take an optional `logger`; when none is given they use a child
 * of the root logger bound to their component name.
 */

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  level: process.env["LOG_LEVEL"] ?? "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // JSON lines in production and under test, pretty output on a terminal otherwise
  ...(process.env["NODE_ENV"] === "production" || process.env["NODE_ENV"] === "test"
    ? {}
    : {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }),
});

/** Child logger for one component, e.g. `createLogger("orchestrator")`. */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

/** Serializable view of anything caught, for the `err` field of a log line. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}
