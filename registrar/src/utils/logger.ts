/**
 * runnerkit Registrar -- Structured Logger
 *
 * Wraps pino for structured logging. Registration, store and audit
 * messages all go through this module.
 *
 * Logging is silent unless a level is given. Logs go to stderr through
 * pino.destination() so stdout stays free for command output.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "debug",
  "info",
  "warn",
  "error",
];

export interface LoggerOptions {
  level: LogLevel;
  /** Where log lines are written; stderr when omitted */
  destination?: pino.DestinationStream;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  // Synchronous I/O, no transport worker threads
  const dest = opts.destination ?? pino.destination({ fd: 2, sync: true });

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    dest,
  );
}

export type Logger = pino.Logger;
