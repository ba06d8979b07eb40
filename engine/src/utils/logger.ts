/**
 * desktop-repack Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every pipeline step, external command
 * and stub-binding call logs through this module.
 *
 * When verbose=false (default), logging is silent so CLI users only see the
 * staged output. When verbose=true (--debug), structured logs go to stderr.
 *
 * NOTE: We use pino.destination() instead of pino transports because
 * transports spawn worker_threads which break inside bundles.
 */

import pino from "pino";

export interface LoggerOptions {
  level: "silent" | "debug" | "info" | "warn" | "error";
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      base: { name: "desktop-repack" },
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // Synchronous stderr, no worker_threads
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
