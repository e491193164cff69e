/**
 * Console logger for runs and batches
 *
 * One line per call: `[ISO time] [LEVEL] message {meta}`. The threshold is
 * read from LOG_LEVEL once, when the module loads; unknown values mean info.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env[LOG_LEVEL_ENV]?.toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL;
const currentLevelValue = LOG_LEVELS[currentLevel];

/**
 * Meta rendered as a trailing JSON object; empty meta adds nothing.
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Writes one line: debug and info to stdout, warn and error to stderr.
 */
function log(
  level: LogLevel,
  message: string,
  meta?: LogMeta,
): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Logger that prefixes every call's meta with `context` (call meta wins
 * on a key clash), e.g. the profile title for a whole batch.
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
