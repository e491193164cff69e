/**
 * Logger constants: level priorities and defaults
 */

import type { LogLevel } from "@/types";

/** Lines below the configured level's priority are dropped */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVEL_ENV = "LOG_LEVEL";

export const DEFAULT_LOG_LEVEL: LogLevel = "info";
