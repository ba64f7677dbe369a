/**
 * Logging helper functions
 */

import type { ChalkInstance } from 'chalk';
import type { LogLevel, LogLevels, FilterContext } from './types';

const TAG_DEBUG = '[DEBUG]    ';
const TAG_INFO = 'ℹ️ [INFO]     ';
const TAG_WARNING = '⚠️ [WARNING]  ';
const TAG_CRITICAL = '🚨 [CRITICAL] ';

/**
 * Format log message with level tag
 *
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = TAG_DEBUG;
  if (level === logLevels.INFO) tag = TAG_INFO;
  if (level === logLevels.WARNING) tag = TAG_WARNING;
  if (level === logLevels.CRITICAL) tag = TAG_CRITICAL;

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * 1. Message level must be >= current level
 * 2. INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0 &&
      context.uptime > context.demoteHours * 3600) {
    return false;
  }

  return true;
}

/**
 * Colour a formatted line by its level tag
 * @param line - Line produced by formatLogMessage
 * @param palette - Chalk instance to colour with
 * @returns Coloured line; untagged lines are returned unchanged
 */
export function colorizeLine(line: string, palette: ChalkInstance): string {
  if (line.startsWith(TAG_CRITICAL)) return palette.red(line);
  if (line.startsWith(TAG_WARNING)) return palette.yellow(line);
  if (line.startsWith(TAG_INFO)) return palette.green(line);
  if (line.startsWith(TAG_DEBUG)) return palette.gray(line);
  return line;
}

/**
 * Coerce a configured numeric level into a LogLevel
 * @param value - Configured level
 * @returns Matching LogLevel, or null when out of range
 */
export function toLogLevel(value: number): LogLevel | null {
  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }
  return null;
}
