/**
 * Log level ordering, names and parsing
 */

import type { LevelThreshold, LogLevel } from './types.js';

/**
 * Log level hierarchy for comparison.
 * Higher numbers indicate higher priority.
 */
export const LOG_LEVEL_PRIORITY: Readonly<Record<LevelThreshold, number>> = Object.freeze({
  all: Number.MIN_SAFE_INTEGER,
  verbose: 2,
  debug: 3,
  info: 4,
  warn: 5,
  error: 6,
  assert: 7,
  none: Number.MAX_SAFE_INTEGER
});

/** All concrete levels, lowest first */
export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
  'verbose',
  'debug',
  'info',
  'warn',
  'error',
  'assert'
]);

const SHORT_NAMES: Readonly<Record<LogLevel, string>> = {
  verbose: 'V',
  debug: 'D',
  info: 'I',
  warn: 'W',
  error: 'E',
  assert: 'A'
};

/**
 * One-letter level name, as used by the flatteners
 */
export function shortLevelName(level: LogLevel): string {
  return SHORT_NAMES[level];
}

/**
 * Upper-case level name, e.g. `WARN`
 */
export function levelName(level: LogLevel): string {
  return level.toUpperCase();
}

/**
 * Checks if a record at `level` passes the `threshold`
 *
 * @returns True if the record should be processed
 */
export function isLoggable(level: LogLevel, threshold: LevelThreshold): boolean {
  if (threshold === 'none') return false;
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[threshold];
}

export function isLevelThreshold(value: unknown): value is LevelThreshold {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parses a level from user input such as `"WARN"`, `"w"` or `"none"`.
 *
 * @throws {TypeError} If the input names no level
 */
export function parseLogLevel(input: string): LevelThreshold {
  const normalized = input.trim().toLowerCase();
  if (isLevelThreshold(normalized)) {
    return normalized;
  }
  const byShortName = LOG_LEVELS.find(level => SHORT_NAMES[level].toLowerCase() === normalized);
  if (byShortName) {
    return byShortName;
  }
  throw new TypeError(`Invalid log level: ${input}`);
}
