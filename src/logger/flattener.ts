/**
 * Flatteners turn a record's fields into one output line.
 *
 * A flattener is a plain function and must be pure: the same inputs always
 * produce the same line. Dates are rendered in local time.
 *
 * @example
 * ```typescript
 * classicFlattener(Date.now(), 'info', 'net', 'connected');
 * // "2024-03-09 14:02:11.250 I/net: connected"
 *
 * const flatten = createPatternFlattener('{d HH:mm:ss} {L} [{t}] {m}');
 * flatten(Date.now(), 'warn', 'db', 'slow query');
 * // "14:02:11 WARN [db] slow query"
 * ```
 */

import type { Flattener } from './types.js';
import { levelName, shortLevelName } from './log-level.js';

/** Date format used by the classic flattener and by `{d}` */
export const DEFAULT_DATE_FORMAT = 'yyyy-MM-dd HH:mm:ss.SSS';

const DATE_TOKEN = /yyyy|MM|dd|HH|mm|ss|SSS/g;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a timestamp in local time with the tokens
 * `yyyy`, `MM`, `dd`, `HH`, `mm`, `ss` and `SSS`
 */
export function formatTimestamp(timestamp: number, format: string = DEFAULT_DATE_FORMAT): string {
  const date = new Date(timestamp);
  return format.replace(DATE_TOKEN, token => {
    switch (token) {
      case 'yyyy':
        return pad(date.getFullYear(), 4);
      case 'MM':
        return pad(date.getMonth() + 1, 2);
      case 'dd':
        return pad(date.getDate(), 2);
      case 'HH':
        return pad(date.getHours(), 2);
      case 'mm':
        return pad(date.getMinutes(), 2);
      case 'ss':
        return pad(date.getSeconds(), 2);
      default:
        return pad(date.getMilliseconds(), 3);
    }
  });
}

/**
 * `2024-03-09 14:02:11.250 I/tag: message`
 */
export const classicFlattener: Flattener = (timestamp, level, tag, message) =>
  `${formatTimestamp(timestamp)} ${shortLevelName(level)}/${tag}: ${message}`;

/**
 * `1709992931250|I|tag|message`
 */
export const defaultFlattener: Flattener = (timestamp, level, tag, message) =>
  `${timestamp}|${shortLevelName(level)}|${tag}|${message}`;

/**
 * Passes the message through untouched
 */
export const messageOnlyFlattener: Flattener = (_timestamp, _level, _tag, message) => message;

const PATTERN_PLACEHOLDER = /\{(d(?: ([^}]+))?|l|L|t|m)\}/g;

/**
 * Creates a flattener from a pattern.
 *
 * Placeholders:
 * - `{d}` timestamp with the default date format, `{d <format>}` with a custom one
 * - `{l}` short level name, `{L}` full level name
 * - `{t}` tag
 * - `{m}` message
 *
 * @throws {TypeError} If the pattern contains no placeholder
 */
export function createPatternFlattener(pattern: string): Flattener {
  if (typeof pattern !== 'string' || !pattern.match(PATTERN_PLACEHOLDER)) {
    throw new TypeError(`Pattern must contain at least one placeholder: ${pattern}`);
  }

  return (timestamp, level, tag, message) =>
    pattern.replace(PATTERN_PLACEHOLDER, (_match, key: string, dateFormat: string | undefined) => {
      if (key.startsWith('d')) {
        return formatTimestamp(timestamp, dateFormat ?? DEFAULT_DATE_FORMAT);
      }
      switch (key) {
        case 'l':
          return shortLevelName(level);
        case 'L':
          return levelName(level);
        case 't':
          return tag;
        default:
          return message;
      }
    });
}
