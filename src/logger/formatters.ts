/**
 * Message formatters used to compose a record into its finished body
 */

import { isMainThread, threadId } from 'node:worker_threads';
import type { FormatterSet, ThreadInfo } from './types.js';

const BORDER_WIDTH = 100;

const TOP = `╔${'═'.repeat(BORDER_WIDTH)}`;
const DIVIDER = `╟${'─'.repeat(BORDER_WIDTH)}`;
const BOTTOM = `╚${'═'.repeat(BORDER_WIDTH)}`;
const SIDE = '║ ';

/**
 * Error stack (or message) of a throwable; non-errors are stringified
 */
export function formatThrowable(throwable: unknown): string {
  if (throwable instanceof Error) {
    return throwable.stack ?? `${throwable.name}: ${throwable.message}`;
  }
  return formatObject(throwable);
}

export function formatThread(info: ThreadInfo): string {
  const name = info.isMainThread ? 'main' : 'worker';
  return `Thread: ${name} (id ${info.threadId}, pid ${info.pid})`;
}

/**
 * One frame per line; the first line is marked as the call site
 */
export function formatStackTrace(frames: readonly string[]): string {
  if (frames.length === 0) return '';
  if (frames.length === 1) return `\t─ ${frames[0]}`;
  return frames
    .map((frame, index) => {
      if (index === 0) return `\t┌ ${frame}`;
      if (index === frames.length - 1) return `\t└ ${frame}`;
      return `\t├ ${frame}`;
    })
    .join('\n');
}

/**
 * Box border around the non-empty segments, separated by dividers
 */
export function formatBorder(segments: readonly string[]): string {
  const visible = segments.filter(segment => segment.length > 0);
  if (visible.length === 0) return '';

  const lines = [TOP];
  visible.forEach((segment, index) => {
    if (index > 0) lines.push(DIVIDER);
    segment.split('\n').forEach(line => lines.push(`${SIDE}${line}`));
  });
  lines.push(BOTTOM);
  return lines.join('\n');
}

/**
 * String form of an arbitrary value
 */
export function formatObject(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return formatThrowable(value);
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  if (typeof value === 'bigint') return `${value}n`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular references or non-serializable objects
    return String(value);
  }
}

export function currentThreadInfo(): ThreadInfo {
  return { threadId, isMainThread, pid: process.pid };
}

export const DEFAULT_FORMATTERS: Readonly<FormatterSet> = Object.freeze({
  throwable: formatThrowable,
  thread: formatThread,
  stackTrace: formatStackTrace,
  border: formatBorder,
  object: formatObject
});
