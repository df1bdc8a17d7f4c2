/**
 * Process-wide convenience logger.
 *
 * A thin wrapper over one {@link LoggerImpl}. Libraries should prefer passing
 * a logger created with `createLogger`; applications can install one here
 * and log from anywhere.
 *
 * @example
 * ```typescript
 * import { Log, FileTransport } from 'fanlog';
 *
 * Log.init({ level: 'debug', transports: [new FileTransport({ directory: './logs' })] });
 *
 * Log.i('server listening on %d', 8080);
 * Log.e('request failed', new Error('ECONNRESET'));
 * ```
 */

import type { Logger, LoggerConfig, LogLevel } from './types.js';
import { LoggerConfiguration } from './logger-configuration.js';
import { LoggerImpl } from './logger-impl.js';

let current: LoggerImpl | null = null;

function installed(): LoggerImpl {
  if (!current) {
    throw new Error('Log is not initialized, call Log.init() first');
  }
  return current;
}

function init(config: LoggerConfig | LoggerConfiguration): Logger {
  if (config === null || config === undefined || typeof config !== 'object') {
    throw new TypeError('Log.init() requires a configuration object');
  }
  const previous = current;
  if (previous) {
    console.warn('Log is already initialized, replacing the current logger');
  }
  const next = new LoggerImpl(config, 'global');
  current = next;
  previous?.retire(next.config.transports).catch(error => {
    console.error('Closing the replaced logger failed:', error);
  });
  return next;
}

function v(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(v, 'verbose', first, args);
}

function d(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(d, 'debug', first, args);
}

function i(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(i, 'info', first, args);
}

function w(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(w, 'warn', first, args);
}

function e(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(e, 'error', first, args);
}

function a(first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(a, 'assert', first, args);
}

function log(level: LogLevel, first: unknown, ...args: readonly unknown[]): void {
  installed().logFrom(log, level, first, args);
}

/**
 * Remove the installed logger, destroying it. Safe to call when nothing is installed.
 */
async function reset(): Promise<void> {
  const previous = current;
  current = null;
  await previous?.destroy();
}

export const Log = Object.freeze({
  init,
  isInitialized: (): boolean => current !== null,
  /** The installed logger */
  logger: (): Logger => installed(),
  v,
  d,
  i,
  w,
  e,
  a,
  log,
  reset
});
