/**
 * Transport interfaces and utilities for fanlog
 */

import type { Flattener, LogEntry, LogLevel, Transport } from '../logger/types.js';
import { classicFlattener } from '../logger/flattener.js';

/**
 * Environment detection utilities
 */
export const Environment = {
  /** Check if running in production environment */
  isProduction: (): boolean => process.env.NODE_ENV === 'production',

  /** Check if stdout is a terminal that renders ANSI colours */
  supportsColors: (): boolean => Boolean(process.stdout?.isTTY)
} as const;

/**
 * Options shared by every built-in transport
 */
export interface BaseTransportConfig {
  /** Transport name, unique per logger */
  name?: string;

  /** Turns entries into output lines (default: classic flattener) */
  flattener?: Flattener;
}

/**
 * Base transport class with common functionality
 */
export abstract class BaseTransport implements Transport {
  public readonly name: string;
  public readonly config: Record<string, unknown>;
  protected readonly flattener: Flattener;

  constructor(name: string, flattener: Flattener = classicFlattener, config: Record<string, unknown> = {}) {
    if (!name || typeof name !== 'string') {
      throw new TypeError('Transport must have a valid name');
    }
    if (typeof flattener !== 'function') {
      throw new TypeError('Flattener must be a function');
    }
    this.name = name;
    this.flattener = flattener;
    this.config = config;
  }

  /**
   * Write a log entry to this transport
   */
  abstract write(entry: LogEntry): Promise<void> | void;

  /**
   * Flush any pending output (default: no-op)
   */
  flush(): Promise<void> | void {
    // Nothing buffered by default
  }

  /**
   * Close the transport and clean up resources (default: no-op)
   */
  close(): Promise<void> | void {
    // Nothing to release by default
  }

  /**
   * Flatten an entry into its output line
   */
  protected flatten(entry: LogEntry): string {
    return this.flattener(entry.timestamp, entry.level, entry.tag, entry.message);
  }
}

/**
 * ANSI color codes for terminal output
 */
export const Colors: Readonly<Record<LogLevel | 'reset', string>> = {
  verbose: '\x1b[90m',  // Bright Black (Gray)
  debug: '\x1b[36m',    // Cyan
  info: '\x1b[32m',     // Green
  warn: '\x1b[33m',     // Yellow
  error: '\x1b[31m',    // Red
  assert: '\x1b[35m',   // Magenta
  reset: '\x1b[0m'
};
