/**
 * Console Transport
 *
 * Writes flattened lines through the console method matching each level,
 * optionally colourised with ANSI codes. Disabled in production unless
 * `enableInProduction` is set.
 *
 * @example
 * ```typescript
 * import { ConsoleTransport, createPatternFlattener } from 'fanlog';
 *
 * const transport = new ConsoleTransport({
 *   colors: true,
 *   flattener: createPatternFlattener('{d HH:mm:ss.SSS} {l}/{t}: {m}')
 * });
 * ```
 */

import type { LogEntry, LogLevel } from '../logger/types.js';
import { BaseTransport, Colors, Environment, type BaseTransportConfig } from './transport-interface.js';

type ConsoleMethod = 'log' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Console transport configuration
 */
export interface ConsoleTransportConfig extends BaseTransportConfig {
  /** Enable/disable colorized output (default: when stdout is a TTY) */
  colors?: boolean;

  /** Enable/disable in production environments */
  enableInProduction?: boolean;

  /** Custom log level to console method mapping */
  consoleMethods?: Partial<Record<LogLevel, ConsoleMethod>>;
}

const DEFAULT_CONSOLE_METHODS: Readonly<Record<LogLevel, ConsoleMethod>> = {
  verbose: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
  assert: 'error'
};

/**
 * Console transport that outputs logs to the console
 */
export class ConsoleTransport extends BaseTransport {
  private readonly colors: boolean;
  private readonly enableInProduction: boolean;
  private readonly consoleMethods: Readonly<Record<LogLevel, ConsoleMethod>>;

  constructor(config: ConsoleTransportConfig = {}) {
    const colors = config.colors ?? Environment.supportsColors();
    const enableInProduction = config.enableInProduction ?? false;
    const consoleMethods = { ...DEFAULT_CONSOLE_METHODS, ...config.consoleMethods };

    super(config.name ?? 'console', config.flattener, { colors, enableInProduction, consoleMethods });
    this.colors = colors;
    this.enableInProduction = enableInProduction;
    this.consoleMethods = consoleMethods;
  }

  /**
   * Write a log entry to the console
   */
  write(entry: LogEntry): void {
    if (!this.isEnabled()) {
      return;
    }

    const line = this.flatten(entry);
    const output = this.colors ? `${Colors[entry.level]}${line}${Colors.reset}` : line;

    // Resolved per call so replaced console methods are honoured
    console[this.consoleMethods[entry.level]](output);
  }

  /**
   * Check if transport should be active in current environment
   */
  protected isEnabled(): boolean {
    return !Environment.isProduction() || this.enableInProduction;
  }
}

/**
 * Create a console transport with default configuration
 */
export function createConsoleTransport(config?: ConsoleTransportConfig): ConsoleTransport {
  return new ConsoleTransport(config);
}
