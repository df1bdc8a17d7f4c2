/**
 * Logger Configuration Management Component
 *
 * Validates and freezes logger configuration. A configuration is built once,
 * either from a plain object or through {@link LoggerConfigBuilder}, and is
 * then shared read-only by the logger for its whole lifetime. Use
 * {@link LoggerConfiguration.clone} to derive a changed configuration.
 *
 * @example
 * ```typescript
 * import { LoggerConfiguration } from './logger-configuration';
 *
 * const config = LoggerConfiguration.builder()
 *   .level('debug')
 *   .tag('user-service')
 *   .enableThreadInfo()
 *   .enableStackTrace(3)
 *   .addInterceptor(blacklistTags(['http']))
 *   .build();
 *
 * if (config.isLoggable('info')) {
 *   // Log the message
 * }
 * ```
 */

import type {
  FormatterSet,
  Interceptor,
  LevelThreshold,
  LoggerConfig,
  LogLevel,
  StackTraceConfig,
  Transport
} from './types.js';
import { isLevelThreshold, isLoggable } from './log-level.js';
import { DEFAULT_LOGGER_CONFIG, mergeConfig, type ResolvedLoggerConfig } from './logger-config.js';

/**
 * Immutable configuration for logger instances
 */
export class LoggerConfiguration {
  private readonly config: ResolvedLoggerConfig;

  /**
   * Creates a new configuration
   *
   * @param userConfig - User-provided configuration
   * @param base - Resolved configuration filling every option the user leaves out
   * @throws {TypeError} If the configuration is not an object or holds invalid values
   * @throws {RangeError} If the stack trace depth is negative
   */
  constructor(userConfig: LoggerConfig = {}, base: ResolvedLoggerConfig = DEFAULT_LOGGER_CONFIG) {
    if (userConfig === null || typeof userConfig !== 'object') {
      throw new TypeError('Logger configuration must be an object');
    }
    const merged = mergeConfig(userConfig, base);
    validate(merged);
    this.config = freezeConfig(merged);
  }

  /** Start building a configuration fluently */
  static builder(): LoggerConfigBuilder {
    return new LoggerConfigBuilder();
  }

  get level(): LevelThreshold {
    return this.config.level;
  }

  get tag(): string {
    return this.config.tag;
  }

  get withThread(): boolean {
    return this.config.withThread;
  }

  get stackTrace(): Readonly<StackTraceConfig> | false {
    return this.config.stackTrace;
  }

  get withBorder(): boolean {
    return this.config.withBorder;
  }

  get formatters(): Readonly<FormatterSet> {
    return this.config.formatters;
  }

  get interceptors(): readonly Interceptor[] {
    return this.config.interceptors;
  }

  get transports(): readonly Transport[] {
    return this.config.transports;
  }

  /**
   * Get the full configuration object (frozen)
   */
  get fullConfig(): ResolvedLoggerConfig {
    return this.config;
  }

  /**
   * Check if a record at this level passes the configured threshold
   */
  isLoggable(level: LogLevel): boolean {
    return isLoggable(level, this.config.level);
  }

  /**
   * Clone this configuration
   *
   * @param overrides - Optional configuration overrides
   * @returns New LoggerConfiguration instance
   */
  clone(overrides: LoggerConfig = {}): LoggerConfiguration {
    return new LoggerConfiguration(overrides, this.config);
  }

}

/**
 * Fluent builder for {@link LoggerConfiguration}
 */
export class LoggerConfigBuilder {
  private config: LoggerConfig = {};
  private readonly interceptorList: Interceptor[] = [];
  private formatterOverrides: Partial<FormatterSet> = {};

  level(level: LevelThreshold): this {
    this.config.level = level;
    return this;
  }

  tag(tag: string): this {
    this.config.tag = tag;
    return this;
  }

  enableThreadInfo(): this {
    this.config.withThread = true;
    return this;
  }

  disableThreadInfo(): this {
    this.config.withThread = false;
    return this;
  }

  /**
   * @param depth - Frames to keep, 0 for all
   * @param origin - Drop frames up to the last one containing this text
   */
  enableStackTrace(depth: number, origin?: string): this {
    this.config.stackTrace = origin === undefined ? { depth } : { depth, origin };
    return this;
  }

  disableStackTrace(): this {
    this.config.stackTrace = false;
    return this;
  }

  enableBorder(): this {
    this.config.withBorder = true;
    return this;
  }

  disableBorder(): this {
    this.config.withBorder = false;
    return this;
  }

  throwableFormatter(formatter: FormatterSet['throwable']): this {
    this.formatterOverrides = { ...this.formatterOverrides, throwable: formatter };
    return this;
  }

  threadFormatter(formatter: FormatterSet['thread']): this {
    this.formatterOverrides = { ...this.formatterOverrides, thread: formatter };
    return this;
  }

  stackTraceFormatter(formatter: FormatterSet['stackTrace']): this {
    this.formatterOverrides = { ...this.formatterOverrides, stackTrace: formatter };
    return this;
  }

  borderFormatter(formatter: FormatterSet['border']): this {
    this.formatterOverrides = { ...this.formatterOverrides, border: formatter };
    return this;
  }

  objectFormatter(formatter: FormatterSet['object']): this {
    this.formatterOverrides = { ...this.formatterOverrides, object: formatter };
    return this;
  }

  addInterceptor(interceptor: Interceptor): this {
    this.interceptorList.push(interceptor);
    return this;
  }

  transports(...transports: Transport[]): this {
    this.config.transports = transports;
    return this;
  }

  build(): LoggerConfiguration {
    return new LoggerConfiguration({
      ...this.config,
      formatters: { ...this.formatterOverrides },
      interceptors: [...this.interceptorList]
    });
  }
}

function validate(config: ResolvedLoggerConfig): void {
  if (!isLevelThreshold(config.level)) {
    throw new TypeError(`Invalid log level: ${String(config.level)}`);
  }
  if (typeof config.tag !== 'string' || config.tag.length === 0) {
    throw new TypeError('Tag must be a non-empty string');
  }
  if (config.stackTrace) {
    const { depth } = config.stackTrace;
    if (!Number.isInteger(depth)) {
      throw new TypeError('Stack trace depth must be an integer');
    }
    if (depth < 0) {
      throw new RangeError('Stack trace depth must not be negative');
    }
  }
  for (const [name, formatter] of Object.entries(config.formatters)) {
    if (typeof formatter !== 'function') {
      throw new TypeError(`Formatter "${name}" must be a function`);
    }
  }
}

function freezeConfig(config: ResolvedLoggerConfig): ResolvedLoggerConfig {
  return Object.freeze({
    ...config,
    stackTrace: config.stackTrace && Object.freeze({ ...config.stackTrace }),
    formatters: Object.freeze({ ...config.formatters }),
    interceptors: Object.freeze([...config.interceptors]),
    transports: Object.freeze([...config.transports])
  });
}
