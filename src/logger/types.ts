/**
 * Core Logger Types and Interface Definitions
 *
 * Foundational type definitions for fanlog: levels, immutable log records,
 * the interceptor capabilities, transports and logger configuration.
 *
 * Key Types:
 * - LogRecord, the immutable event flowing through the interceptor chain
 * - LogEntry, the finished entry handed to every transport
 * - Interceptor, a filter or transform variant
 * - Transport, the pluggable output destination
 * - LoggerConfig for logger configuration
 *
 * @example
 * ```typescript
 * import type { LoggerConfig, Transport } from 'fanlog';
 *
 * const config: LoggerConfig = {
 *   level: 'info',
 *   tag: 'billing',
 *   withThread: true,
 *   interceptors: [blacklistTags(['noisy'])],
 *   transports: [new ConsoleTransport(), fileTransport]
 * };
 *
 * const customTransport: Transport = {
 *   name: 'custom-transport',
 *   write: (entry) => {
 *     process.stdout.write(`${entry.tag}: ${entry.message}\n`);
 *   },
 *   flush: () => {},
 *   close: () => {}
 * };
 * ```
 */

/**
 * Log levels supported by the logger, lowest first
 */
export type LogLevel = 'verbose' | 'debug' | 'info' | 'warn' | 'error' | 'assert';

/**
 * Minimum level accepted by a logger. `all` admits every level, `none` disables output.
 */
export type LevelThreshold = LogLevel | 'all' | 'none';

/**
 * One log event. Records are frozen once built; interceptors return new records.
 */
export interface LogRecord {
  /** Creation time in epoch milliseconds */
  readonly timestamp: number;

  readonly level: LogLevel;

  readonly tag: string;

  /** Message text without the throwable trace */
  readonly message: string;

  /** Error value attached to the call, if any */
  readonly throwable?: unknown;

  /** Formatted thread info when thread info is enabled */
  readonly threadInfo?: string;

  /** Formatted call-site stack trace when stack traces are enabled */
  readonly stackTrace?: string;
}

/**
 * Finished entry passed to transports. `message` is the composed body
 * (thread info, stack trace, message and throwable, optionally bordered).
 */
export interface LogEntry {
  readonly timestamp: number;
  readonly level: LogLevel;
  readonly tag: string;
  readonly message: string;
}

/**
 * Interceptor that drops records. A `true` result short-circuits the chain.
 */
export interface FilterInterceptor {
  readonly kind: 'filter';
  readonly name?: string;
  reject(record: LogRecord): boolean;
}

/**
 * Interceptor that rewrites records
 */
export interface TransformInterceptor {
  readonly kind: 'transform';
  readonly name?: string;
  intercept(record: LogRecord): LogRecord;
}

export type Interceptor = FilterInterceptor | TransformInterceptor;

/**
 * Converts a record's fields into one output line. Must be pure.
 */
export type Flattener = (timestamp: number, level: LogLevel, tag: string, message: string) => string;

/**
 * Transport interface for log output
 */
export interface Transport {
  /** Transport name for identification */
  name: string;

  /** Write a finished entry to this transport */
  write(entry: LogEntry): Promise<void> | void;

  /** Flush any pending output */
  flush(): Promise<void> | void;

  /** Close the transport and release its resources */
  close(): Promise<void> | void;

  /** Transport configuration */
  config?: Record<string, unknown>;
}

/**
 * Stack trace capture settings
 */
export interface StackTraceConfig {
  /** Maximum number of frames to keep, 0 for all */
  depth: number;

  /**
   * Frames up to and including the last one containing this text are dropped.
   * Use it when wrapping the logger in another helper.
   */
  origin?: string;
}

/**
 * Formatters used to compose a record into a message body
 */
export interface FormatterSet {
  throwable: (throwable: unknown) => string;
  thread: (info: ThreadInfo) => string;
  stackTrace: (frames: readonly string[]) => string;
  border: (segments: readonly string[]) => string;
  object: (value: unknown) => string;
}

/**
 * Information about the thread issuing a log call
 */
export interface ThreadInfo {
  threadId: number;
  isMainThread: boolean;
  pid: number;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to process */
  level?: LevelThreshold;

  /** Tag used when a call does not name one */
  tag?: string;

  /** Include thread info in each message */
  withThread?: boolean;

  /** Include the call-site stack trace in each message */
  stackTrace?: StackTraceConfig | false;

  /** Wrap each message in a border */
  withBorder?: boolean;

  /** Replacement formatters */
  formatters?: Partial<FormatterSet>;

  /** Interceptors, applied in order */
  interceptors?: Interceptor[];

  /** Output destinations */
  transports?: Transport[];
}

/**
 * Logger interface - main logging API.
 *
 * Every level method accepts a printf-style message with arguments, a message
 * followed by an error, or a single value of any other type.
 */
export interface Logger {
  /** Logger name/identifier */
  readonly name: string;

  /** Current minimum level */
  readonly level: LevelThreshold;

  verbose(message: string, ...args: readonly unknown[]): void;
  verbose(value: unknown): void;

  debug(message: string, ...args: readonly unknown[]): void;
  debug(value: unknown): void;

  info(message: string, ...args: readonly unknown[]): void;
  info(value: unknown): void;

  warn(message: string, ...args: readonly unknown[]): void;
  warn(value: unknown): void;

  error(message: string, ...args: readonly unknown[]): void;
  error(value: unknown): void;

  assert(message: string, ...args: readonly unknown[]): void;
  assert(value: unknown): void;

  /** Log at a level chosen at run time */
  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;
  log(level: LogLevel, value: unknown): void;

  /** Create a logger with overridden configuration sharing the same transports */
  withConfig(overrides: Omit<LoggerConfig, 'transports'>): Logger;

  /** Flush all transports */
  flush(): Promise<void>;

  /** Destroy logger and close its transports */
  destroy(): Promise<void>;
}
