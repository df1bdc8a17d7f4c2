/** Core Logger Implementation - level gate, interceptor chain, composition and fan-out */

import { format } from 'node:util';
import type { LevelThreshold, LogEntry, Logger, LoggerConfig, LogLevel, LogRecord, Transport } from './types.js';
import { LoggerConfiguration } from './logger-configuration.js';
import { InterceptorChain } from './interceptor-chain.js';
import { TransportRegistry } from './transport-registry.js';
import { currentThreadInfo } from './formatters.js';
import { ConsoleTransport } from '../transports/console-transport.js';

/** Function whose frame, and every frame above it, is cut from captured stack traces */
export type CallBoundary = Function;

/** Core logger implementation */
export class LoggerImpl implements Logger {
  private readonly configuration: LoggerConfiguration;
  private readonly chain: InterceptorChain;
  private readonly transportRegistry: TransportRegistry;
  private readonly ownsTransports: boolean;
  private destroyed = false;

  /** Creates a new logger instance */
  constructor(
    config: LoggerConfig | LoggerConfiguration = {},
    private readonly loggerName: string = 'default',
    sharedRegistry?: TransportRegistry
  ) {
    this.configuration = config instanceof LoggerConfiguration ? config : new LoggerConfiguration(config);
    this.chain = new InterceptorChain(this.configuration.interceptors);

    if (sharedRegistry) {
      this.transportRegistry = sharedRegistry;
      this.ownsTransports = false;
    } else {
      const transports = this.configuration.transports.length > 0
        ? this.configuration.transports
        : [new ConsoleTransport()];
      this.transportRegistry = new TransportRegistry(transports);
      this.ownsTransports = true;
    }
  }

  /** Logger name/identifier */
  get name(): string {
    return this.loggerName;
  }

  /** Current minimum log level */
  get level(): LevelThreshold {
    return this.configuration.level;
  }

  /** Configuration this logger was built with */
  get config(): LoggerConfiguration {
    return this.configuration;
  }

  verbose(first: unknown, ...args: readonly unknown[]): void {
    this.println('verbose', first, args, this.verbose);
  }

  debug(first: unknown, ...args: readonly unknown[]): void {
    this.println('debug', first, args, this.debug);
  }

  info(first: unknown, ...args: readonly unknown[]): void {
    this.println('info', first, args, this.info);
  }

  warn(first: unknown, ...args: readonly unknown[]): void {
    this.println('warn', first, args, this.warn);
  }

  error(first: unknown, ...args: readonly unknown[]): void {
    this.println('error', first, args, this.error);
  }

  assert(first: unknown, ...args: readonly unknown[]): void {
    this.println('assert', first, args, this.assert);
  }

  log(level: LogLevel, first: unknown, ...args: readonly unknown[]): void {
    this.println(level, first, args, this.log);
  }

  /**
   * Entry point for wrappers that want their own frame cut from stack traces
   *
   * @internal
   */
  logFrom(boundary: CallBoundary, level: LogLevel, first: unknown, args: readonly unknown[]): void {
    this.println(level, first, args, boundary);
  }

  /** Creates a logger with overridden configuration sharing this logger's transports */
  withConfig(overrides: Omit<LoggerConfig, 'transports'>): Logger {
    return new LoggerImpl(this.configuration.clone(overrides), this.loggerName, this.transportRegistry);
  }

  /** Flushes all transports */
  async flush(): Promise<void> {
    await this.transportRegistry.flushAll();
  }

  /**
   * Destroys the logger. Transports are closed by the logger that created
   * them; derived loggers only stop accepting calls.
   */
  async destroy(): Promise<void> {
    await this.retire([]);
  }

  /**
   * Destroys the logger but leaves open the transports listed in `keep`,
   * for a successor that reuses them
   *
   * @internal
   */
  async retire(keep: readonly Transport[]): Promise<void> {
    if (this.destroyed) return;

    this.destroyed = true;

    await this.transportRegistry.flushAll();
    if (!this.ownsTransports) return;

    for (const name of this.transportRegistry.getTransportNames()) {
      const transport = this.transportRegistry.getTransport(name);
      if (transport && keep.includes(transport)) {
        this.transportRegistry.remove(name);
      }
    }
    await this.transportRegistry.closeAll();
  }


  /** Core logging method that handles all log levels */
  private println(level: LogLevel, first: unknown, args: readonly unknown[], boundary: CallBoundary): void {
    if (this.destroyed) return;
    if (!this.configuration.isLoggable(level)) return;

    let entry: LogEntry;
    try {
      const record = this.chain.process(this.createRecord(level, first, args, boundary));
      if (!record) return;

      entry = {
        timestamp: record.timestamp,
        level: record.level,
        tag: record.tag,
        message: this.compose(record)
      };
    } catch (error) {
      // A throwing formatter drops this record only
      console.error(`Formatter for logger ${this.loggerName} failed:`, error);
      return;
    }

    this.transportRegistry.writeToAll(entry);
  }

  private createRecord(level: LogLevel, first: unknown, args: readonly unknown[], boundary: CallBoundary): LogRecord {
    const { formatters, withThread, stackTrace, tag } = this.configuration;

    let message: string;
    let throwable: unknown;

    if (typeof first === 'string') {
      const last = args[args.length - 1];
      const formatArgs = last instanceof Error ? args.slice(0, -1) : args;
      if (last instanceof Error) throwable = last;
      message = formatArgs.length > 0 ? format(first, ...formatArgs) : first;
    } else {
      message = formatters.object(first);
    }

    const record: LogRecord = {
      timestamp: Date.now(),
      level,
      tag,
      message,
      ...(throwable !== undefined ? { throwable } : {}),
      ...(withThread ? { threadInfo: formatters.thread(currentThreadInfo()) } : {}),
      ...(stackTrace
        ? { stackTrace: formatters.stackTrace(captureFrames(boundary, stackTrace.depth, stackTrace.origin)) }
        : {})
    };

    return Object.freeze(record);
  }

  private compose(record: LogRecord): string {
    const { formatters, withBorder } = this.configuration;

    const body = record.throwable === undefined
      ? record.message
      : `${record.message}\n${formatters.throwable(record.throwable)}`;

    const segments: string[] = [];
    if (record.threadInfo) segments.push(record.threadInfo);
    if (record.stackTrace) segments.push(record.stackTrace);
    segments.push(body);

    return withBorder ? formatters.border(segments) : segments.join('\n');
  }
}

/**
 * Captures the frames below `boundary`, dropping those up to the last frame
 * that mentions `origin` and keeping at most `depth` frames (0 keeps all)
 */
function captureFrames(boundary: CallBoundary, depth: number, origin?: string): string[] {
  const holder: { stack?: string } = {};
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = Infinity;
  try {
    Error.captureStackTrace(holder, boundary);
  } finally {
    Error.stackTraceLimit = previousLimit;
  }

  let frames = (holder.stack ?? '')
    .split('\n')
    .slice(1)
    .map(line => line.trim().replace(/^at /, ''))
    .filter(line => line.length > 0);

  if (origin) {
    let lastOrigin = -1;
    frames.forEach((frame, index) => {
      if (frame.includes(origin)) lastOrigin = index;
    });
    frames = frames.slice(lastOrigin + 1);
  }

  return depth > 0 ? frames.slice(0, depth) : frames;
}

/** Creates a new logger instance */
export function createLogger(config?: LoggerConfig | LoggerConfiguration, name?: string): Logger {
  return new LoggerImpl(config, name);
}
