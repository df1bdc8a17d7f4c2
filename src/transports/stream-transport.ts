/**
 * Stream Transport
 *
 * Writes one flattened line per entry to the process's standard streams:
 * levels below `warn` go to stdout, the rest to stderr. Any writable stream
 * can take either role.
 */

import type { LogEntry, LogLevel } from '../logger/types.js';
import { isLoggable } from '../logger/log-level.js';
import { BaseTransport, type BaseTransportConfig } from './transport-interface.js';

/** The part of a writable stream this transport needs */
export type LineSink = Pick<NodeJS.WritableStream, 'write'>;

/**
 * Stream transport configuration
 */
export interface StreamTransportConfig extends BaseTransportConfig {
  /** Stream for entries below `errorLevel` (default: process.stdout) */
  stdout?: LineSink;

  /** Stream for entries at or above `errorLevel` (default: process.stderr) */
  stderr?: LineSink;

  /** Lowest level routed to `stderr` (default: warn) */
  errorLevel?: LogLevel;
}

export class StreamTransport extends BaseTransport {
  private readonly stdout: LineSink;
  private readonly stderr: LineSink;
  private readonly errorLevel: LogLevel;

  constructor(config: StreamTransportConfig = {}) {
    const errorLevel = config.errorLevel ?? 'warn';
    super(config.name ?? 'stream', config.flattener, { errorLevel });
    this.stdout = config.stdout ?? process.stdout;
    this.stderr = config.stderr ?? process.stderr;
    this.errorLevel = errorLevel;
  }

  write(entry: LogEntry): void {
    const stream = isLoggable(entry.level, this.errorLevel) ? this.stderr : this.stdout;
    stream.write(`${this.flatten(entry)}\n`);
  }
}
