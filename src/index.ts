/**
 * fanlog - structured logging with interceptors and rotating files
 *
 * Log calls are level-gated, passed through an ordered interceptor chain,
 * composed into a message body and fanned out to every transport. Each
 * transport flattens the entry into its own line format.
 *
 * ## Pipeline
 *
 * caller → level gate → interceptor chain → compose → transports
 *
 * ## Transports
 * - **ConsoleTransport**: console output with optional colours
 * - **StreamTransport**: stdout/stderr lines
 * - **FileTransport**: rotating log files with backup and clean policies
 *
 * @example
 * ```typescript
 * import {
 *   createLogger,
 *   ConsoleTransport,
 *   FileTransport,
 *   whitelistMessages
 * } from 'fanlog';
 *
 * const logger = createLogger({
 *   level: 'info',
 *   tag: 'app',
 *   withThread: true,
 *   interceptors: [whitelistMessages(['order'])],
 *   transports: [
 *     new ConsoleTransport(),
 *     new FileTransport({
 *       directory: './logs',
 *       backup: { kind: 'size', maxBytes: 512 * 1024, maxBackups: 3 }
 *     })
 *   ]
 * });
 *
 * logger.info('order %s accepted', 'A-17');
 * logger.error('order failed', new Error('payment declined'));
 * ```
 */

export * from './logger/index.js';
export * from './transports/index.js';
