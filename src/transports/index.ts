/**
 * Built-in transports for fanlog
 *
 * - ConsoleTransport: console methods per level, optional ANSI colours
 * - StreamTransport: raw lines to stdout/stderr or any writable stream
 * - FileTransport: rotating log files with naming, backup and clean policies
 */

export * from './transport-interface.js';
export * from './console-transport.js';
export * from './stream-transport.js';
export * from './file-transport.js';
export * from './file-policies.js';
export { rotateBackups } from './file-backup.js';
export { FileWriter } from './file-writer.js';
export type { FileWriterOptions } from './file-writer.js';
export { ExclusiveSection } from './exclusive-section.js';

/** Current version of the transports module */
export const TRANSPORTS_VERSION = '0.1.0';
