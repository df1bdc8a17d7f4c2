/**
 * fanlog logger: level gate, interceptor chain, flatteners and configuration
 *
 * @example
 * ```typescript
 * import { createLogger, blacklistTags } from 'fanlog/logger';
 * import { FileTransport } from 'fanlog/transports';
 *
 * const logger = createLogger({
 *   level: 'debug',
 *   tag: 'my-service',
 *   interceptors: [blacklistTags(['healthcheck'])],
 *   transports: [new FileTransport({ directory: './logs' })]
 * });
 *
 * logger.info('User %s signed in', 'alice');
 * ```
 */

export * from './types.js';
export * from './log-level.js';
export * from './flattener.js';
export * from './formatters.js';
export * from './interceptor-chain.js';
export * from './logger-config.js';
export * from './logger-configuration.js';
export * from './transport-registry.js';
export * from './logger-impl.js';
export * from './global-log.js';

/** Current version of the logger package */
export const LOGGER_VERSION = '0.1.0';
