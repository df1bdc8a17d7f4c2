/**
 * Logger configuration types and default values
 */

import type { FormatterSet, Interceptor, LevelThreshold, LoggerConfig, StackTraceConfig, Transport } from './types.js';
import { DEFAULT_FORMATTERS } from './formatters.js';

/**
 * Default log level for new loggers
 */
export const DEFAULT_LOG_LEVEL: LevelThreshold = 'all';

/**
 * Tag used when a log call does not supply one
 */
export const DEFAULT_TAG = 'LOG';

/**
 * Configuration with every option resolved
 */
export interface ResolvedLoggerConfig {
  readonly level: LevelThreshold;
  readonly tag: string;
  readonly withThread: boolean;
  readonly stackTrace: Readonly<StackTraceConfig> | false;
  readonly withBorder: boolean;
  readonly formatters: Readonly<FormatterSet>;
  readonly interceptors: readonly Interceptor[];
  readonly transports: readonly Transport[];
}

/**
 * Default logger configuration. Transports are filled in by the logger
 * (a console transport) when none are configured.
 */
export const DEFAULT_LOGGER_CONFIG: ResolvedLoggerConfig = Object.freeze({
  level: DEFAULT_LOG_LEVEL,
  tag: DEFAULT_TAG,
  withThread: false,
  stackTrace: false,
  withBorder: false,
  formatters: DEFAULT_FORMATTERS,
  interceptors: [],
  transports: []
});

/**
 * Merges user configuration with defaults
 *
 * @param userConfig - User-provided configuration
 * @returns Complete configuration with defaults applied
 */
export function mergeConfig(userConfig: LoggerConfig = {}, base: ResolvedLoggerConfig = DEFAULT_LOGGER_CONFIG): ResolvedLoggerConfig {
  return {
    level: userConfig.level ?? base.level,
    tag: userConfig.tag ?? base.tag,
    withThread: userConfig.withThread ?? base.withThread,
    stackTrace: userConfig.stackTrace === undefined
      ? base.stackTrace
      : userConfig.stackTrace && { ...userConfig.stackTrace },
    withBorder: userConfig.withBorder ?? base.withBorder,
    formatters: mergeFormatters(base.formatters, userConfig.formatters),
    interceptors: userConfig.interceptors ? [...userConfig.interceptors] : [...base.interceptors],
    transports: userConfig.transports ? [...userConfig.transports] : [...base.transports]
  };
}

function mergeFormatters(base: Readonly<FormatterSet>, overrides: Partial<FormatterSet> = {}): FormatterSet {
  return {
    throwable: overrides.throwable ?? base.throwable,
    thread: overrides.thread ?? base.thread,
    stackTrace: overrides.stackTrace ?? base.stackTrace,
    border: overrides.border ?? base.border,
    object: overrides.object ?? base.object
  };
}
