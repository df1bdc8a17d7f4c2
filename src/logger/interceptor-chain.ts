/**
 * Interceptor chain for record filtering and transformation
 *
 * Interceptors run strictly in registration order. A filter that rejects a
 * record stops the chain; later interceptors never see it. An interceptor
 * that throws drops the current record only.
 *
 * @example
 * ```typescript
 * const chain = new InterceptorChain()
 *   .use(blacklistTags(['http-noise']))
 *   .use(transformRecord(record => ({ ...record, tag: `app/${record.tag}` })));
 *
 * const result = chain.process(record); // LogRecord or null when dropped
 * ```
 */

import type { FilterInterceptor, Interceptor, LogRecord, TransformInterceptor } from './types.js';
import { isLogLevel } from './log-level.js';

/**
 * Ordered interceptor pipeline
 */
export class InterceptorChain {
  private interceptors: Interceptor[] = [];

  constructor(interceptors: readonly Interceptor[] = []) {
    interceptors.forEach(interceptor => this.use(interceptor));
  }

  /**
   * Add an interceptor to the end of the chain
   *
   * @throws {TypeError} If the interceptor is not a filter or transform
   */
  use(interceptor: Interceptor): this {
    if (!interceptor || typeof interceptor !== 'object') {
      throw new TypeError('Interceptor must be a valid object');
    }
    if (interceptor.kind !== 'filter' && interceptor.kind !== 'transform') {
      throw new TypeError('Interceptor kind must be "filter" or "transform"');
    }
    if (interceptor.kind === 'filter' && typeof interceptor.reject !== 'function') {
      throw new TypeError('Filter interceptor must have a reject method');
    }
    if (interceptor.kind === 'transform' && typeof interceptor.intercept !== 'function') {
      throw new TypeError('Transform interceptor must have an intercept method');
    }
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Run a record through every interceptor
   *
   * @returns The resulting record, or null if it was rejected
   */
  process(record: LogRecord): LogRecord | null {
    let current = record;

    for (const interceptor of this.interceptors) {
      try {
        if (interceptor.kind === 'filter') {
          if (interceptor.reject(current)) {
            return null;
          }
          continue;
        }

        const next = interceptor.intercept(current);
        if (!isLogRecord(next)) {
          console.error(`Interceptor ${describe(interceptor)} returned an invalid record, dropping it`);
          return null;
        }
        current = Object.isFrozen(next) ? next : Object.freeze({ ...next });
      } catch (error) {
        console.error(`Interceptor ${describe(interceptor)} failed:`, error);
        return null;
      }
    }

    return current;
  }

  get length(): number {
    return this.interceptors.length;
  }
}

function describe(interceptor: Interceptor): string {
  return interceptor.name ?? interceptor.kind;
}

function isLogRecord(value: unknown): value is LogRecord {
  if (!value || typeof value !== 'object') return false;
  return (
    'timestamp' in value && typeof value.timestamp === 'number' &&
    'level' in value && isLogLevel(value.level) &&
    'tag' in value && typeof value.tag === 'string' &&
    'message' in value && typeof value.message === 'string'
  );
}

function toList(tokens: Iterable<string>, what: string): readonly string[] {
  if (tokens === null || tokens === undefined) {
    throw new TypeError(`${what} must be an iterable of strings`);
  }
  return Object.freeze([...tokens]);
}

/**
 * Built-in interceptor: reject records whose tag contains any of the tokens
 */
export function blacklistTags(tags: Iterable<string>): FilterInterceptor {
  const blocked = toList(tags, 'Tag blacklist');
  return {
    kind: 'filter',
    name: 'blacklist-tags',
    reject: record => blocked.some(tag => record.tag.includes(tag))
  };
}

/**
 * Built-in interceptor: reject records whose tag contains none of the tokens
 */
export function whitelistTags(tags: Iterable<string>): FilterInterceptor {
  const allowed = toList(tags, 'Tag whitelist');
  return {
    kind: 'filter',
    name: 'whitelist-tags',
    reject: record => !allowed.some(tag => record.tag.includes(tag))
  };
}

/**
 * Built-in interceptor: reject records whose message contains any of the tokens
 */
export function blacklistMessages(messages: Iterable<string>): FilterInterceptor {
  const blocked = toList(messages, 'Message blacklist');
  return {
    kind: 'filter',
    name: 'blacklist-messages',
    reject: record => blocked.some(message => record.message.includes(message))
  };
}

/**
 * Built-in interceptor: reject records whose message contains none of the tokens
 */
export function whitelistMessages(messages: Iterable<string>): FilterInterceptor {
  const allowed = toList(messages, 'Message whitelist');
  return {
    kind: 'filter',
    name: 'whitelist-messages',
    reject: record => !allowed.some(message => record.message.includes(message))
  };
}

/**
 * Keep only records matching the predicate
 */
export function filterRecords(predicate: (record: LogRecord) => boolean, name = 'filter'): FilterInterceptor {
  return {
    kind: 'filter',
    name,
    reject: record => !predicate(record)
  };
}

/**
 * Rewrite records, e.g. to prefix tags or mask parts of a message
 */
export function transformRecord(transformer: (record: LogRecord) => LogRecord, name = 'transform'): TransformInterceptor {
  return {
    kind: 'transform',
    name,
    intercept: transformer
  };
}
