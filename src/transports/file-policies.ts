/**
 * File naming, backup and clean policies for {@link FileTransport}
 *
 * Policies are plain tagged objects consulted by the transport on every
 * write. They hold configuration only.
 *
 * @example
 * ```typescript
 * new FileTransport({
 *   directory: '/var/log/app',
 *   naming: { kind: 'date', suffix: '.log' },
 *   backup: { kind: 'size', maxBytes: 5 * 1024 * 1024, maxBackups: 5 },
 *   clean: { kind: 'age', maxAgeMs: 7 * 24 * 60 * 60 * 1000 }
 * });
 * ```
 */

import type { LogLevel } from '../logger/types.js';
import { isLoggable } from '../logger/log-level.js';
import { formatTimestamp } from '../logger/flattener.js';

export type FileNamingPolicy =
  /** Always the same file */
  | { readonly kind: 'changeless'; readonly fileName: string }
  /** Local date `yyyy-MM-dd` followed by `suffix`, a new file each day */
  | { readonly kind: 'date'; readonly suffix?: string }
  /** `info` for verbose, debug and info records, `error` for the rest */
  | { readonly kind: 'level' }
  | {
      readonly kind: 'custom';
      /** Whether the name has to be recomputed on every write */
      readonly changeable: boolean;
      generate(level: LogLevel, timestamp: number): string;
    };

export type BackupPolicy =
  | { readonly kind: 'never' }
  /**
   * Rotate when the pending line would push the file past `maxBytes`.
   * Keeps `maxBackups` backups, or all of them when it is 0.
   */
  | { readonly kind: 'size'; readonly maxBytes: number; readonly maxBackups: number };

export type CleanPolicy =
  | { readonly kind: 'never' }
  /** Delete files last modified more than `maxAgeMs` ago */
  | { readonly kind: 'age'; readonly maxAgeMs: number };

export const DEFAULT_LOG_FILE_NAME = 'log';

export const DEFAULT_LOG_FILE_MAX_BYTES = 1024 * 1024;

export const DEFAULT_MAX_BACKUPS = 10;

export const DEFAULT_NAMING_POLICY: FileNamingPolicy = Object.freeze({
  kind: 'changeless',
  fileName: DEFAULT_LOG_FILE_NAME
});

export const DEFAULT_BACKUP_POLICY: BackupPolicy = Object.freeze({
  kind: 'size',
  maxBytes: DEFAULT_LOG_FILE_MAX_BYTES,
  maxBackups: DEFAULT_MAX_BACKUPS
});

export const DEFAULT_CLEAN_POLICY: CleanPolicy = Object.freeze({ kind: 'never' });

/**
 * Whether the file name may differ between writes
 */
export function isFileNameChangeable(policy: FileNamingPolicy): boolean {
  switch (policy.kind) {
    case 'changeless':
      return false;
    case 'custom':
      return policy.changeable;
    default:
      return true;
  }
}

/**
 * File name for a record at `level` created at `timestamp`
 */
export function generateFileName(policy: FileNamingPolicy, level: LogLevel, timestamp: number): string {
  switch (policy.kind) {
    case 'changeless':
      return policy.fileName;
    case 'date':
      return `${formatTimestamp(timestamp, 'yyyy-MM-dd')}${policy.suffix ?? ''}`;
    case 'level':
      return isLoggable(level, 'warn') ? 'error' : 'info';
    case 'custom':
      return policy.generate(level, timestamp);
  }
}

/**
 * Whether the open file should be backed up before `pendingBytes` are appended.
 * An empty file is never backed up.
 */
export function shouldBackup(policy: BackupPolicy, currentBytes: number, pendingBytes: number): boolean {
  if (policy.kind === 'never' || currentBytes === 0) return false;
  return currentBytes + pendingBytes > policy.maxBytes;
}

/**
 * Whether a file last modified at `modifiedMs` should be deleted at `now`
 */
export function shouldClean(policy: CleanPolicy, modifiedMs: number, now: number): boolean {
  if (policy.kind === 'never') return false;
  return now - modifiedMs > policy.maxAgeMs;
}

/**
 * Name of the backup slot `index` for `fileName`; higher indexes are older
 */
export function backupFileName(fileName: string, index: number): string {
  return `${fileName}.${index}`;
}

/**
 * @throws {TypeError} If a policy is malformed
 * @throws {RangeError} If a numeric limit is out of range
 */
export function validatePolicies(naming: FileNamingPolicy, backup: BackupPolicy, clean: CleanPolicy): void {
  switch (naming.kind) {
    case 'changeless':
      if (typeof naming.fileName !== 'string' || naming.fileName.trim().length === 0) {
        throw new TypeError('Changeless file name must be a non-empty string');
      }
      break;
    case 'custom':
      if (typeof naming.generate !== 'function') {
        throw new TypeError('Custom file naming must have a generate function');
      }
      break;
    case 'date':
    case 'level':
      break;
    default:
      throw new TypeError(`Unknown file naming policy: ${JSON.stringify(naming)}`);
  }

  switch (backup.kind) {
    case 'size':
      if (!(backup.maxBytes > 0)) {
        throw new RangeError('Backup maxBytes must be greater than 0');
      }
      if (!Number.isInteger(backup.maxBackups) || backup.maxBackups < 0) {
        throw new RangeError('Backup maxBackups must be a non-negative integer');
      }
      break;
    case 'never':
      break;
    default:
      throw new TypeError(`Unknown backup policy: ${JSON.stringify(backup)}`);
  }

  switch (clean.kind) {
    case 'age':
      if (!(clean.maxAgeMs >= 0)) {
        throw new RangeError('Clean maxAgeMs must not be negative');
      }
      break;
    case 'never':
      break;
    default:
      throw new TypeError(`Unknown clean policy: ${JSON.stringify(clean)}`);
  }
}
