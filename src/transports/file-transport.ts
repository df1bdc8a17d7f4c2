/**
 * File Transport with rotation and cleanup
 *
 * Appends one flattened line per entry to a file in `directory`. Every write
 * runs as one exclusive section:
 *
 * 1. resolve the file name and open it if it is not the open file
 * 2. back the file up when the backup policy asks for it, then reopen it
 * 3. delete other files in the directory the clean policy marks as expired
 * 4. append the line
 *
 * I/O failures are reported on the console and never thrown to the caller.
 * A failed backup leaves the active file in place and writing continues.
 *
 * @example
 * ```typescript
 * import { FileTransport } from 'fanlog';
 *
 * const transport = new FileTransport({
 *   directory: '/var/log/my-service',
 *   naming: { kind: 'changeless', fileName: 'service.log' },
 *   backup: { kind: 'size', maxBytes: 1024 * 1024, maxBackups: 5 },
 *   clean: { kind: 'age', maxAgeMs: 14 * 24 * 60 * 60 * 1000 },
 *   header: () => `# ${os.hostname()} node ${process.version}`
 * });
 * ```
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LogEntry } from '../logger/types.js';
import { BaseTransport, type BaseTransportConfig } from './transport-interface.js';
import { ExclusiveSection } from './exclusive-section.js';
import { FileWriter } from './file-writer.js';
import { rotateBackups } from './file-backup.js';
import {
  DEFAULT_BACKUP_POLICY,
  DEFAULT_CLEAN_POLICY,
  DEFAULT_NAMING_POLICY,
  generateFileName,
  isFileNameChangeable,
  shouldBackup,
  shouldClean,
  validatePolicies,
  type BackupPolicy,
  type CleanPolicy,
  type FileNamingPolicy
} from './file-policies.js';

/**
 * File transport configuration
 */
export interface FileTransportConfig extends BaseTransportConfig {
  /** Directory holding the log file and its backups; created on first write */
  directory: string;

  /** How the log file is named (default: changeless `log`) */
  naming?: FileNamingPolicy;

  /** When the log file is rotated (default: 1 MiB, 10 backups) */
  backup?: BackupPolicy;

  /** When files in the directory are deleted (default: never) */
  clean?: CleanPolicy;

  /** Text written at the top of each newly created file */
  header?: (filePath: string) => string | undefined;

  /** fsync after every line (default: false) */
  syncOnWrite?: boolean;
}

type FileOperation = 'open' | 'backup' | 'clean' | 'write' | 'close';

export class FileTransport extends BaseTransport {
  private readonly directory: string;
  private readonly naming: FileNamingPolicy;
  private readonly backup: BackupPolicy;
  private readonly clean: CleanPolicy;
  private readonly writer: FileWriter;
  private readonly section = new ExclusiveSection();

  /**
   * @throws {TypeError} If the directory is missing or a policy is malformed
   * @throws {RangeError} If a policy limit is out of range
   */
  constructor(config: FileTransportConfig) {
    if (!config || typeof config.directory !== 'string' || config.directory.length === 0) {
      throw new TypeError('File transport requires a directory');
    }
    const naming = config.naming ?? DEFAULT_NAMING_POLICY;
    const backup = config.backup ?? DEFAULT_BACKUP_POLICY;
    const clean = config.clean ?? DEFAULT_CLEAN_POLICY;
    validatePolicies(naming, backup, clean);

    super(config.name ?? 'file', config.flattener, {
      directory: config.directory,
      naming,
      backup,
      clean,
      syncOnWrite: config.syncOnWrite ?? false
    });

    this.directory = config.directory;
    this.naming = naming;
    this.backup = backup;
    this.clean = clean;
    this.writer = new FileWriter({ header: config.header, syncOnWrite: config.syncOnWrite });
  }

  /** Path of the open log file, null when none is open */
  get currentFile(): string | null {
    return this.writer.filePath;
  }

  write(entry: LogEntry): void {
    this.section.run(() => this.writeEntry(entry));
  }

  close(): void {
    this.section.run(() => {
      try {
        this.writer.close();
      } catch (error) {
        this.report('close', error);
      }
    });
  }

  private writeEntry(entry: LogEntry): void {
    const line = this.flatten(entry);

    const filePath = this.resolveFilePath(entry);
    if (!filePath || !this.ensureOpen(filePath)) return;
    if (!this.backupIfNeeded(filePath, line)) return;
    this.cleanIfNeeded();

    try {
      this.writer.append(line);
    } catch (error) {
      this.report('write', error);
    }
  }

  private resolveFilePath(entry: LogEntry): string | null {
    const open = this.writer.filePath;
    if (open !== null && !isFileNameChangeable(this.naming)) {
      return open;
    }

    let fileName: string;
    try {
      fileName = generateFileName(this.naming, entry.level, entry.timestamp);
    } catch (error) {
      this.report('open', error);
      return null;
    }
    if (typeof fileName !== 'string' || fileName.trim().length === 0) {
      console.error(`Transport ${this.name} generated an empty file name, dropping: ${entry.message}`);
      return null;
    }
    return path.join(this.directory, fileName);
  }

  private ensureOpen(filePath: string): boolean {
    if (this.writer.filePath === filePath) return true;

    try {
      this.writer.close();
      fs.mkdirSync(this.directory, { recursive: true });
      this.writer.open(filePath);
      return true;
    } catch (error) {
      this.report('open', error);
      return false;
    }
  }

  /**
   * Rotates the open file when the backup policy asks for it.
   *
   * @returns False if no file could be reopened afterwards
   */
  private backupIfNeeded(filePath: string, line: string): boolean {
    const pendingBytes = Buffer.byteLength(line) + 1;
    if (!shouldBackup(this.backup, this.writer.size, pendingBytes)) return true;

    const maxBackups = this.backup.kind === 'size' ? this.backup.maxBackups : 0;

    try {
      this.writer.close();
      rotateBackups(filePath, maxBackups);
    } catch (error) {
      this.report('backup', error);
    }

    return this.ensureOpen(filePath);
  }

  private cleanIfNeeded(): void {
    if (this.clean.kind === 'never') return;

    const openFile = this.writer.fileName;
    const now = Date.now();

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.directory, { withFileTypes: true });
    } catch (error) {
      this.report('clean', error);
      return;
    }

    for (const dirent of entries) {
      if (!dirent.isFile() || dirent.name === openFile) continue;

      const candidate = path.join(this.directory, dirent.name);
      try {
        if (shouldClean(this.clean, fs.statSync(candidate).mtimeMs, now)) {
          fs.unlinkSync(candidate);
        }
      } catch (error) {
        this.report('clean', error);
      }
    }
  }

  private report(operation: FileOperation, error: unknown): void {
    console.error(`Transport ${this.name} ${operation} failed:`, error);
  }
}

/**
 * Create a file transport
 */
export function createFileTransport(config: FileTransportConfig): FileTransport {
  return new FileTransport(config);
}
