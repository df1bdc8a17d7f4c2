/**
 * Append-only writer owning at most one open file descriptor
 */

import fs from 'node:fs';
import path from 'node:path';

export interface FileWriterOptions {
  /** Returns text written at the top of every newly created file */
  header?: (filePath: string) => string | undefined;

  /** fsync after every append */
  syncOnWrite?: boolean;
}

export class FileWriter {
  private fd: number | null = null;
  private openedPath: string | null = null;
  private bytes = 0;

  constructor(private readonly options: FileWriterOptions = {}) {}

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /** Path of the open file, null when closed */
  get filePath(): string | null {
    return this.openedPath;
  }

  /** Base name of the open file, null when closed */
  get fileName(): string | null {
    return this.openedPath === null ? null : path.basename(this.openedPath);
  }

  /** Size of the open file in bytes */
  get size(): number {
    return this.bytes;
  }

  /**
   * Open `filePath` for appending, creating it if needed. Any open file is
   * closed first.
   *
   * @throws If the file cannot be opened
   */
  open(filePath: string): void {
    this.close();

    const isNew = !fs.existsSync(filePath);
    const fd = fs.openSync(filePath, 'a');
    this.fd = fd;
    this.openedPath = filePath;
    this.bytes = fs.fstatSync(fd).size;

    if (isNew && this.options.header) {
      this.writeHeader(filePath, this.options.header);
    }
  }

  /**
   * Append `line` and a line separator
   *
   * @throws If no file is open or the write fails
   */
  append(line: string): void {
    if (this.fd === null) {
      throw new Error('No log file is open');
    }
    const data = `${line}\n`;
    fs.writeSync(this.fd, data);
    if (this.options.syncOnWrite) {
      fs.fsyncSync(this.fd);
    }
    this.bytes += Buffer.byteLength(data);
  }

  close(): void {
    if (this.fd === null) return;

    const fd = this.fd;
    this.fd = null;
    this.openedPath = null;
    this.bytes = 0;
    fs.closeSync(fd);
  }

  private writeHeader(filePath: string, header: (filePath: string) => string | undefined): void {
    try {
      const text = header(filePath);
      if (text) {
        this.append(text.endsWith('\n') ? text.slice(0, -1) : text);
      }
    } catch (error) {
      // The file stays open for the entry that created it
      console.error(`Log file header for ${filePath} failed:`, error);
    }
  }
}
