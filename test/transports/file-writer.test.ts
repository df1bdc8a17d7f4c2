import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FileWriter } from '../../src/transports/file-writer.js';
import { makeTempDir, readLines, removeDir } from '../test-constants.js';

describe('FileWriter', () => {
  let dir: string;
  let filePath: string;
  let writer: FileWriter;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = path.join(dir, 'log');
  });

  afterEach(() => {
    writer.close();
    removeDir(dir);
  });

  it('tracks the open file and its size', () => {
    writer = new FileWriter();
    expect(writer.isOpen).toBe(false);
    expect(writer.filePath).toBeNull();

    writer.open(filePath);
    writer.append('abc');

    expect(writer.isOpen).toBe(true);
    expect(writer.fileName).toBe('log');
    expect(writer.size).toBe(4);

    writer.close();
    expect(writer.isOpen).toBe(false);
    expect(writer.size).toBe(0);
  });

  it('starts from the size of an existing file', () => {
    fs.writeFileSync(filePath, 'earlier\n');
    writer = new FileWriter({ header: () => '# header' });

    writer.open(filePath);

    expect(writer.size).toBe(8);
    expect(readLines(filePath)).toEqual(['earlier']);
  });

  it('refuses to append without an open file', () => {
    writer = new FileWriter();
    expect(() => writer.append('lost')).toThrow('No log file is open');
  });

  it('stays open when the header cannot be written', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('disk full');
    vi.spyOn(fs, 'writeSync').mockImplementationOnce(() => {
      throw failure;
    });
    writer = new FileWriter({ header: () => '# header' });

    expect(() => writer.open(filePath)).not.toThrow();
    writer.append('entry');

    expect(writer.isOpen).toBe(true);
    expect(readLines(filePath)).toEqual(['entry']);
    expect(writer.size).toBe(6);
    expect(errorSpy).toHaveBeenCalledWith(`Log file header for ${filePath} failed:`, failure);
  });
});
