import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rotateBackups } from '../../src/transports/file-backup.js';
import { makeTempDir, removeDir } from '../test-constants.js';

describe('rotateBackups', () => {
  let dir: string;
  let active: string;

  const write = (name: string, content: string): void => {
    fs.writeFileSync(path.join(dir, name), content);
  };
  const read = (name: string): string => fs.readFileSync(path.join(dir, name), 'utf8');

  beforeEach(() => {
    dir = makeTempDir();
    active = path.join(dir, 'log');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('moves the active file into the first slot', () => {
    write('log', 'current');

    rotateBackups(active, 3);

    expect(fs.existsSync(active)).toBe(false);
    expect(read('log.1')).toBe('current');
  });

  it('shifts older backups and drops the oldest', () => {
    write('log', 'current');
    write('log.1', 'previous');
    write('log.2', 'oldest');

    rotateBackups(active, 2);

    expect(read('log.1')).toBe('current');
    expect(read('log.2')).toBe('previous');
    expect(fs.readdirSync(dir).sort()).toEqual(['log.1', 'log.2']);
  });

  it('keeps every backup when unlimited', () => {
    write('log', 'c');
    write('log.1', 'b');
    write('log.2', 'a');

    rotateBackups(active, 0);

    expect(read('log.1')).toBe('c');
    expect(read('log.2')).toBe('b');
    expect(read('log.3')).toBe('a');
  });

  it('leaves the active file in place when the oldest slot cannot be removed', () => {
    write('log', 'current');
    fs.mkdirSync(path.join(dir, 'log.1'));
    write('log.1/blocker', 'x');

    expect(() => rotateBackups(active, 1)).toThrow();
    expect(read('log')).toBe('current');
  });
});
