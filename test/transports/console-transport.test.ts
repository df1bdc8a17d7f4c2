/**
 * Unit tests for ConsoleTransport
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleTransport, createConsoleTransport } from '../../src/transports/console-transport.js';
import { Colors, Environment } from '../../src/transports/transport-interface.js';
import { messageOnlyFlattener } from '../../src/logger/flattener.js';
import type { Flattener } from '../../src/logger/types.js';
import { createEntry } from '../test-constants.js';

describe('ConsoleTransport', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('writes the classic line through the matching console method', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: false });

    transport.write(createEntry('info', 'ready'));

    expect(info).toHaveBeenCalledWith('2024-01-02 03:04:05.006 I/LOG: ready');
  });

  it('maps levels to console methods', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: false, flattener: messageOnlyFlattener });

    transport.write(createEntry('verbose', 'v'));
    transport.write(createEntry('debug', 'd'));
    transport.write(createEntry('warn', 'w'));
    transport.write(createEntry('error', 'e'));
    transport.write(createEntry('assert', 'a'));

    expect(debug.mock.calls).toEqual([['v'], ['d']]);
    expect(warn.mock.calls).toEqual([['w']]);
    expect(error.mock.calls).toEqual([['e'], ['a']]);
  });

  it('honours custom console methods', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const transport = new ConsoleTransport({
      colors: false,
      flattener: messageOnlyFlattener,
      consoleMethods: { error: 'log' }
    });

    transport.write(createEntry('error', 'plain'));

    expect(log).toHaveBeenCalledWith('plain');
  });

  it('wraps lines in the level colour', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: true, flattener: messageOnlyFlattener });

    transport.write(createEntry('warn', 'careful'));

    expect(warn).toHaveBeenCalledWith(`${Colors.warn}careful${Colors.reset}`);
  });

  it('stays silent in production unless enabled', () => {
    vi.stubEnv('NODE_ENV', 'production');
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    new ConsoleTransport({ colors: false, flattener: messageOnlyFlattener }).write(createEntry('info', 'hidden'));
    new ConsoleTransport({ colors: false, flattener: messageOnlyFlattener, enableInProduction: true })
      .write(createEntry('info', 'shown'));

    expect(Environment.isProduction()).toBe(true);
    expect(info.mock.calls).toEqual([['shown']]);
  });

  it('rejects invalid names and flatteners', () => {
    expect(() => new ConsoleTransport({ name: '' })).toThrow('Transport must have a valid name');
    const flattener: Flattener = JSON.parse('"not a function"');
    expect(() => new ConsoleTransport({ flattener })).toThrow('Flattener must be a function');
  });

  it('exposes its configuration', () => {
    const transport = createConsoleTransport({ name: 'terminal', colors: false });

    expect(transport.name).toBe('terminal');
    expect(transport.config).toEqual({
      colors: false,
      enableInProduction: false,
      consoleMethods: {
        verbose: 'debug',
        debug: 'debug',
        info: 'info',
        warn: 'warn',
        error: 'error',
        assert: 'error'
      }
    });
  });
});
