import { describe, it, expect, vi, afterEach } from 'vitest';
import { Log } from '../../src/logger/global-log.js';
import type { LoggerConfig } from '../../src/logger/types.js';
import { RecordingTransport } from '../test-constants.js';

describe('Log', () => {
  afterEach(async () => {
    await Log.reset();
  });

  it('throws when used before init', () => {
    expect(Log.isInitialized()).toBe(false);
    expect(() => Log.i('too early')).toThrow('Log is not initialized, call Log.init() first');
    expect(() => Log.logger()).toThrow('Log is not initialized');
  });

  it('rejects a missing configuration', () => {
    const missing: LoggerConfig = JSON.parse('null');
    expect(() => Log.init(missing)).toThrow(TypeError);
    expect(Log.isInitialized()).toBe(false);
  });

  it('logs through the installed logger', () => {
    const transport = new RecordingTransport();
    Log.init({ transports: [transport] });

    Log.v('v');
    Log.d('d');
    Log.i('%s=%d', 'answer', 42);
    Log.w('w');
    Log.e('e');
    Log.a('a');
    Log.log('info', { ok: true });

    expect(transport.entries.map(entry => entry.level)).toEqual([
      'verbose', 'debug', 'info', 'warn', 'error', 'assert', 'info'
    ]);
    expect(transport.messages[2]).toBe('answer=42');
    expect(transport.messages[6]).toBe('{"ok":true}');
  });

  it('applies the configured level', () => {
    const transport = new RecordingTransport();
    Log.init({ level: 'warn', transports: [transport] });

    Log.i('hidden');
    Log.w('shown');

    expect(transport.messages).toEqual(['shown']);
  });

  it('warns and replaces on a second init', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const first = new RecordingTransport('first');
    const second = new RecordingTransport('second');

    Log.init({ transports: [first] });
    Log.init({ transports: [second] });
    Log.i('after');

    expect(warn).toHaveBeenCalledWith('Log is already initialized, replacing the current logger');
    expect(first.messages).toEqual([]);
    expect(second.messages).toEqual(['after']);
  });

  it('closes the replaced logger transports the new one does not reuse', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const replaced = new RecordingTransport('replaced');
    const shared = new RecordingTransport('shared');

    Log.init({ transports: [replaced, shared] });
    Log.init({ transports: [shared] });
    await new Promise(resolve => setImmediate(resolve));
    Log.i('still open');

    expect(replaced.closeCalls).toBe(1);
    expect(shared.closeCalls).toBe(0);
    expect(shared.messages).toEqual(['still open']);
  });

  it('trims its own frame from stack traces', () => {
    const transport = new RecordingTransport();
    Log.init({ stackTrace: { depth: 1 }, transports: [transport] });

    Log.i('traced');

    expect(transport.messages[0]).toMatch(/^\t─ .*global-log\.test\.ts/);
  });

  it('destroys the logger on reset', async () => {
    const transport = new RecordingTransport();
    Log.init({ transports: [transport] });

    await Log.reset();

    expect(Log.isInitialized()).toBe(false);
    expect(transport.closeCalls).toBe(1);
  });
});
