import { describe, it, expect } from 'vitest';
import {
  classicFlattener,
  createPatternFlattener,
  defaultFlattener,
  formatTimestamp,
  messageOnlyFlattener
} from '../../src/logger/flattener.js';
import { TEST_CONSTANTS } from '../test-constants.js';

const { TIMESTAMP } = TEST_CONSTANTS;

describe('flatteners', () => {
  describe('formatTimestamp', () => {
    it('formats with the default pattern in local time', () => {
      expect(formatTimestamp(TIMESTAMP)).toBe('2024-01-02 03:04:05.006');
    });

    it('supports custom patterns', () => {
      expect(formatTimestamp(TIMESTAMP, 'yyyy/MM/dd')).toBe('2024/01/02');
      expect(formatTimestamp(TIMESTAMP, 'HH:mm:ss.SSS')).toBe('03:04:05.006');
    });
  });

  describe('classicFlattener', () => {
    it('renders timestamp level/tag: message', () => {
      expect(classicFlattener(TIMESTAMP, 'info', 'net', 'connected'))
        .toBe('2024-01-02 03:04:05.006 I/net: connected');
    });

    it('is deterministic', () => {
      const first = classicFlattener(TIMESTAMP, 'error', 'db', 'timeout');
      const second = classicFlattener(TIMESTAMP, 'error', 'db', 'timeout');
      expect(second).toBe(first);
    });

    it('keeps every field verbatim', () => {
      const line = classicFlattener(TIMESTAMP, 'warn', 'cache/eviction', 'evicted 3 of 10 | ok');

      expect(line).toContain(formatTimestamp(TIMESTAMP));
      expect(line).toContain('W/cache/eviction');
      expect(line).toContain('evicted 3 of 10 | ok');
    });

    it('keeps multi-line messages as continuation lines', () => {
      expect(classicFlattener(TIMESTAMP, 'error', 'app', 'failed\n    at main'))
        .toBe('2024-01-02 03:04:05.006 E/app: failed\n    at main');
    });
  });

  describe('defaultFlattener', () => {
    it('renders pipe separated fields', () => {
      expect(defaultFlattener(TIMESTAMP, 'debug', 'net', 'ping')).toBe(`${TIMESTAMP}|D|net|ping`);
    });
  });

  describe('messageOnlyFlattener', () => {
    it('returns the message', () => {
      expect(messageOnlyFlattener(TIMESTAMP, 'assert', 'x', 'only this')).toBe('only this');
    });
  });

  describe('createPatternFlattener', () => {
    it('substitutes every placeholder', () => {
      const flatten = createPatternFlattener('{d HH:mm:ss} {L} [{t}] {m}');
      expect(flatten(TIMESTAMP, 'info', 'net', 'connected')).toBe('03:04:05 INFO [net] connected');
    });

    it('uses the default date format for {d}', () => {
      const flatten = createPatternFlattener('{d} {l}/{t}: {m}');
      expect(flatten(TIMESTAMP, 'verbose', 'ui', 'tap')).toBe('2024-01-02 03:04:05.006 V/ui: tap');
    });

    it('does not expand placeholders inside field values', () => {
      const flatten = createPatternFlattener('{t}: {m}');
      expect(flatten(TIMESTAMP, 'info', '{m}', 'value {t}')).toBe('{m}: value {t}');
    });

    it('rejects patterns without placeholders', () => {
      expect(() => createPatternFlattener('plain text')).toThrow(TypeError);
    });
  });
});
