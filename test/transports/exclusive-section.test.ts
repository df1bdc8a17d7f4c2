import { describe, it, expect } from 'vitest';
import { ExclusiveSection } from '../../src/transports/exclusive-section.js';

describe('ExclusiveSection', () => {
  it('runs a task immediately when free', () => {
    const section = new ExclusiveSection();
    const order: string[] = [];

    section.run(() => order.push('task'));

    expect(order).toEqual(['task']);
    expect(section.isHeld).toBe(false);
  });

  it('defers re-entrant tasks until the running one finishes', () => {
    const section = new ExclusiveSection();
    const order: string[] = [];

    section.run(() => {
      order.push('outer start');
      section.run(() => order.push('inner 1'));
      section.run(() => order.push('inner 2'));
      expect(section.queued).toBe(2);
      expect(section.isHeld).toBe(true);
      order.push('outer end');
    });

    expect(order).toEqual(['outer start', 'outer end', 'inner 1', 'inner 2']);
    expect(section.queued).toBe(0);
  });

  it('drains the queue before rethrowing the first failure', () => {
    const section = new ExclusiveSection();
    const order: string[] = [];

    expect(() =>
      section.run(() => {
        section.run(() => {
          order.push('queued');
          throw new Error('second');
        });
        throw new Error('first');
      })
    ).toThrow('first');

    expect(order).toEqual(['queued']);
    expect(section.isHeld).toBe(false);
  });
});
