import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { KeyedMutex } from '../keyed-mutex.js';

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all(
      ['first', 'second', 'third'].map((label, index) =>
        mutex.runExclusive('gold', async () => {
          events.push(`start:${label}`);
          await sleep(3 - index);
          events.push(`end:${label}`);
        })
      )
    );

    expect(events).toEqual([
      'start:first',
      'end:first',
      'start:second',
      'end:second',
      'start:third',
      'end:third',
    ]);
  });

  it('should let different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('gold', async () => {
        events.push('start:gold');
        await sleep(5);
        events.push('end:gold');
      }),
      mutex.runExclusive('silver', async () => {
        events.push('start:silver');
        events.push('end:silver');
      }),
    ]);

    expect(events.indexOf('end:silver')).toBeLessThan(events.indexOf('end:gold'));
  });

  it('should keep the queue moving after a task fails', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('gold', () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('gold', () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    expect(mutex.activeKeys).toBe(0);
  });
});
