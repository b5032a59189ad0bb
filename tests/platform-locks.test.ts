import { describe, expect, it } from 'vitest';
import { PlatformLocks } from '../src/core/scheduling/platform-locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PlatformLocks', () => {
  it('runs tasks on the same key one after another', async () => {
    const locks = new PlatformLocks();
    const events: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive(['linkedin'], async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = locks.runExclusive(['linkedin'], () => {
      events.push('second');
      return 2;
    });

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(events).toEqual(['first:start']);
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different keys run concurrently', async () => {
    const locks = new PlatformLocks();
    const events: string[] = [];
    const gate = deferred();

    const linkedin = locks.runExclusive(['linkedin'], async () => {
      await gate.promise;
      events.push('linkedin');
    });
    const threads = locks.runExclusive(['threads'], () => {
      events.push('threads');
    });

    await threads;
    expect(events).toEqual(['threads']);
    gate.resolve();
    await linkedin;
    expect(events).toEqual(['threads', 'linkedin']);
  });

  it('waits for every key of a multi-key task', async () => {
    const locks = new PlatformLocks();
    const events: string[] = [];
    const gate = deferred();

    const threads = locks.runExclusive(['threads'], async () => {
      await gate.promise;
      events.push('threads');
    });
    const both = locks.runExclusive(['threads', 'linkedin', 'threads'], () => {
      events.push('both');
    });

    await Promise.resolve();
    expect(events).toEqual([]);
    gate.resolve();
    await Promise.all([threads, both]);
    expect(events).toEqual(['threads', 'both']);
  });

  it('releases the key when a task throws', async () => {
    const locks = new PlatformLocks();

    await expect(locks.runExclusive(['linkedin'], () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');

    await expect(locks.runExclusive(['linkedin'], () => 'after')).resolves.toBe('after');
  });
});
