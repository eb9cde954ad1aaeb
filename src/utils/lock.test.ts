import { describe, expect, it } from 'vitest';

import { Mutex } from './lock.js';

describe('Mutex', () => {
  it('should run tasks one at a time in request order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const slow = mutex.runExclusive(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push('slow:end');
      return 'slow';
    });
    const fast = mutex.runExclusive(() => {
      events.push('fast');
      return 'fast';
    });

    expect(await Promise.all([slow, fast])).toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('should release the lock after a failed task', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');

    expect(await mutex.runExclusive(() => 42)).toBe(42);
  });
});
