/**
 * Tests for AsyncLock
 */

import { describe, it, expect } from 'vitest';
import { AsyncLock } from '../../../src/core/async-lock.js';

describe('AsyncLock', () => {
  it('acquires immediately when free', async () => {
    const lock = new AsyncLock();

    await lock.acquire();

    expect(lock.isLocked).toBe(true);
    lock.release();
    expect(lock.isLocked).toBe(false);
  });

  it('serves waiters in FIFO order', async () => {
    const lock = new AsyncLock();
    const order: number[] = [];
    await lock.acquire();

    const waiters = [1, 2, 3].map((n) =>
      lock.acquire().then(() => {
        order.push(n);
        lock.release();
      })
    );
    expect(lock.waiting).toBe(3);

    lock.release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
    expect(lock.isLocked).toBe(false);
  });

  it('does not interleave exclusive sections', async () => {
    const lock = new AsyncLock();
    const events: string[] = [];
    const section = (name: string) =>
      lock.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a'), section('b')]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('releases when the section throws', async () => {
    const lock = new AsyncLock();

    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isLocked).toBe(false);
    expect(await lock.runExclusive(() => 'next')).toBe('next');
  });
});
