import { describe, expect, it } from 'vitest';
import { AsyncLock } from '../../src/core/async-lock.js';

describe('AsyncLock', () => {
  it('hands the lock over in FIFO order', async () => {
    const lock = new AsyncLock('test');
    const order: string[] = [];
    const first = await lock.acquire();

    const second = lock.acquire().then((release) => {
      order.push('second');
      release();
    });
    const third = lock.acquire().then((release) => {
      order.push('third');
      release();
    });
    expect(lock.pending).toBe(2);

    order.push('first');
    first();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(lock.isLocked()).toBe(false);
  });

  it('refuses tryAcquire while held', async () => {
    const lock = new AsyncLock('test');
    const release = lock.tryAcquire();
    expect(release).not.toBeNull();
    expect(lock.tryAcquire()).toBeNull();
    release?.();
    expect(lock.tryAcquire()).not.toBeNull();
  });

  it('ignores a second release from the same holder', async () => {
    const lock = new AsyncLock('test');
    const release = await lock.acquire();
    const queued = lock.acquire();
    release();
    release();
    const next = await queued;
    expect(lock.isLocked()).toBe(true);
    next();
    expect(lock.isLocked()).toBe(false);
  });

  it('wakes idle waiters only when nobody is queued', async () => {
    const lock = new AsyncLock('test');
    const events: string[] = [];
    const release = await lock.acquire();
    const idle = lock.waitUntilFree().then(() => events.push('idle'));
    const queued = lock.acquire().then((next) => {
      events.push('queued');
      next();
    });

    release();
    await Promise.all([idle, queued]);
    expect(events).toEqual(['queued', 'idle']);
  });

  it('releases after run even when the callback throws', async () => {
    const lock = new AsyncLock('test');
    await expect(lock.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(lock.isLocked()).toBe(false);
  });
});
