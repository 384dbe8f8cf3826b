import { describe, it, expect } from 'vitest';
import { AsyncMutex } from '../../../src/core/mutex.js';

describe('AsyncMutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = new AsyncMutex();
    expect(mutex.isLocked).toBe(false);

    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('should queue concurrent acquire calls', async () => {
    const mutex = new AsyncMutex();
    const order: number[] = [];

    const p1 = mutex.acquire().then(release => {
      order.push(1);
      setTimeout(release, 10);
    });

    const p2 = mutex.acquire().then(release => {
      order.push(2);
      release();
    });

    const p3 = mutex.acquire().then(release => {
      order.push(3);
      release();
    });

    expect(mutex.queueLength).toBe(2);
    await Promise.all([p1, p2, p3]);
    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it('should ignore a second release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();

    const next = await waiting;
    expect(mutex.isLocked).toBe(true);
    expect(mutex.queueLength).toBe(0);
    next();
    expect(mutex.isLocked).toBe(false);
  });

  it('should support withLock helper', async () => {
    const mutex = new AsyncMutex();
    const result = await mutex.withLock(() => 42);
    expect(result).toBe(42);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release lock even on error in withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(mutex.isLocked).toBe(false);
  });

  it('should serialise read-modify-write sections', async () => {
    const mutex = new AsyncMutex();
    let counter = 0;

    const bump = () => mutex.withLock(async () => {
      const seen = counter;
      await new Promise(resolve => setTimeout(resolve, 1));
      counter = seen + 1;
    });

    await Promise.all([bump(), bump(), bump(), bump()]);
    expect(counter).toBe(4);
  });
});
