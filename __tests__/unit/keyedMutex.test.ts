import { describe, it, expect } from '@jest/globals';
import { KeyedMutex } from '../../src/utils/keyedMutex';

describe('KeyedMutex', () => {
  it('should acquire and release a key', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('swap-1');
    expect(mutex.isLocked('swap-1')).toBe(true);

    release();
    expect(mutex.isLocked('swap-1')).toBe(false);
  });

  it('should ignore a second release', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('swap-1');
    release();
    release();

    const next = await mutex.acquire('swap-1');
    expect(mutex.isLocked('swap-1')).toBe(true);
    next();
  });

  it('should run callers on the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.runExclusive('swap-1', async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b'), task('c')]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked('swap-1')).toBe(false);
  });

  it('should not block different keys', async () => {
    const mutex = new KeyedMutex();
    const holdA = await mutex.acquire('a');

    const result = await mutex.runExclusive('b', () => 'b-done');

    expect(result).toBe('b-done');
    expect(mutex.isLocked('a')).toBe(true);
    holdA();
  });

  it('should release the key when the callback throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('swap-1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('swap-1')).toBe(false);
  });
});
