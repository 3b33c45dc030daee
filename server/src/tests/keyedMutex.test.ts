import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../lib/keyedMutex';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs work for the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('g1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('g1', async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 5));
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const slow = mutex.runExclusive('g1', () => gate.promise);
    const fast = await mutex.runExclusive('g2', async () => 'done');
    expect(fast).toBe('done');
    gate.resolve();
    await slow;
  });

  it('releases the key after a failure and forgets idle keys', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('g1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(mutex.size).toBe(0);
    expect(await mutex.runExclusive('g1', async () => 1)).toBe(1);
    expect(mutex.size).toBe(0);
  });
});
