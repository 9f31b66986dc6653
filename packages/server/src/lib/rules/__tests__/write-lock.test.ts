/**
 * Tests for WriteLock
 */

import { describe, it, expect } from 'vitest';
import { WriteLock } from '../write-lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WriteLock', () => {
  it('never interleaves tasks', async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    const task = (name: string, ms: number) =>
      lock.runExclusive(async () => {
        events.push(`${name}:start`);
        await delay(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 1), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('keeps running queued tasks after one rejects', async () => {
    const lock = new WriteLock();
    const failing = lock.runExclusive(async () => {
      throw new Error('disk full');
    });
    const next = lock.runExclusive(() => 'ok');

    await expect(failing).rejects.toThrow('disk full');
    await expect(next).resolves.toBe('ok');
  });

  it('reports whether work is pending', async () => {
    const lock = new WriteLock();
    expect(lock.isLocked).toBe(false);
    const run = lock.runExclusive(() => delay(5));
    expect(lock.isLocked).toBe(true);
    await run;
    expect(lock.isLocked).toBe(false);
  });
});
