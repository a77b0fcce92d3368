/**
 * Unit tests for enforcement/locks.ts
 */

import { describe, it, expect } from 'vitest';
import { KeyedMutex, InflightSet } from '../../lib/enforcement/locks.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('enforcement/locks', () => {
  describe('KeyedMutex', () => {
    it('should run work for one key in order', async () => {
      const mutex = new KeyedMutex();
      const gate = deferred();
      const order: string[] = [];

      const first = mutex.runExclusive('task-1', async () => {
        await gate.promise;
        order.push('first');
      });
      const second = mutex.runExclusive('task-1', async () => {
        order.push('second');
      });

      expect(mutex.isLocked('task-1')).toBe(true);
      gate.resolve();
      await Promise.all([first, second]);

      expect(order).toEqual(['first', 'second']);
      expect(mutex.isLocked('task-1')).toBe(false);
    });

    it('should not hold back other keys', async () => {
      const mutex = new KeyedMutex();
      const gate = deferred();
      const order: string[] = [];

      const slow = mutex.runExclusive('task-1', async () => {
        await gate.promise;
        order.push('slow');
      });
      await mutex.runExclusive('task-2', async () => {
        order.push('other');
      });
      gate.resolve();
      await slow;

      expect(order).toEqual(['other', 'slow']);
    });

    it('should release the key after a failure', async () => {
      const mutex = new KeyedMutex();

      await expect(
        mutex.runExclusive('task-1', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(mutex.isLocked('task-1')).toBe(false);
      await expect(mutex.runExclusive('task-1', async () => 'ok')).resolves.toBe('ok');
    });
  });

  describe('InflightSet', () => {
    it('should refuse a key that is already held', () => {
      const inflight = new InflightSet();

      expect(inflight.acquire('task-1')).toBe(true);
      expect(inflight.acquire('task-1')).toBe(false);
      expect(inflight.size).toBe(1);

      inflight.release('task-1');
      expect(inflight.has('task-1')).toBe(false);
      expect(inflight.acquire('task-1')).toBe(true);
    });
  });
});
