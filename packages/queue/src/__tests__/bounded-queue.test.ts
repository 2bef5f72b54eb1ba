/**
 * Unit tests for BoundedQueue backpressure and close semantics
 */

import { describe, expect, it } from 'vitest';

import { BoundedQueue, QueueClosedError } from '../bounded-queue.js';

// Lets every pending promise callback run
async function settle(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}

describe('BoundedQueue', () => {
  describe('construction', () => {
    it('rejects capacities that are not positive integers', () => {
      for (const capacity of [0, -1, 1.5, Number.NaN]) {
        expect(() => new BoundedQueue<number>({ capacity })).toThrow(RangeError);
      }
    });

    it('exposes capacity and starts empty and open', () => {
      const queue = new BoundedQueue<number>({ capacity: 3 });

      expect(queue.capacity).toBe(3);
      expect(queue.size).toBe(0);
      expect(queue.closed).toBe(false);
    });
  });

  describe('ordering', () => {
    it('pulls items in push order', async () => {
      const queue = new BoundedQueue<string>({ capacity: 5 });

      await queue.push('a');
      await queue.push('b');
      await queue.push('c');

      expect(await queue.pull()).toBe('a');
      expect(await queue.pull()).toBe('b');
      expect(await queue.pull()).toBe('c');
      expect(queue.size).toBe(0);
    });

    it('preserves order across a slow consumer with capacity 1', async () => {
      const queue = new BoundedQueue<number>({ capacity: 1 });
      const received: number[] = [];
      let maxSize = 0;

      const producer = (async () => {
        for (let i = 0; i < 50; i++) {
          (await queue.push(i))._unsafeUnwrap();
          maxSize = Math.max(maxSize, queue.size);
        }
        queue.close();
      })();

      for await (const item of queue) {
        received.push(item);
        if (item % 10 === 0) await settle();
      }
      await producer;

      expect(received).toEqual(Array.from({ length: 50 }, (_, i) => i));
      expect(maxSize).toBeLessThanOrEqual(1);
    });
  });

  describe('backpressure', () => {
    it('suspends push while full and resumes after a pull', async () => {
      const queue = new BoundedQueue<string>({ capacity: 2 });
      await queue.push('a');
      await queue.push('b');

      let pushed = false;
      const pending = queue.push('c').then((result) => {
        pushed = true;
        return result;
      });
      await settle();

      expect(pushed).toBe(false);
      expect(queue.size).toBe(2);

      expect(await queue.pull()).toBe('a');
      expect((await pending).isOk()).toBe(true);
      expect(pushed).toBe(true);
      expect(queue.size).toBe(2);
      expect(await queue.pull()).toBe('b');
      expect(await queue.pull()).toBe('c');
    });

    it('suspends pull while empty and resumes on push', async () => {
      const queue = new BoundedQueue<number>({ capacity: 2 });

      let received: number | undefined;
      const pending = queue.pull().then((item) => {
        received = item;
      });
      await settle();
      expect(received).toBeUndefined();

      await queue.push(7);
      await pending;

      expect(received).toBe(7);
      expect(queue.size).toBe(0);
    });
  });

  describe('close', () => {
    it('drains queued items before reporting the end', async () => {
      const queue = new BoundedQueue<string>({ capacity: 3 });
      await queue.push('x');
      await queue.push('y');
      queue.close();

      expect(queue.closed).toBe(true);
      expect(await queue.pull()).toBe('x');
      expect(await queue.pull()).toBe('y');
      expect(await queue.pull()).toBeUndefined();
    });

    it('rejects pushes after close', async () => {
      const queue = new BoundedQueue<string>({ capacity: 3 });
      queue.close();

      const error = (await queue.push('late'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(QueueClosedError);
      expect(error.message).toBe('Queue is closed');
      expect(queue.size).toBe(0);
    });

    it('fails a push that is waiting for space', async () => {
      const queue = new BoundedQueue<string>({ capacity: 1 });
      await queue.push('a');

      const pending = queue.push('b');
      await settle();
      queue.close();

      expect((await pending).isErr()).toBe(true);
      expect(await queue.pull()).toBe('a');
      expect(await queue.pull()).toBeUndefined();
    });

    it('releases waiting consumers', async () => {
      const queue = new BoundedQueue<number>({ capacity: 1 });

      const first = queue.pull();
      const second = queue.pull();
      queue.close();

      expect(await first).toBeUndefined();
      expect(await second).toBeUndefined();
    });

    it('is idempotent', async () => {
      const queue = new BoundedQueue<number>({ capacity: 2 });
      await queue.push(1);

      queue.close();
      queue.close();

      expect(queue.size).toBe(1);
      expect(await queue.pull()).toBe(1);
    });

    it('ends async iteration', async () => {
      const queue = new BoundedQueue<number>({ capacity: 4 });
      await queue.push(1);
      await queue.push(2);
      queue.close();

      const items: number[] = [];
      for await (const item of queue) {
        items.push(item);
      }

      expect(items).toEqual([1, 2]);
    });
  });
});
