import { describe, expect, it } from 'vitest';
import { SerialQueue } from './serial-queue.js';

describe('serial-queue', () => {
  describe('SerialQueue.run', () => {
    it('should run tasks in submission order even when the first is slower', async () => {
      const queue = new SerialQueue();
      const order: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = queue.run(async () => {
        await gate;
        order.push('first');
      });
      const second = queue.run(() => {
        order.push('second');
      });

      await Promise.resolve();
      expect(order).toEqual([]);

      release();
      await Promise.all([first, second]);
      expect(order).toEqual(['first', 'second']);
    });

    it('should settle with the task result', async () => {
      const queue = new SerialQueue();
      await expect(queue.run(() => 42)).resolves.toBe(42);
    });

    it('should keep running tasks after a failure', async () => {
      const queue = new SerialQueue();
      const failed = queue.run(() => {
        throw new Error('boom');
      });
      const next = queue.run(() => 'after');

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('after');
    });
  });

  describe('SerialQueue.idle', () => {
    it('should resolve once every queued task settled', async () => {
      const queue = new SerialQueue();
      const done: number[] = [];
      void queue.run(async () => {
        await Promise.resolve();
        done.push(1);
      });
      queue.run(() => {
        throw new Error('ignored');
      }).catch(() => done.push(2));

      expect(queue.size).toBe(2);
      await queue.idle();

      expect(queue.size).toBe(0);
      expect(done).toContain(1);
    });
  });
});
