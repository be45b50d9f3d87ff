import { describe, expect, test } from 'vitest';
import { SerialQueue } from '../../src/lib/queue/SerialQueue.js';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SerialQueue', () => {
  test('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const first = queue.run(async () => {
      events.push('first:start');
      await tick(20);
      events.push('first:end');
      return 1;
    });
    const second = queue.run(() => {
      events.push('second');
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  test('a failing task rejects alone', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'still runs');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('still runs');
  });

  test('tracks pending tasks and resolves idle when drained', async () => {
    const queue = new SerialQueue();
    const done = queue.run(() => tick(10));
    void queue.run(() => tick(10));

    expect(queue.size).toBe(2);
    await done;
    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
