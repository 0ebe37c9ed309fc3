import { describe, expect, it } from 'vitest';
import { AsyncQueue } from '../src/asyncQueue';

describe('AsyncQueue', () => {
  it('delivers buffered and later items in order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    const consumed = (async () => {
      const items: number[] = [];
      for await (const item of queue) items.push(item);
      return items;
    })();
    queue.push(2);
    queue.end();
    queue.push(3);

    expect(await consumed).toEqual([1, 2]);
  });

  it('drains buffered items before surfacing a failure', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.fail(new Error('socket closed'));
    const items: string[] = [];

    await expect(
      (async () => {
        for await (const item of queue) items.push(item);
      })()
    ).rejects.toThrow('socket closed');
    expect(items).toEqual(['a']);
  });

  it('closes when the consumer stops early', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    for await (const item of queue) {
      expect(item).toBe(1);
      break;
    }
    expect(queue.isClosed).toBe(true);
  });
});
