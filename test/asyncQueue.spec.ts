import { describe, expect, it } from 'vitest';
import { AsyncQueue } from '../src/util/AsyncQueue';

describe('AsyncQueue', () => {
  it('delivers buffered values in order, then finishes after end', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.end();

    const seen: number[] = [];
    for await (const value of queue) {
      seen.push(value);
    }

    expect(seen).toEqual([1, 2]);
  });

  it('resolves a pending pull when a value arrives', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();

    queue.push('frame');

    await expect(pending).resolves.toEqual({ done: false, value: 'frame' });
    expect(queue.size()).toBe(0);
  });

  it('releases every waiting consumer on end', async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.next();
    const second = queue.next();

    queue.end();

    await expect(first).resolves.toEqual({ done: true, value: undefined });
    await expect(second).resolves.toEqual({ done: true, value: undefined });
  });

  it('rejects pushes after end', () => {
    const queue = new AsyncQueue<number>();
    queue.end();

    expect(queue.push(3)).toBe(false);
    expect(queue.isEnded()).toBe(true);
    expect(queue.size()).toBe(0);
  });

  it('ends when a consumer breaks out of the loop', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    for await (const value of queue) {
      expect(value).toBe(1);
      break;
    }

    expect(queue.isEnded()).toBe(true);
    expect(queue.push(4)).toBe(false);
  });
});
