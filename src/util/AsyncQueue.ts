type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded push/pull channel exposed as an async iterable.
 *
 * Producers call `push` from callbacks; a consumer pulls with `for await`. After `end()` the
 * buffered values are still delivered, then the sequence finishes. Breaking out of a
 * `for await` loop ends the queue.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly buffered: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;

  public push(value: T): boolean {
    if (this.ended) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
      return true;
    }

    this.buffered.push(value);
    return true;
  }

  public end(): void {
    if (this.ended) {
      return;
    }

    this.ended = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  public isEnded(): boolean {
    return this.ended;
  }

  public size(): number {
    return this.buffered.length;
  }

  public next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffered.length > 0) {
      const [value] = this.buffered.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }

    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        return { done: true, value: undefined };
      }
    };
  }
}
