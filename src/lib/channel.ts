/**
 * Push-style async stream. Producers `push` values and `close` it once;
 * consumers read it with `for await`. Values pushed before a reader arrives
 * are buffered.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly readers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  /** Returns false when the channel was already closed. */
  push(value: T): boolean {
    if (this.isClosed) return false;

    const reader = this.readers.shift();
    if (reader) {
      reader({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Returns false when the channel was already closed. */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;

    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
    return true;
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.readers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }

  async collect(): Promise<T[]> {
    const values: T[] = [];
    for await (const value of this) values.push(value);
    return values;
  }
}
