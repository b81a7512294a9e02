type Resolver<T> = (result: IteratorResult<T>) => void;
type Rejecter = (err: unknown) => void;

interface BlockedWrite<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Single-producer, single-consumer queue holding at most `capacity` values.
 * A producer awaiting `push` is held back until the consumer makes room, and
 * is released with `false` once the consumer cancels.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly values: T[] = [];
  private readonly readers: Array<{ resolve: Resolver<T>; reject: Rejecter }> = [];
  private readonly writers: Array<BlockedWrite<T>> = [];
  private closed = false;
  private cancelled = false;
  private failed = false;
  private failure: unknown;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("Queue capacity must be a positive integer");
    }
  }

  push(value: T): Promise<boolean> {
    if (this.cancelled || this.failed) return Promise.resolve(false);
    if (this.closed) return Promise.reject(new Error("Cannot push into a closed queue"));
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve({ value, done: false });
      return Promise.resolve(true);
    }
    if (this.values.length < this.capacity) {
      this.values.push(value);
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      this.writers.push({ value, resolve });
    });
  }

  next(): Promise<IteratorResult<T>> {
    if (this.failed) return Promise.reject(this.failure);
    if (this.values.length > 0) {
      const [value] = this.values.splice(0, 1);
      this.admitBlockedWrite();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed || this.cancelled) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  close(): void {
    this.closed = true;
    if (this.values.length > 0) return;
    this.finishReaders();
  }

  /** Consumer side: drops buffered values and releases a blocked producer. */
  cancel(): void {
    this.cancelled = true;
    this.values.length = 0;
    this.releaseWriters();
    this.finishReaders();
  }

  fail(err: unknown): void {
    this.failed = true;
    this.failure = err ?? new Error("BoundedQueue failure");
    this.releaseWriters();
    while (this.readers.length) {
      const waiter = this.readers.shift();
      waiter?.reject(this.failure);
    }
  }

  get size(): number {
    return this.values.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
    };
  }

  private admitBlockedWrite(): void {
    const writer = this.writers.shift();
    if (!writer) return;
    this.values.push(writer.value);
    writer.resolve(true);
  }

  private releaseWriters(): void {
    while (this.writers.length) {
      const writer = this.writers.shift();
      writer?.resolve(false);
    }
  }

  private finishReaders(): void {
    while (this.readers.length) {
      const waiter = this.readers.shift();
      waiter?.resolve({ value: undefined, done: true });
    }
  }
}
