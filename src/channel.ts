interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * First-in-first-out hand-off queue between concurrent async tasks.
 *
 * `send` resolves once the value is buffered or handed to a receiver and
 * waits while `capacity` values are already buffered. `receive` waits while
 * the channel is empty and open, and reports `done` once it is closed and
 * drained. Each value is delivered to exactly one receiver.
 *
 * @example
 * const jobs = new Channel<string>(files.length);
 * for (const file of files) await jobs.send(file);
 * jobs.close();
 * for await (const file of jobs) console.log(file);
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values */
  get size(): number {
    return this.items.length;
  }

  send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new Error("Cannot send on a closed channel"));
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(value);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      const sender = this.senders.shift();
      if (sender) {
        this.items.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve({ value, done: false });
    }

    // Unbuffered channels hand values over straight from a waiting sender.
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Marks the channel as complete. Buffered values can still be received.
   * Senders still waiting for space are rejected.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new Error("Channel closed before the value was delivered"));
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = await this.receive();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  }
}
