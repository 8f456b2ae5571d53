export class ChannelClosedError extends Error {
  constructor() {
    super("Channel closed");
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

interface PendingRecv<T> {
  resolve: (value: T | undefined) => void;
}

/**
 * Bounded async FIFO channel. Any number of producers, one consumer.
 *
 * `send` suspends while the buffer is full; nothing is ever dropped. Values
 * from a single producer arrive in the order they were sent. Closing wakes
 * pending receivers with `undefined` and rejects pending senders, while values
 * already buffered can still be received.
 */
export class Channel<T extends object> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingRecv<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of buffered values (excluding suspended senders). */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());
    if (this.trySend(value)) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /** Enqueue without waiting. Returns false when the buffer is full or closed. */
  trySend(value: T): boolean {
    if (this.closed) return false;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
      return true;
    }
    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(value);
    return true;
  }

  /** Take the next buffered value without waiting. */
  tryRecv(): T | undefined {
    const value = this.buffer.shift();
    if (value !== undefined) this.admitSender();
    return value;
  }

  /** Take every value currently available, without waiting for more. */
  drain(): T[] {
    const out: T[] = [];
    for (let value = this.tryRecv(); value !== undefined; value = this.tryRecv()) {
      out.push(value);
    }
    return out;
  }

  /**
   * Wait for the next value. Resolves undefined once the channel is closed and
   * empty. Aborting `signal` rejects with its reason and leaves the queue intact.
   */
  recv(signal?: AbortSignal): Promise<T | undefined> {
    const value = this.tryRecv();
    if (value !== undefined) return Promise.resolve(value);
    if (this.closed) return Promise.resolve(undefined);
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const idx = this.receivers.indexOf(pending);
        if (idx !== -1) this.receivers.splice(idx, 1);
        reject(signal?.reason);
      };
      const pending: PendingRecv<T> = {
        resolve: (v) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(v);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) receiver.resolve(undefined);
    for (const sender of this.senders.splice(0)) sender.reject(new ChannelClosedError());
  }

  private admitSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push(sender.value);
    sender.resolve();
  }
}
