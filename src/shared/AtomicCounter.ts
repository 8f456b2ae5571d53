/**
 * Integer counter backed by a SharedArrayBuffer and updated with Atomics, so
 * the same instance can be handed to worker threads as well as async tasks.
 */
export class AtomicCounter {
  private readonly cell: Int32Array;

  constructor(initial = 0, buffer?: SharedArrayBuffer) {
    this.cell = new Int32Array(buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    if (!buffer) Atomics.store(this.cell, 0, initial);
  }

  /** Underlying memory, for sharing the counter with a worker. */
  get buffer(): SharedArrayBuffer {
    const { buffer } = this.cell;
    if (!(buffer instanceof SharedArrayBuffer)) throw new Error("Counter is not shared");
    return buffer;
  }

  load(): number {
    return Atomics.load(this.cell, 0);
  }

  /** Add and return the previous value. */
  fetchAdd(delta = 1): number {
    return Atomics.add(this.cell, 0, delta);
  }

  /** Subtract and return the previous value. */
  fetchSub(delta = 1): number {
    return Atomics.sub(this.cell, 0, delta);
  }

  /** Increment only while the current value is below `limit`. Returns the previous value, or null. */
  fetchAddBelow(limit: number): number | null {
    for (;;) {
      const current = Atomics.load(this.cell, 0);
      if (current >= limit) return null;
      if (Atomics.compareExchange(this.cell, 0, current, current + 1) === current) return current;
    }
  }
}
