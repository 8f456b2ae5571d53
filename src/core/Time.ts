import { setImmediate as nextTurn, setTimeout as delay } from "node:timers/promises";

/**
 * Time source for the match. The tick scheduler and clock synchronizer read
 * time only through this, so tests can drive them with a manual clock.
 */
export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  /** Wall-clock milliseconds since the epoch, sent to clients in clock probes. */
  wallNow(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallNow: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

/**
 * Clock that only moves when told to. `sleep` advances time by exactly the
 * requested amount and yields one event-loop turn.
 */
export class ManualClock implements Clock {
  /** Every sleep duration requested, in call order. */
  readonly sleeps: number[] = [];

  constructor(
    private current = 0,
    private readonly epoch = 1_700_000_000_000,
  ) {}

  now(): number {
    return this.current;
  }

  wallNow(): number {
    return this.epoch + this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    await nextTurn();
  }
}
