import { setImmediate as nextTurn } from "node:timers/promises";
import type { Clock } from "../core/Time.js";
import type { Channel } from "../shared/Channel.js";
import type { ClientMessage } from "../shared/protocol.js";
import type { Player } from "./Player.js";
import type { PlayerRegistry } from "./PlayerRegistry.js";
import type { ConnectionEvent } from "./PlayerStream.js";
import { serverDebug, serverLog, serverLogError } from "./serverLog.js";

/** Gameplay hook points. The loop itself only keeps player bookkeeping. */
export interface MatchHooks {
  onPlayerMessage?(player: Player, message: ClientMessage): void;
  onPlayerLeft?(player: Player): void;
  /** Runs once per tick after queued events are applied. */
  onTick?(tick: number): void;
}

export interface MatchLoopOptions {
  tickMs: number;
  clock: Clock;
  hooks?: MatchHooks;
  /** Prefix for log lines. */
  label?: string;
}

/**
 * Fixed-cadence authoritative loop. Each tick drains the fan-in queue without
 * waiting, applies every event, runs the tick hook, then sleeps until the
 * tick's deadline. Deadlines are measured from one origin captured at entry,
 * `(tick + 1) * tickMs`, so short oversleeps never accumulate; a late tick
 * simply starts the next one immediately, with no ticks skipped. The loop
 * ends once the population reaches zero.
 */
export class MatchLoop {
  private ticks = 0;
  private readonly label: string;

  constructor(
    private readonly registry: PlayerRegistry,
    private readonly queue: Channel<ConnectionEvent>,
    private readonly options: MatchLoopOptions,
  ) {
    this.label = options.label ?? "match";
  }

  /** Ticks completed so far. */
  get tickCount(): number {
    return this.ticks;
  }

  /** Apply every event currently queued. Never waits; returns how many were applied. */
  drain(): number {
    const events = this.queue.drain();
    for (const event of events) this.apply(event);
    return events.length;
  }

  async run(): Promise<number> {
    const { clock, tickMs } = this.options;
    const start = clock.now();
    serverLog(`${this.label}: loop started (tick ${tickMs.toFixed(3)}ms)`);

    for (let tick = 0; ; tick++) {
      this.drain();
      this.runHook("onTick", () => this.options.hooks?.onTick?.(tick));
      this.ticks = tick + 1;

      const deadline = (tick + 1) * tickMs;
      const elapsed = clock.now() - start;
      if (elapsed < deadline) {
        await clock.sleep(deadline - elapsed);
      } else {
        // Late: no sleep, but receive tasks still need a turn.
        await nextTurn();
      }

      if (this.registry.playerCount === 0) break;
    }

    serverLog(`${this.label}: loop finished after ${this.ticks} ticks, no players left`);
    return this.ticks;
  }

  private apply(event: ConnectionEvent): void {
    if (event.type === "close") {
      const player = this.registry.evict(event.playerId);
      if (!player) {
        serverDebug(`${this.label}: close for empty slot ${event.playerId} ignored`);
        return;
      }
      serverLog(
        `${this.label}: player ${event.playerId} left, ${this.registry.playerCount} remaining`,
      );
      this.runHook("onPlayerLeft", () => this.options.hooks?.onPlayerLeft?.(player));
      return;
    }

    const player = this.registry.get(event.playerId);
    if (!player) {
      serverDebug(`${this.label}: message from departed player ${event.playerId} dropped`);
      return;
    }
    serverDebug(`${this.label}: player ${event.playerId} sent ${event.message.type}`);
    this.runHook("onPlayerMessage", () =>
      this.options.hooks?.onPlayerMessage?.(player, event.message),
    );
  }

  private runHook(name: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      serverLogError(`${this.label}: ${name} hook threw`, err);
    }
  }
}
