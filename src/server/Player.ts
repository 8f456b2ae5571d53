import { encodeServerFrame } from "../shared/serialization.js";
import type { SerializationMode, ServerMessage } from "../shared/protocol.js";
import type { FrameSink } from "../transport/Transport.js";
import { serverDebug } from "./serverLog.js";

/** Close code sent with a kick. */
export const CLOSE_KICKED = 4001;

/** Owned outbound half of a seated player's connection. */
export class PlayerSink {
  constructor(
    readonly playerId: number,
    private readonly sink: FrameSink,
    private readonly mode: SerializationMode,
  ) {}

  get closed(): boolean {
    return this.sink.closed;
  }

  send(msg: ServerMessage): Promise<void> {
    return this.sink.send(encodeServerFrame(msg, this.mode));
  }

  /** Tell the client why it is being dropped, then close. The notice is best-effort. */
  async kick(reason: string): Promise<void> {
    if (!this.sink.closed) {
      try {
        await this.send({ type: "kicked", reason });
      } catch (err) {
        serverDebug(`player ${this.playerId}: kick notice not delivered: ${String(err)}`);
      }
    }
    this.sink.close(CLOSE_KICKED, reason);
  }
}

export interface Player {
  /** Stable for the match; equals the registry slot index. */
  readonly id: number;
  readonly position: { readonly x: number; readonly y: number };
  /** Estimated client clock minus server clock, in ms. Zero if sync failed. */
  readonly clockOffsetMs: number;
  readonly sink: PlayerSink;
}
