import { WHO_AM_I_CLIENT } from "../config/constants.js";
import type { ClientMessage, SerializationMode, ServerMessage } from "../shared/protocol.js";
import { decodeServerFrame, encodeClientFrame } from "../shared/serialization.js";
import type { PlayerConnection } from "../transport/Transport.js";

type ServerMessageOf<T extends ServerMessage["type"]> = Extract<ServerMessage, { type: T }>;

interface Waiter {
  type: ServerMessage["type"];
  resolve: (msg: ServerMessage | null) => void;
}

export interface MatchClientOptions {
  serialization?: SerializationMode;
  /** Client wall clock. Defaults to Date.now. */
  now?: () => number;
}

/**
 * Minimal match client: identifies itself, answers clock probes and collects
 * everything else the server sends. Drives the server in tests and tools.
 */
export class MatchClient {
  /** Every non-probe message received, in arrival order. */
  readonly received: ServerMessage[] = [];
  /** Clock probes answered so far. */
  probesAnswered = 0;
  /** Why the read loop stopped early (bad frame, failed reply), if it did. */
  error: unknown = null;
  private waiters: Waiter[] = [];
  private ended = false;
  private readonly mode: SerializationMode;
  private readonly now: () => number;
  private readonly pump: Promise<void>;

  constructor(
    private readonly connection: PlayerConnection,
    options: MatchClientOptions = {},
  ) {
    this.mode = options.serialization ?? "binary";
    this.now = options.now ?? Date.now;
    this.pump = this.readLoop();
  }

  /** Resolves once the server side has closed the connection. */
  get done(): Promise<void> {
    return this.pump;
  }

  /** Send the whoami handshake. Always binary, whatever the match mode. */
  identify(role = WHO_AM_I_CLIENT): Promise<void> {
    return this.connection.sink.send(encodeClientFrame({ type: "whoami", role }, "binary"));
  }

  send(msg: ClientMessage): Promise<void> {
    return this.connection.sink.send(encodeClientFrame(msg, this.mode));
  }

  close(): void {
    this.connection.sink.close();
  }

  /** First message of `type` (already received or still to come); null if the connection ends first. */
  waitFor<T extends ServerMessage["type"]>(type: T): Promise<ServerMessageOf<T> | null> {
    const isType = (msg: ServerMessage | null): msg is ServerMessageOf<T> => msg?.type === type;
    const seen = this.received.find(isType);
    if (seen) return Promise.resolve(seen);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push({ type, resolve: (msg) => resolve(isType(msg) ? msg : null) });
    });
  }

  private async readLoop(): Promise<void> {
    try {
      for (let frame = await this.connection.stream.next(); frame; frame = await this.connection.stream.next()) {
        await this.handle(decodeServerFrame(frame));
      }
    } catch (err) {
      this.error = err;
    }
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(null);
  }

  private async handle(msg: ServerMessage): Promise<void> {
    if (msg.type === "clock-sync") {
      this.probesAnswered++;
      const reply: ClientMessage = {
        type: "clock-sync-reply",
        seq: msg.seq,
        serverTime: msg.serverTime,
        clientTime: this.now(),
      };
      await this.connection.sink.send(encodeClientFrame(reply, this.mode));
      return;
    }
    this.received.push(msg);
    const ready = this.waiters.filter((w) => w.type === msg.type);
    this.waiters = this.waiters.filter((w) => w.type !== msg.type);
    for (const waiter of ready) waiter.resolve(msg);
  }
}
