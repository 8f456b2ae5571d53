import { DEFAULT_SPAWN, WHO_AM_I_CLIENT } from "../config/constants.js";
import type { Channel } from "../shared/Channel.js";
import type { ClientMessage, SerializationMode } from "../shared/protocol.js";
import { decodeClientFrame } from "../shared/serialization.js";
import type { Frame, PlayerConnection } from "../transport/Transport.js";
import { type ClockSyncOptions, syncClock } from "./ClockSync.js";
import { type Player, PlayerSink } from "./Player.js";
import type { PlayerRegistry } from "./PlayerRegistry.js";
import { type ConnectionEvent, runPlayerStream } from "./PlayerStream.js";
import { serverDebug, serverLog } from "./serverLog.js";

export type AdmissionState = "awaiting-handshake" | "validating" | "admitted" | "rejected";

export type RejectReason =
  | "stream-closed"
  | "handshake-timeout"
  | "not-binary"
  | "undecodable"
  | "not-whoami"
  | "not-client"
  | "match-full";

export type AdmissionResult =
  | { state: "admitted"; player: Player }
  | { state: "rejected"; reason: RejectReason };

export interface AdmissionContext {
  registry: PlayerRegistry;
  queue: Channel<ConnectionEvent>;
  serialization: SerializationMode;
  /** How long the first frame may take to arrive. */
  handshakeTimeoutMs: number;
  clockSync: Omit<ClockSyncOptions, "label" | "serialization">;
  spawn?: { x: number; y: number };
  /** Takes ownership of the spawned receive task. */
  trackTask: (task: Promise<void>) => void;
  /** Observes every state the connection passes through. */
  onStateChange?: (state: AdmissionState) => void;
}

type Handshake = { ok: true } | { ok: false; reason: RejectReason };

async function readHandshake(connection: PlayerConnection, timeoutMs: number): Promise<Handshake> {
  const signal = AbortSignal.timeout(timeoutMs);
  let frame: Frame | null;
  try {
    frame = await connection.stream.next(signal);
  } catch (err) {
    if (signal.aborted) return { ok: false, reason: "handshake-timeout" };
    serverDebug(`${connection.label}: read failed during handshake: ${String(err)}`);
    return { ok: false, reason: "stream-closed" };
  }
  return checkHandshake(frame);
}

function checkHandshake(frame: Frame | null): Handshake {
  if (!frame) return { ok: false, reason: "stream-closed" };
  if (!frame.binary) return { ok: false, reason: "not-binary" };
  let msg: ClientMessage;
  try {
    msg = decodeClientFrame(frame);
  } catch {
    return { ok: false, reason: "undecodable" };
  }
  if (msg.type !== "whoami") return { ok: false, reason: "not-whoami" };
  if (msg.role !== WHO_AM_I_CLIENT) return { ok: false, reason: "not-client" };
  return { ok: true };
}

/**
 * Run one connection through the admission state machine:
 * awaiting-handshake → validating → admitted | rejected.
 *
 * A connection that sends nothing within `handshakeTimeoutMs` is rejected.
 * A rejected connection is closed without any message and leaves the registry
 * untouched. An admitted player is seated with its receive task already
 * feeding the match's fan-in queue.
 */
export async function admitConnection(
  connection: PlayerConnection,
  ctx: AdmissionContext,
): Promise<AdmissionResult> {
  const { registry, queue, serialization } = ctx;
  const reject = (reason: RejectReason): AdmissionResult => {
    ctx.onStateChange?.("rejected");
    serverLog(`rejected ${connection.label}: ${reason}`);
    connection.sink.close();
    return { state: "rejected", reason };
  };

  ctx.onStateChange?.("awaiting-handshake");
  const handshake = await readHandshake(connection, ctx.handshakeTimeoutMs);
  if (!handshake.ok) return reject(handshake.reason);

  ctx.onStateChange?.("validating");
  const clockOffsetMs = await syncClock(connection.stream, connection.sink, {
    ...ctx.clockSync,
    serialization,
    label: connection.label,
  });

  const id = registry.allocateId();
  if (id === null) {
    await new PlayerSink(-1, connection.sink, serialization).kick("Match is full");
    ctx.onStateChange?.("rejected");
    serverLog(`rejected ${connection.label}: match-full`);
    return { state: "rejected", reason: "match-full" };
  }

  const spawn = ctx.spawn ?? DEFAULT_SPAWN;
  const player: Player = {
    id,
    position: { x: spawn.x, y: spawn.y },
    clockOffsetMs,
    sink: new PlayerSink(id, connection.sink, serialization),
  };
  ctx.trackTask(runPlayerStream(id, connection.stream, queue));
  registry.seat(player);

  ctx.onStateChange?.("admitted");
  serverLog(`admitted ${connection.label} as player ${id} (clock offset ${clockOffsetMs}ms)`);
  return { state: "admitted", player };
}
