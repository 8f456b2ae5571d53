/**
 * Binary protocol codec for match traffic.
 *
 * Message type tags:
 *   0x01 = player-start (server→client)
 *   0x02 = clock-sync probe (server→client)
 *   0x80 = player-input (client→server)
 *   0x81 = whoami (client→server)
 *   0x82 = clock-sync-reply (client→server)
 *   0xFF = JSON fallback (UTF-8 JSON string follows)
 *
 * All multi-byte values are little-endian. All offsets measured in bytes.
 */

import {
  type ClientMessage,
  type ClockSyncMessage,
  type ClockSyncReplyMessage,
  type PlayerInputMessage,
  type PlayerStartMessage,
  parseClientMessage,
  parseServerMessage,
  type ServerMessage,
} from "./protocol.js";

// ---- Message type tags ----

const TAG_PLAYER_START = 0x01;
const TAG_CLOCK_SYNC = 0x02;
const TAG_PLAYER_INPUT = 0x80;
const TAG_WHOAMI = 0x81;
const TAG_CLOCK_SYNC_REPLY = 0x82;
const TAG_JSON = 0xff;

const PLAYER_START_SIZE = 21; // 1 tag + 4 entityId + 2 range + 2 visibility + 4 x + 4 y + 4 seed
const CLOCK_SYNC_SIZE = 11; // 1 tag + 2 seq + 8 serverTime
const PLAYER_INPUT_SIZE = 13; // 1 tag + 4 seq + 4 dx + 4 dy
const WHOAMI_SIZE = 2;
const CLOCK_SYNC_REPLY_SIZE = 19; // 1 tag + 2 seq + 8 serverTime + 8 clientTime

// ---- TextEncoder/Decoder for JSON fallback ----

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ---- Server message encoding ----

export function encodeServerMessage(msg: ServerMessage): ArrayBuffer {
  if (msg.type === "player-start") return encodePlayerStart(msg);
  if (msg.type === "clock-sync") return encodeClockSync(msg);
  return encodeJsonFallback(msg);
}

export function decodeServerMessage(buf: ArrayBuffer): ServerMessage {
  const view = new DataView(buf);
  const tag = readTag(view);
  if (tag === TAG_PLAYER_START) return decodePlayerStart(view);
  if (tag === TAG_CLOCK_SYNC) return decodeClockSync(view);
  if (tag === TAG_JSON) return parseServerMessage(decodeJsonFallback(buf));
  throw new Error(`Unknown server message tag: 0x${tag.toString(16)}`);
}

// ---- Client message encoding ----

export function encodeClientMessage(msg: ClientMessage): ArrayBuffer {
  if (msg.type === "player-input") return encodePlayerInput(msg);
  if (msg.type === "whoami") return encodeWhoAmI(msg.role);
  if (msg.type === "clock-sync-reply") return encodeClockSyncReply(msg);
  return encodeJsonFallback(msg);
}

export function decodeClientMessage(buf: ArrayBuffer): ClientMessage {
  const view = new DataView(buf);
  const tag = readTag(view);
  if (tag === TAG_PLAYER_INPUT) return decodePlayerInput(view);
  if (tag === TAG_WHOAMI) return decodeWhoAmI(view);
  if (tag === TAG_CLOCK_SYNC_REPLY) return decodeClockSyncReply(view);
  if (tag === TAG_JSON) return parseClientMessage(decodeJsonFallback(buf));
  throw new Error(`Unknown client message tag: 0x${tag.toString(16)}`);
}

function readTag(view: DataView): number {
  if (view.byteLength === 0) throw new Error("Empty message");
  return view.getUint8(0);
}

function expectSize(view: DataView, size: number, label: string): void {
  if (view.byteLength < size) {
    throw new Error(`Truncated ${label}: ${view.byteLength} < ${size} bytes`);
  }
}

// ---- JSON fallback ----

function encodeJsonFallback(msg: unknown): ArrayBuffer {
  const json = textEncoder.encode(JSON.stringify(msg));
  const buf = new ArrayBuffer(1 + json.byteLength);
  new DataView(buf).setUint8(0, TAG_JSON);
  new Uint8Array(buf, 1).set(json);
  return buf;
}

function decodeJsonFallback(buf: ArrayBuffer): unknown {
  const json = textDecoder.decode(new Uint8Array(buf, 1));
  return JSON.parse(json);
}

// ---- player-start ----

function encodePlayerStart(msg: PlayerStartMessage): ArrayBuffer {
  const buf = new ArrayBuffer(PLAYER_START_SIZE);
  const view = new DataView(buf);
  view.setUint8(0, TAG_PLAYER_START);
  view.setUint32(1, msg.entityId, true);
  view.setUint16(5, msg.range, true);
  view.setUint16(7, msg.visibilityRange, true);
  view.setInt32(9, msg.position.x, true);
  view.setInt32(13, msg.position.y, true);
  view.setUint32(17, msg.seed, true);
  return buf;
}

function decodePlayerStart(view: DataView): PlayerStartMessage {
  expectSize(view, PLAYER_START_SIZE, "player-start");
  return {
    type: "player-start",
    entityId: view.getUint32(1, true),
    range: view.getUint16(5, true),
    visibilityRange: view.getUint16(7, true),
    position: { x: view.getInt32(9, true), y: view.getInt32(13, true) },
    seed: view.getUint32(17, true),
  };
}

// ---- clock-sync probe / reply ----

function encodeClockSync(msg: ClockSyncMessage): ArrayBuffer {
  const buf = new ArrayBuffer(CLOCK_SYNC_SIZE);
  const view = new DataView(buf);
  view.setUint8(0, TAG_CLOCK_SYNC);
  view.setUint16(1, msg.seq, true);
  view.setFloat64(3, msg.serverTime, true);
  return buf;
}

function decodeClockSync(view: DataView): ClockSyncMessage {
  expectSize(view, CLOCK_SYNC_SIZE, "clock-sync");
  return {
    type: "clock-sync",
    seq: view.getUint16(1, true),
    serverTime: view.getFloat64(3, true),
  };
}

function encodeClockSyncReply(msg: ClockSyncReplyMessage): ArrayBuffer {
  const buf = new ArrayBuffer(CLOCK_SYNC_REPLY_SIZE);
  const view = new DataView(buf);
  view.setUint8(0, TAG_CLOCK_SYNC_REPLY);
  view.setUint16(1, msg.seq, true);
  view.setFloat64(3, msg.serverTime, true);
  view.setFloat64(11, msg.clientTime, true);
  return buf;
}

function decodeClockSyncReply(view: DataView): ClockSyncReplyMessage {
  expectSize(view, CLOCK_SYNC_REPLY_SIZE, "clock-sync-reply");
  return {
    type: "clock-sync-reply",
    seq: view.getUint16(1, true),
    serverTime: view.getFloat64(3, true),
    clientTime: view.getFloat64(11, true),
  };
}

// ---- whoami ----

function encodeWhoAmI(role: number): ArrayBuffer {
  const buf = new ArrayBuffer(WHOAMI_SIZE);
  const view = new DataView(buf);
  view.setUint8(0, TAG_WHOAMI);
  view.setUint8(1, role);
  return buf;
}

function decodeWhoAmI(view: DataView): ClientMessage {
  expectSize(view, WHOAMI_SIZE, "whoami");
  return { type: "whoami", role: view.getUint8(1) };
}

// ---- player-input ----

function encodePlayerInput(msg: PlayerInputMessage): ArrayBuffer {
  const buf = new ArrayBuffer(PLAYER_INPUT_SIZE);
  const view = new DataView(buf);
  view.setUint8(0, TAG_PLAYER_INPUT);
  view.setUint32(1, msg.seq, true);
  view.setFloat32(5, msg.dx, true);
  view.setFloat32(9, msg.dy, true);
  return buf;
}

function decodePlayerInput(view: DataView): PlayerInputMessage {
  expectSize(view, PLAYER_INPUT_SIZE, "player-input");
  return {
    type: "player-input",
    seq: view.getUint32(1, true),
    dx: view.getFloat32(5, true),
    dy: view.getFloat32(9, true),
  };
}
