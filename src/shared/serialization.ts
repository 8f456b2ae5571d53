import type { Frame } from "../transport/Transport.js";
import {
  decodeClientMessage,
  decodeServerMessage,
  encodeClientMessage,
  encodeServerMessage,
} from "./binaryCodec.js";
import {
  type ClientMessage,
  parseClientMessage,
  parseServerMessage,
  type SerializationMode,
  type ServerMessage,
} from "./protocol.js";

/**
 * Mode-aware framing. Binary matches use the tagged codec; JSON matches send
 * text frames. Decoders accept binary frames in either mode so the handshake
 * and clock sync (always binary) share one path with gameplay traffic.
 */

export function encodeServerFrame(msg: ServerMessage, mode: SerializationMode): Frame {
  if (mode === "json") return { binary: false, data: JSON.stringify(msg) };
  return { binary: true, data: encodeServerMessage(msg) };
}

export function decodeClientFrame(frame: Frame): ClientMessage {
  if (frame.binary) return decodeClientMessage(frame.data);
  return parseClientMessage(JSON.parse(frame.data));
}

export function encodeClientFrame(msg: ClientMessage, mode: SerializationMode): Frame {
  if (mode === "json") return { binary: false, data: JSON.stringify(msg) };
  return { binary: true, data: encodeClientMessage(msg) };
}

export function decodeServerFrame(frame: Frame): ServerMessage {
  if (frame.binary) return decodeServerMessage(frame.data);
  return parseServerMessage(JSON.parse(frame.data));
}
