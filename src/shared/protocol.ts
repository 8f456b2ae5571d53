// ---- Client → Server messages ----

export interface WhoAmIMessage {
  type: "whoami";
  /** Peer role byte (WHO_AM_I_CLIENT for game clients). */
  role: number;
}

/** Echo of a server clock probe, stamped with the client's own clock. */
export interface ClockSyncReplyMessage {
  type: "clock-sync-reply";
  seq: number;
  serverTime: number;
  clientTime: number;
}

export interface PlayerInputMessage {
  type: "player-input";
  seq: number;
  dx: number;
  dy: number;
}

export type ClientMessage =
  | WhoAmIMessage
  | ClockSyncReplyMessage
  | PlayerInputMessage
  | { type: "chat"; text: string };

// ---- Server → Client messages ----

export interface ClockSyncMessage {
  type: "clock-sync";
  seq: number;
  serverTime: number;
}

/** Spawn assignment sent to every seated player when the match starts. */
export interface PlayerStartMessage {
  type: "player-start";
  /** First entity id owned by this player. */
  entityId: number;
  /** Number of entity ids reserved for this player, starting at entityId. */
  range: number;
  visibilityRange: number;
  position: { x: number; y: number };
  seed: number;
}

export type ServerMessage =
  | ClockSyncMessage
  | PlayerStartMessage
  | { type: "kicked"; reason: string };

/** How a match encodes messages after the handshake. */
export type SerializationMode = "binary" | "json";

// ---- Validation for untrusted JSON payloads ----

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function parseClientMessage(value: unknown): ClientMessage {
  if (!isRecord(value)) throw new Error("Client message is not an object");
  switch (value.type) {
    case "whoami":
      if (isNumber(value.role)) return { type: "whoami", role: value.role };
      break;
    case "clock-sync-reply":
      if (isNumber(value.seq) && isNumber(value.serverTime) && isNumber(value.clientTime)) {
        return {
          type: "clock-sync-reply",
          seq: value.seq,
          serverTime: value.serverTime,
          clientTime: value.clientTime,
        };
      }
      break;
    case "player-input":
      if (isNumber(value.seq) && isNumber(value.dx) && isNumber(value.dy)) {
        return { type: "player-input", seq: value.seq, dx: value.dx, dy: value.dy };
      }
      break;
    case "chat":
      if (typeof value.text === "string") return { type: "chat", text: value.text };
      break;
  }
  throw new Error(`Malformed client message: ${String(value.type)}`);
}

export function parseServerMessage(value: unknown): ServerMessage {
  if (!isRecord(value)) throw new Error("Server message is not an object");
  switch (value.type) {
    case "clock-sync":
      if (isNumber(value.seq) && isNumber(value.serverTime)) {
        return { type: "clock-sync", seq: value.seq, serverTime: value.serverTime };
      }
      break;
    case "player-start": {
      const pos = value.position;
      if (
        isNumber(value.entityId) &&
        isNumber(value.range) &&
        isNumber(value.visibilityRange) &&
        isNumber(value.seed) &&
        isRecord(pos) &&
        isNumber(pos.x) &&
        isNumber(pos.y)
      ) {
        return {
          type: "player-start",
          entityId: value.entityId,
          range: value.range,
          visibilityRange: value.visibilityRange,
          position: { x: pos.x, y: pos.y },
          seed: value.seed,
        };
      }
      break;
    }
    case "kicked":
      if (typeof value.reason === "string") return { type: "kicked", reason: value.reason };
      break;
  }
  throw new Error(`Malformed server message: ${String(value.type)}`);
}
