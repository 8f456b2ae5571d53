import { MatchConfigError } from "../server/MatchError.js";
import type { SerializationMode } from "../shared/protocol.js";
import {
  CLOCK_SYNC_SAMPLES,
  CLOCK_SYNC_TIMEOUT_MS,
  HANDSHAKE_TIMEOUT_MS,
  MATCH_CAPACITY,
  TICK_MS,
} from "./constants.js";

/** Largest registry whose entity-id ranges still fit the u32 entity id on the wire. */
const MAX_CAPACITY = 0xffff;
const MAX_U32 = 0xffffffff;

export interface MatchConfigInput {
  matchId: number;
  /** World generator input, sent to clients so they can rebuild the map. */
  seed: number;
  /** Players required before the match starts. */
  targetPopulation: number;
  capacity?: number;
  serialization?: SerializationMode;
  tickMs?: number;
  clockSyncSamples?: number;
  clockSyncTimeoutMs?: number;
  /** Wait for a connection's first frame before rejecting it. */
  handshakeTimeoutMs?: number;
  /** Send start/close notifications back over the lobby channel. */
  notifyLobby?: boolean;
}

export type MatchConfig = Readonly<Required<MatchConfigInput>>;

function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new MatchConfigError(field, `${field} must be a positive number, got ${value}`);
  }
  return value;
}

function requireInteger(field: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new MatchConfigError(field, `${field} must be an integer in [${min}, ${max}], got ${value}`);
  }
  return value;
}

export function resolveMatchConfig(input: MatchConfigInput): MatchConfig {
  const capacity = requireInteger("capacity", input.capacity ?? MATCH_CAPACITY, 1, MAX_CAPACITY);
  const tickMs = requirePositive("tickMs", input.tickMs ?? TICK_MS);
  const clockSyncTimeoutMs = requirePositive(
    "clockSyncTimeoutMs",
    input.clockSyncTimeoutMs ?? CLOCK_SYNC_TIMEOUT_MS,
  );
  const handshakeTimeoutMs = requirePositive(
    "handshakeTimeoutMs",
    input.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS,
  );
  const serialization = input.serialization ?? "binary";
  if (serialization !== "binary" && serialization !== "json") {
    throw new MatchConfigError("serialization", `unknown serialization mode: ${String(serialization)}`);
  }

  return {
    matchId: requireInteger("matchId", input.matchId, 0, MAX_U32),
    seed: requireInteger("seed", input.seed, 0, MAX_U32),
    targetPopulation: requireInteger("targetPopulation", input.targetPopulation, 1, capacity),
    capacity,
    serialization,
    tickMs,
    clockSyncSamples: requireInteger(
      "clockSyncSamples",
      input.clockSyncSamples ?? CLOCK_SYNC_SAMPLES,
      0,
      0xffff,
    ),
    clockSyncTimeoutMs,
    handshakeTimeoutMs,
    notifyLobby: input.notifyLobby ?? false,
  };
}

function parseNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) throw new MatchConfigError(key, `${key} is not a number: ${raw}`);
  return value;
}

function parseSerialization(raw: string | undefined): SerializationMode | undefined {
  if (raw === undefined || raw === "") return undefined;
  const mode = raw.toLowerCase();
  if (mode === "binary" || mode === "json") return mode;
  throw new MatchConfigError("MATCH_SERIALIZATION", `unknown serialization mode: ${raw}`);
}

/**
 * Build a match config from MATCH_* environment variables. `defaults` fills
 * anything the environment leaves unset. Match id and lobby notification
 * always come from `defaults`.
 */
export function matchConfigFromEnv(
  env: NodeJS.ProcessEnv,
  defaults: MatchConfigInput,
): MatchConfig {
  return resolveMatchConfig({
    matchId: defaults.matchId,
    seed: parseNumber(env, "MATCH_SEED") ?? defaults.seed,
    targetPopulation: parseNumber(env, "MATCH_TARGET_POPULATION") ?? defaults.targetPopulation,
    capacity: parseNumber(env, "MATCH_CAPACITY") ?? defaults.capacity,
    serialization: parseSerialization(env.MATCH_SERIALIZATION) ?? defaults.serialization,
    tickMs: parseNumber(env, "MATCH_TICK_MS") ?? defaults.tickMs,
    clockSyncSamples: defaults.clockSyncSamples,
    clockSyncTimeoutMs: defaults.clockSyncTimeoutMs,
    handshakeTimeoutMs: defaults.handshakeTimeoutMs,
    notifyLobby: defaults.notifyLobby,
  });
}
