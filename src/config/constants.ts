/** Pixels per map tile. */
export const TILE_SIZE = 8;

/** Tiles per side of the generated match map. */
export const MAP_SIZE = 64;

/** Map side length in world pixels. */
export const MAP_SIZE_PX = TILE_SIZE * MAP_SIZE;

/** Fixed simulation tick rate in Hz. */
export const TICK_RATE = 60;

/** Duration of one tick in milliseconds (~16.666 ms at 60 Hz). */
export const TICK_MS = 1000 / TICK_RATE;

/** Default slot count of a match's player registry. */
export const MATCH_CAPACITY = 100;

/** Entity ids reserved per player. Player N owns [N * ENTITY_RANGE, (N + 1) * ENTITY_RANGE). */
export const ENTITY_RANGE = 500;

/** Radius (world pixels) of the area a client keeps in view. */
export const VISIBILITY_RANGE = 500;

/** Spawn position handed to every admitted player. */
export const DEFAULT_SPAWN: Readonly<{ x: number; y: number }> = { x: 256, y: 256 };

/** Capacity of the per-match connection event queue. */
export const FAN_IN_CAPACITY = 100;

/** Round trips performed by the clock synchronizer during admission. */
export const CLOCK_SYNC_SAMPLES = 10;

/** How long a single clock-sync probe waits for its echo. */
export const CLOCK_SYNC_TIMEOUT_MS = 1000;

/** How long a new connection may stay silent before its handshake is rejected. */
export const HANDSHAKE_TIMEOUT_MS = 5000;

/** Role byte a game client sends in its whoami frame. */
export const WHO_AM_I_CLIENT = 1;

/** Role byte for peers that did not identify. */
export const WHO_AM_I_UNKNOWN = 0;
