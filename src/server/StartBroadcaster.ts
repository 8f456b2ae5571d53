import { ENTITY_RANGE, VISIBILITY_RANGE } from "../config/constants.js";
import type { PlayerStartMessage } from "../shared/protocol.js";
import type { Player } from "./Player.js";
import type { PlayerRegistry } from "./PlayerRegistry.js";
import { serverLogError } from "./serverLog.js";

export interface BroadcastResult {
  /** Players that received their start message. */
  delivered: number[];
  /** Players whose send failed and who were kicked and removed. */
  evicted: number[];
}

/** Player N owns entity ids [N * ENTITY_RANGE, (N + 1) * ENTITY_RANGE). */
export function createPlayerStartMessage(player: Player, seed: number): PlayerStartMessage {
  return {
    type: "player-start",
    entityId: player.id * ENTITY_RANGE,
    range: ENTITY_RANGE,
    visibilityRange: VISIBILITY_RANGE,
    position: { x: player.position.x, y: player.position.y },
    seed,
  };
}

/**
 * Send every seated player its start message. Sends run concurrently and are
 * awaited as one batch; the registry is only touched after the batch settles.
 * A player whose send failed is treated as disconnected: kicked, then evicted.
 */
export async function broadcastStart(registry: PlayerRegistry, seed: number): Promise<BroadcastResult> {
  const players = registry.seated();
  const results = await Promise.allSettled(
    players.map((player) => player.sink.send(createPlayerStartMessage(player, seed))),
  );

  const delivered: number[] = [];
  const failed: Player[] = [];
  results.forEach((result, i) => {
    const player = players[i];
    if (!player) return;
    if (result.status === "fulfilled") {
      delivered.push(player.id);
    } else {
      serverLogError(`start message to player ${player.id} failed`, result.reason);
      failed.push(player);
    }
  });

  await Promise.all(failed.map((player) => player.sink.kick("Failed to deliver start message")));
  for (const player of failed) registry.evict(player.id);

  return { delivered, evicted: failed.map((p) => p.id) };
}
