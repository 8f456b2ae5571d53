import { AtomicCounter } from "../shared/AtomicCounter.js";
import type { Player } from "./Player.js";

/**
 * Fixed-capacity slot table indexed by player id. Only the match task reads or
 * writes slots; the population counter is atomic because the match's owner
 * may read it from elsewhere.
 *
 * Ids come from a monotonic counter and are never reused, so a registry admits
 * at most `capacity` players over its lifetime.
 */
export class PlayerRegistry {
  private readonly slots: (Player | null)[];
  private readonly nextId = new AtomicCounter(0);

  constructor(
    readonly capacity: number,
    readonly population: AtomicCounter = new AtomicCounter(0),
  ) {
    this.slots = new Array<Player | null>(capacity).fill(null);
  }

  get playerCount(): number {
    return this.population.load();
  }

  /**
   * Reserve the next player id and count it toward the population. The slot
   * stays empty until seat(). Returns null once every id has been handed out.
   */
  allocateId(): number | null {
    const id = this.nextId.fetchAddBelow(this.capacity);
    if (id === null) return null;
    this.population.fetchAdd(1);
    return id;
  }

  seat(player: Player): void {
    if (player.id < 0 || player.id >= this.nextId.load()) {
      throw new Error(`Player id ${player.id} was never allocated`);
    }
    if (this.slots[player.id]) {
      throw new Error(`Slot ${player.id} is already occupied`);
    }
    this.slots[player.id] = player;
  }

  get(id: number): Player | null {
    return this.slots[id] ?? null;
  }

  /** Clear a slot and decrement the population. Returns null if the slot was already empty. */
  evict(id: number): Player | null {
    const player = this.slots[id] ?? null;
    if (!player) return null;
    this.slots[id] = null;
    this.population.fetchSub(1);
    return player;
  }

  /** Occupied slots in id order. */
  seated(): Player[] {
    return this.slots.filter((p): p is Player => p !== null);
  }
}
