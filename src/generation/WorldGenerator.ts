import { MAP_SIZE, TILE_SIZE } from "../config/constants.js";
import { BiomeMapper, Terrain } from "./BiomeMapper.js";
import { NoiseMap } from "./NoiseMap.js";

/** Square terrain grid, row-major, one Terrain byte per tile. */
export class WorldMap {
  constructor(
    readonly seed: number,
    readonly size: number,
    readonly tiles: Uint8Array,
  ) {}

  /** Terrain at tile coordinates; out-of-bounds tiles read as water. */
  terrainAt(tx: number, ty: number): Terrain {
    if (tx < 0 || ty < 0 || tx >= this.size || ty >= this.size) return Terrain.Water;
    return this.tiles[ty * this.size + tx] ?? Terrain.Water;
  }

  /** Terrain under a world-pixel position. */
  terrainAtWorld(x: number, y: number): Terrain {
    return this.terrainAt(Math.floor(x / TILE_SIZE), Math.floor(y / TILE_SIZE));
  }
}

/**
 * Deterministic seed → map function. Clients receive the seed in their start
 * message and run the same generator to rebuild the world locally.
 */
export function generateWorld(seed: number, size = MAP_SIZE): WorldMap {
  const mapper = new BiomeMapper(
    new NoiseMap(seed, "elevation", { frequency: 0.04, octaves: 5 }),
    new NoiseMap(seed, "moisture", { frequency: 0.06, octaves: 4 }),
  );
  const tiles = new Uint8Array(size * size);
  for (let ty = 0; ty < size; ty++) {
    for (let tx = 0; tx < size; tx++) {
      tiles[ty * size + tx] = mapper.getTerrain(tx, ty);
    }
  }
  return new WorldMap(seed, size, tiles);
}
