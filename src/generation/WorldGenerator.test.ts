import { describe, expect, it } from "vitest";
import { MAP_SIZE, TILE_SIZE } from "../config/constants.js";
import { Terrain } from "./BiomeMapper.js";
import { generateWorld, WorldMap } from "./WorldGenerator.js";

describe("generateWorld", () => {
  it("produces the same map for the same seed", () => {
    const a = generateWorld(1234);
    const b = generateWorld(1234);
    expect(a.size).toBe(MAP_SIZE);
    expect(a.tiles).toEqual(b.tiles);
  });

  it("produces different maps for different seeds", () => {
    const a = generateWorld(1);
    const b = generateWorld(2);
    expect(a.tiles).not.toEqual(b.tiles);
  });

  it("only emits known terrain values", () => {
    const map = generateWorld(99, 32);
    const known = new Set<number>([
      Terrain.Water,
      Terrain.Sand,
      Terrain.Grass,
      Terrain.Forest,
      Terrain.Rock,
    ]);
    for (const tile of map.tiles) {
      expect(known.has(tile)).toBe(true);
    }
  });
});

describe("WorldMap", () => {
  const tiles = new Uint8Array([
    Terrain.Grass, Terrain.Sand,
    Terrain.Rock, Terrain.Forest,
  ]);
  const map = new WorldMap(0, 2, tiles);

  it("reads tiles row-major", () => {
    expect(map.terrainAt(0, 0)).toBe(Terrain.Grass);
    expect(map.terrainAt(1, 0)).toBe(Terrain.Sand);
    expect(map.terrainAt(0, 1)).toBe(Terrain.Rock);
    expect(map.terrainAt(1, 1)).toBe(Terrain.Forest);
  });

  it("treats out-of-bounds as water", () => {
    expect(map.terrainAt(-1, 0)).toBe(Terrain.Water);
    expect(map.terrainAt(2, 0)).toBe(Terrain.Water);
  });

  it("converts world pixels to tiles", () => {
    expect(map.terrainAtWorld(TILE_SIZE + 1, TILE_SIZE - 1)).toBe(Terrain.Sand);
  });
});
