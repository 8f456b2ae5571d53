import { describe, expect, it } from "vitest";
import {
  DEFAULT_SPAWN,
  ENTITY_RANGE,
  MAP_SIZE,
  MAP_SIZE_PX,
  TICK_MS,
  TICK_RATE,
  TILE_SIZE,
} from "./constants.js";

describe("constants", () => {
  it("has consistent map size", () => {
    expect(MAP_SIZE_PX).toBe(TILE_SIZE * MAP_SIZE);
  });

  it("derives tick duration from tick rate", () => {
    expect(TICK_MS * TICK_RATE).toBeCloseTo(1000);
    expect(TICK_MS).toBeCloseTo(16.666, 2);
  });

  it("spawns inside the map", () => {
    expect(DEFAULT_SPAWN.x).toBeLessThan(MAP_SIZE_PX);
    expect(DEFAULT_SPAWN.y).toBeLessThan(MAP_SIZE_PX);
    expect(ENTITY_RANGE).toBe(500);
  });
});
