import type { NoiseMap } from "./NoiseMap.js";

export enum Terrain {
  Water = 0,
  Sand = 1,
  Grass = 2,
  Forest = 3,
  Rock = 4,
}

/** Elevation splits water, land and mountain; moisture picks the land cover. */
const ELEVATION_WATER = 0.35;
const ELEVATION_ROCK = 0.78;

const MOISTURE_SAND = 0.3;
const MOISTURE_FOREST = 0.6;

/** Maps dual-noise values (elevation + moisture) to terrain. */
export class BiomeMapper {
  constructor(
    private readonly elevation: NoiseMap,
    private readonly moisture: NoiseMap,
  ) {}

  getTerrain(tx: number, ty: number): Terrain {
    return BiomeMapper.classify(this.elevation.sample(tx, ty), this.moisture.sample(tx, ty));
  }

  static classify(elevation: number, moisture: number): Terrain {
    if (elevation < ELEVATION_WATER) return Terrain.Water;
    if (elevation >= ELEVATION_ROCK) return Terrain.Rock;
    if (moisture < MOISTURE_SAND) return Terrain.Sand;
    if (moisture < MOISTURE_FOREST) return Terrain.Grass;
    return Terrain.Forest;
  }
}
