import alea from "alea";
import { createNoise2D, type NoiseFunction2D } from "simplex-noise";

export interface NoiseMapOptions {
  frequency: number;
  octaves: number;
  lacunarity: number;
  persistence: number;
}

const DEFAULTS: NoiseMapOptions = {
  frequency: 0.05,
  octaves: 4,
  lacunarity: 2.0,
  persistence: 0.5,
};

/**
 * Layered simplex noise seeded from the match seed. Each layer of the world
 * (elevation, moisture) gets its own channel name so the layers decorrelate.
 */
export class NoiseMap {
  private readonly noise: NoiseFunction2D;
  private readonly options: NoiseMapOptions;

  constructor(seed: number, channel: string, options?: Partial<NoiseMapOptions>) {
    this.options = { ...DEFAULTS, ...options };
    this.noise = createNoise2D(alea(`${seed}:${channel}`));
  }

  /** Sample at tile coordinates. Returns [0, 1]. */
  sample(x: number, y: number): number {
    const { octaves, lacunarity, persistence } = this.options;
    let value = 0;
    let amplitude = 1;
    let freq = this.options.frequency;
    let maxAmplitude = 0;

    for (let i = 0; i < octaves; i++) {
      value += this.noise(x * freq, y * freq) * amplitude;
      maxAmplitude += amplitude;
      amplitude *= persistence;
      freq *= lacunarity;
    }

    return (value / maxAmplitude + 1) / 2;
  }
}
