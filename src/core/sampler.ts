import type { NoiseParams } from "./decision.ts";

/**
 * Draws one noisy activation increment. Repeated calls are independent draws
 * whose long-run mean is `baseLevel` and whose spread is set by `noise`.
 */
export type Sampler = (baseLevel: number, noise: NoiseParams) => number;

export type RNG = () => number;

// Mulberry32
export function createRng(seed: number): RNG {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Box-Muller; u1 is kept off zero so the log stays finite
export function normalNoise(sd: number, rng: RNG = Math.random): number {
  if (sd === 0) return 0;
  let u1 = 0;
  while (u1 === 0) u1 = rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z * sd;
}

export function createGaussianSampler(rng: RNG = Math.random): Sampler {
  return (baseLevel, noise) => baseLevel + normalNoise(noise.sd, rng);
}

/**
 * Replays a fixed list of increments in order, wrapping around at the end.
 * Arguments are ignored, which makes trials fully reproducible.
 */
export function createSequenceSampler(values: readonly number[]): Sampler {
  if (values.length === 0) {
    throw new RangeError("Sequence sampler needs at least one value");
  }
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}
