import { loadConfig, type ConfigOverrides, type ExperimentConfig } from "../src/config/defaults.ts";
import { createGaussianSampler, createRng, type Sampler } from "../src/core/sampler.ts";

export function makeConfig(overrides?: ConfigOverrides): ExperimentConfig {
  return loadConfig(overrides);
}

export function seededSampler(seed: number): Sampler {
  return createGaussianSampler(createRng(seed));
}
