import type { ConfigOverrides, ExperimentConfig } from "../config/defaults.ts";
import { loadConfig } from "../config/defaults.ts";
import type { ActivationSnapshot, ExperimentResult, SweepPoint, TrialResult } from "./decision.ts";
import { runExperiment } from "./experiment.ts";
import { createGaussianSampler, createRng, type Sampler } from "./sampler.ts";
import { sweepThresholds } from "./sweep.ts";
import { runTrial, traceTrial } from "./trial.ts";

export class RaceEngine {
  readonly config: ExperimentConfig;
  readonly sampler: Sampler;

  private constructor(config: ExperimentConfig, sampler: Sampler) {
    this.config = config;
    this.sampler = sampler;
  }

  static create(configOverrides?: ConfigOverrides, sampler?: Sampler): RaceEngine {
    const config = loadConfig(configOverrides);
    const rng = config.seed === null ? Math.random : createRng(config.seed);
    return new RaceEngine(config, sampler ?? createGaussianSampler(rng));
  }

  runTrial(): TrialResult {
    return runTrial(this.config, this.sampler);
  }

  traceTrial(): { result: TrialResult; trace: ActivationSnapshot[] } {
    return traceTrial(this.config, this.sampler);
  }

  runExperiment(): ExperimentResult {
    return runExperiment(this.config, this.sampler);
  }

  sweep(thresholds: readonly number[]): SweepPoint[] {
    return sweepThresholds(this.config, this.sampler, thresholds);
  }
}
