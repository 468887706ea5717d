export { RaceEngine } from "./core/engine.ts";
export { DualAccumulator } from "./core/accumulator.ts";
export { runTrial, traceTrial } from "./core/trial.ts";
export { runExperiment } from "./core/experiment.ts";
export { sweepThresholds } from "./core/sweep.ts";
export { mean, median, sampleStdDev, summarize } from "./core/statistics.ts";
export {
  createGaussianSampler,
  createRng,
  createSequenceSampler,
  normalNoise,
  type RNG,
  type Sampler,
} from "./core/sampler.ts";
export {
  EvraceError,
  EmptyInputError,
  InvalidConfigurationError,
  InvalidSampleError,
  NonTerminatingTrialError,
  TrialStateError,
} from "./core/errors.ts";
export {
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  type ConfigOverrides,
  type ExperimentConfig,
} from "./config/defaults.ts";
export {
  Category,
  TrialStatus,
  FailurePolicy,
  isValidCategory,
} from "./core/decision.ts";
export type {
  NoiseParams,
  ActivationSnapshot,
  TrialResult,
  TrialFailure,
  SummaryStats,
  ExperimentResult,
  SweepPoint,
} from "./core/decision.ts";
