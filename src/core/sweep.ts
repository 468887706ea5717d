import { parseConfig, type ExperimentConfig } from "../config/defaults.ts";
import type { SweepPoint } from "./decision.ts";
import { runExperiment } from "./experiment.ts";
import type { Sampler } from "./sampler.ts";

export function sweepThresholds(
  config: ExperimentConfig,
  sampler: Sampler,
  thresholds: readonly number[],
): SweepPoint[] {
  const configs = thresholds.map((threshold) => parseConfig({ ...config, threshold }));

  return configs.map((pointConfig) => {
    const { reactionTimes, failures, summary } = runExperiment(pointConfig, sampler);
    return { threshold: pointConfig.threshold, reactionTimes, failures, summary };
  });
}
