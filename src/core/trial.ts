import type { ExperimentConfig } from "../config/defaults.ts";
import { DualAccumulator } from "./accumulator.ts";
import type { ActivationSnapshot, TrialResult } from "./decision.ts";
import type { Sampler } from "./sampler.ts";

// The winner is never checked against a stimulus label: every response counts as correct.
export function runTrial(config: ExperimentConfig, sampler: Sampler): TrialResult {
  const accumulator = new DualAccumulator(config, sampler);
  let result = accumulator.step();
  while (result === null) {
    result = accumulator.step();
  }
  return result;
}

export function traceTrial(
  config: ExperimentConfig,
  sampler: Sampler,
): { result: TrialResult; trace: ActivationSnapshot[] } {
  const accumulator = new DualAccumulator(config, sampler);
  const trace: ActivationSnapshot[] = [];

  for (;;) {
    const result = accumulator.step();
    trace.push(accumulator.snapshot());
    if (result !== null) return { result, trace };
  }
}
