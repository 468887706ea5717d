import { describe, expect, test } from "vitest";

import { isValidCategory } from "../src/core/decision.ts";
import {
  EmptyInputError,
  InvalidSampleError,
  NonTerminatingTrialError,
} from "../src/core/errors.ts";
import { runExperiment } from "../src/core/experiment.ts";
import { createSequenceSampler } from "../src/core/sampler.ts";
import { makeConfig, seededSampler } from "./helpers.ts";

describe("runExperiment", () => {
  test("collects one reaction time per trial in order", () => {
    const config = makeConfig({ threshold: 3, numTrials: 4 });
    const result = runExperiment(config, createSequenceSampler([1, 0.5]));

    expect(result.reactionTimes).toEqual([3, 3, 3, 3]);
    expect(result.results).toHaveLength(4);
    expect(result.failures).toEqual([]);
    expect(result.summary).toEqual({ count: 4, mean: 3, median: 3, stddev: 0, min: 3, max: 3 });
  });

  test("default run yields 200 positive integer reaction times within the ceiling", () => {
    const config = makeConfig({ seed: 11 });
    const result = runExperiment(config, seededSampler(11));

    expect(config.numTrials).toBe(200);
    expect(result.reactionTimes).toHaveLength(200);
    for (const rt of result.reactionTimes) {
      expect(Number.isInteger(rt)).toBe(true);
      expect(rt).toBeGreaterThanOrEqual(1);
      expect(rt).toBeLessThanOrEqual(config.stepCeiling);
    }
    for (const r of result.results) {
      expect(isValidCategory(r.winner)).toBe(true);
    }
    expect(result.summary.count).toBe(200);
  });

  test("aborts on a non-terminating trial by default", () => {
    const config = makeConfig({ threshold: 10, stepCeiling: 5, numTrials: 3 });
    expect(() => runExperiment(config, createSequenceSampler([0.1, 0.1]))).toThrow(
      NonTerminatingTrialError,
    );
  });

  test("skip policy reports failed trials and leaves them out of the distribution", () => {
    const config = makeConfig({
      threshold: 2,
      stepCeiling: 3,
      numTrials: 4,
      failurePolicy: "skip",
    });
    // Trials alternate: three sub-threshold steps, then an immediate left crossing.
    const sampler = createSequenceSampler([0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 2, 0]);
    const result = runExperiment(config, sampler);

    expect(result.failures).toEqual([
      { trial: 0, steps: 3 },
      { trial: 2, steps: 3 },
    ]);
    expect(result.reactionTimes).toEqual([1, 1]);
    expect(result.summary.count).toBe(2);
  });

  test("skip policy with every trial failing has nothing to summarize", () => {
    const config = makeConfig({
      threshold: 10,
      stepCeiling: 2,
      numTrials: 3,
      failurePolicy: "skip",
    });
    expect(() => runExperiment(config, createSequenceSampler([0]))).toThrow(EmptyInputError);
  });

  test("the empty-distribution error keeps the skipped trials", () => {
    const config = makeConfig({
      threshold: 10,
      stepCeiling: 2,
      numTrials: 3,
      failurePolicy: "skip",
    });

    let caught: unknown;
    try {
      runExperiment(config, createSequenceSampler([0]));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EmptyInputError);
    if (caught instanceof EmptyInputError) {
      expect(caught.failures).toEqual([
        { trial: 0, steps: 2 },
        { trial: 1, steps: 2 },
        { trial: 2, steps: 2 },
      ]);
    }
  });

  test("an invalid sample aborts the run even under the skip policy", () => {
    const config = makeConfig({ numTrials: 2, failurePolicy: "skip" });
    expect(() => runExperiment(config, () => NaN)).toThrow(InvalidSampleError);
  });

  test("other sampler errors always propagate", () => {
    const config = makeConfig({ numTrials: 2, failurePolicy: "skip" });
    const broken = () => {
      throw new Error("sampler offline");
    };
    expect(() => runExperiment(config, broken)).toThrow("sampler offline");
  });

  test("mean reaction time grows with the threshold", () => {
    const means = [5, 10, 20].map((threshold) => {
      const config = makeConfig({ threshold, noise: { sd: 0.5 } });
      return runExperiment(config, seededSampler(123)).summary.mean;
    });

    expect(means[0]!).toBeLessThan(means[1]!);
    expect(means[1]!).toBeLessThan(means[2]!);
  });
});
