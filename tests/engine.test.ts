import { describe, expect, test } from "vitest";

import { DEFAULT_CONFIG } from "../src/config/defaults.ts";
import { RaceEngine } from "../src/core/engine.ts";
import { InvalidConfigurationError } from "../src/core/errors.ts";
import { createSequenceSampler } from "../src/core/sampler.ts";

describe("RaceEngine", () => {
  test("create() uses the default config", () => {
    const engine = RaceEngine.create();
    expect(engine.config).toEqual(DEFAULT_CONFIG);
    expect(typeof engine.sampler).toBe("function");
  });

  test("create() accepts config overrides", () => {
    const engine = RaceEngine.create({ threshold: 6, numTrials: 12 });
    expect(engine.config.threshold).toBe(6);
    expect(engine.config.numTrials).toBe(12);
    expect(engine.config.stepCeiling).toBe(DEFAULT_CONFIG.stepCeiling);
  });

  test("create() rejects an invalid config before any trial runs", () => {
    expect(() => RaceEngine.create({ stepCeiling: 0 })).toThrow(InvalidConfigurationError);
  });

  test("an injected sampler drives every trial", () => {
    const engine = RaceEngine.create(
      { threshold: 3, numTrials: 2 },
      createSequenceSampler([1, 0.5]),
    );
    expect(engine.runTrial()).toEqual({ reactionTime: 3, winner: "left" });
    expect(engine.runExperiment().reactionTimes).toEqual([3, 3]);
    expect(engine.traceTrial().trace).toHaveLength(3);
  });

  test("the same seed reproduces the same distribution", () => {
    const a = RaceEngine.create({ seed: 42, numTrials: 40 }).runExperiment();
    const b = RaceEngine.create({ seed: 42, numTrials: 40 }).runExperiment();
    expect(a.reactionTimes).toEqual(b.reactionTimes);
  });

  test("sweep() runs one experiment per threshold", () => {
    const engine = RaceEngine.create({ numTrials: 3 }, createSequenceSampler([1, 1]));
    const points = engine.sweep([2, 5]);
    expect(points.map((p) => p.threshold)).toEqual([2, 5]);
    expect(points.map((p) => p.summary.mean)).toEqual([2, 5]);
  });
});
