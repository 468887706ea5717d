import type { ExperimentConfig } from "../config/defaults.ts";
import {
  FailurePolicy,
  type ExperimentResult,
  type TrialFailure,
  type TrialResult,
} from "./decision.ts";
import { EmptyInputError, NonTerminatingTrialError } from "./errors.ts";
import { logger } from "./logger.ts";
import type { Sampler } from "./sampler.ts";
import { summarize } from "./statistics.ts";
import { runTrial } from "./trial.ts";

/**
 * Runs `config.numTrials` independent trials in order and summarizes their
 * reaction times.
 *
 * A trial that hits the step ceiling either aborts the whole run or, under the
 * `"skip"` policy, is reported in `failures` and left out of the distribution.
 * Failed trials are never re-drawn. If every trial is skipped, the
 * {@link EmptyInputError} carries the collected `failures`.
 */
export function runExperiment(config: ExperimentConfig, sampler: Sampler): ExperimentResult {
  const results: TrialResult[] = [];
  const failures: TrialFailure[] = [];

  logger.debug(
    `running ${config.numTrials} trials (threshold ${config.threshold}, ceiling ${config.stepCeiling})`,
  );

  for (let trial = 0; trial < config.numTrials; trial++) {
    try {
      results.push(runTrial(config, sampler));
    } catch (error) {
      if (!(error instanceof NonTerminatingTrialError)) throw error;
      if (config.failurePolicy === FailurePolicy.Abort) throw error;
      failures.push({ trial, steps: error.steps });
      logger.warn(`trial ${trial} skipped: ${error.message}`);
    }
  }

  const reactionTimes = results.map((r) => r.reactionTime);
  if (reactionTimes.length === 0) throw new EmptyInputError("summary statistics", failures);
  const summary = summarize(reactionTimes);

  logger.debug(
    `finished: ${results.length} completed, ${failures.length} failed, mean RT ${summary.mean.toFixed(2)}`,
  );

  return { reactionTimes, results, failures, summary };
}
