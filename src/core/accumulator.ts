import type { ExperimentConfig } from "../config/defaults.ts";
import {
  Category,
  TrialStatus,
  type ActivationSnapshot,
  type TrialResult,
} from "./decision.ts";
import { InvalidSampleError, NonTerminatingTrialError, TrialStateError } from "./errors.ts";
import type { Sampler } from "./sampler.ts";

/**
 * Race between the left and right activations of a single trial.
 *
 * Each `step()` adds one sampled increment per category, clamping totals at
 * zero. The first step where either total reaches the threshold ends the
 * trial; the larger total wins and an exact tie goes to left. A trial that is
 * still running after `stepCeiling` steps fails with
 * {@link NonTerminatingTrialError}.
 */
export class DualAccumulator {
  private readonly config: ExperimentConfig;
  private readonly sampler: Sampler;
  private left = 0;
  private right = 0;
  private stepCount = 0;
  private currentStatus: TrialStatus = TrialStatus.Running;
  private outcome: TrialResult | null = null;

  constructor(config: ExperimentConfig, sampler: Sampler) {
    this.config = config;
    this.sampler = sampler;
  }

  get status(): TrialStatus {
    return this.currentStatus;
  }

  get steps(): number {
    return this.stepCount;
  }

  get result(): TrialResult | null {
    return this.outcome;
  }

  snapshot(): ActivationSnapshot {
    return { step: this.stepCount, left: this.left, right: this.right };
  }

  step(): TrialResult | null {
    if (this.currentStatus !== TrialStatus.Running) {
      throw new TrialStateError(`Cannot step a trial that has ${this.currentStatus}`);
    }

    const { threshold, stepCeiling } = this.config;
    const leftIncrement = this.draw(Category.Left);
    const rightIncrement = this.draw(Category.Right);
    this.left = Math.max(0, this.left + leftIncrement);
    this.right = Math.max(0, this.right + rightIncrement);
    this.stepCount++;

    if (Math.max(this.left, this.right) >= threshold) {
      this.currentStatus = TrialStatus.Terminated;
      this.outcome = Object.freeze({
        reactionTime: this.stepCount,
        winner: this.right > this.left ? Category.Right : Category.Left,
      });
      return this.outcome;
    }

    if (this.stepCount >= stepCeiling) {
      this.currentStatus = TrialStatus.Failed;
      throw new NonTerminatingTrialError(this.stepCount, stepCeiling);
    }

    return null;
  }

  private draw(category: Category): number {
    const value = this.sampler(this.config.baseIncrement[category], this.config.noise);
    if (!Number.isFinite(value)) {
      this.currentStatus = TrialStatus.Failed;
      throw new InvalidSampleError(category, value);
    }
    return value;
  }
}
