import type { Category, TrialFailure } from "./decision.ts";

export class EvraceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends EvraceError {
  /** Trials skipped before the sequence came up empty, when raised by an experiment. */
  readonly failures: TrialFailure[];

  constructor(what = "summary statistics", failures: TrialFailure[] = []) {
    super(`Cannot compute ${what} of an empty sequence`);
    this.failures = failures;
  }
}

export class NonTerminatingTrialError extends EvraceError {
  readonly steps: number;
  readonly stepCeiling: number;

  constructor(steps: number, stepCeiling: number) {
    super(`Trial did not reach threshold within ${stepCeiling} steps`);
    this.steps = steps;
    this.stepCeiling = stepCeiling;
  }
}

export class InvalidConfigurationError extends EvraceError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

export class InvalidSampleError extends EvraceError {
  readonly category: Category;
  readonly value: number;

  constructor(category: Category, value: number) {
    super(`Sampler returned a non-finite increment for ${category}: ${value}`);
    this.category = category;
    this.value = value;
  }
}

export class TrialStateError extends EvraceError {}
