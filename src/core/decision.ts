export const Category = {
  Left: "left",
  Right: "right",
} as const;
export type Category = (typeof Category)[keyof typeof Category];

export const TrialStatus = {
  Running: "running",
  Terminated: "terminated",
  Failed: "failed",
} as const;
export type TrialStatus = (typeof TrialStatus)[keyof typeof TrialStatus];

export const FailurePolicy = {
  Abort: "abort",
  Skip: "skip",
} as const;
export type FailurePolicy = (typeof FailurePolicy)[keyof typeof FailurePolicy];

export interface NoiseParams {
  readonly sd: number;
}

export interface ActivationSnapshot {
  step: number;
  left: number;
  right: number;
}

export interface TrialResult {
  readonly reactionTime: number;
  readonly winner: Category;
}

export interface TrialFailure {
  trial: number;
  steps: number;
}

export interface SummaryStats {
  count: number;
  mean: number;
  median: number;
  stddev: number;
  min: number;
  max: number;
}

export interface ExperimentResult {
  reactionTimes: number[];
  results: TrialResult[];
  failures: TrialFailure[];
  summary: SummaryStats;
}

export interface SweepPoint {
  threshold: number;
  reactionTimes: number[];
  failures: TrialFailure[];
  summary: SummaryStats;
}

export function isValidCategory(s: string): s is Category {
  return (Object.values(Category) as string[]).includes(s);
}
