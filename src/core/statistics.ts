import type { SummaryStats } from "./decision.ts";
import { EmptyInputError } from "./errors.ts";

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError("a mean");
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError("a median");
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

// Bessel-corrected (n - 1); a single value has no spread.
export function sampleStdDev(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError("a standard deviation");
  if (values.length === 1) return 0;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function summarize(values: readonly number[]): SummaryStats {
  if (values.length === 0) throw new EmptyInputError();
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    stddev: sampleStdDev(values),
    min: values.reduce((lo, v) => Math.min(lo, v), Infinity),
    max: values.reduce((hi, v) => Math.max(hi, v), -Infinity),
  };
}
