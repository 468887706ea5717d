import { z } from "zod/v4";

import { InvalidConfigurationError } from "../core/errors.ts";
import { Category, FailurePolicy, type NoiseParams } from "../core/decision.ts";

export interface ExperimentConfig {
  readonly threshold: number;
  readonly numTrials: number;
  readonly baseIncrement: Readonly<Record<Category, number>>;
  readonly noise: NoiseParams;
  readonly stepCeiling: number;
  readonly failurePolicy: FailurePolicy;
  readonly seed: number | null;
}

type MutableConfig = { -readonly [K in keyof ExperimentConfig]: ExperimentConfig[K] };

export type ConfigOverrides = Partial<
  Omit<MutableConfig, "baseIncrement" | "noise"> & {
    baseIncrement: Partial<Record<Category, number>>;
    noise: Partial<NoiseParams>;
  }
>;

export const DEFAULT_CONFIG: ExperimentConfig = {
  threshold: 10,
  numTrials: 200,
  baseIncrement: {
    left: 1.0,
    right: 0.8,
  },
  noise: { sd: 1.0 },
  stepCeiling: 500,
  failurePolicy: "abort",
  seed: null,
};

const configSchema = z.object({
  threshold: z.number().positive(),
  numTrials: z.number().int().positive(),
  baseIncrement: z.object({
    [Category.Left]: z.number().positive(),
    [Category.Right]: z.number().positive(),
  }),
  noise: z.object({
    sd: z.number().nonnegative(),
  }),
  stepCeiling: z.number().int().positive(),
  failurePolicy: z.enum([FailurePolicy.Abort, FailurePolicy.Skip]),
  seed: z.number().int().nullable(),
});

export function parseConfig(input: ExperimentConfig): ExperimentConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  return Object.freeze({
    ...data,
    baseIncrement: Object.freeze({ ...data.baseIncrement }),
    noise: Object.freeze({ ...data.noise }),
  });
}

export function loadConfig(overrides?: ConfigOverrides): ExperimentConfig {
  const config: MutableConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    baseIncrement: { ...DEFAULT_CONFIG.baseIncrement, ...overrides?.baseIncrement },
    noise: { ...DEFAULT_CONFIG.noise, ...overrides?.noise },
  };

  if (process.env.EVRACE_THRESHOLD) config.threshold = Number(process.env.EVRACE_THRESHOLD);
  if (process.env.EVRACE_NUM_TRIALS) config.numTrials = Number(process.env.EVRACE_NUM_TRIALS);
  if (process.env.EVRACE_STEP_CEILING)
    config.stepCeiling = Number(process.env.EVRACE_STEP_CEILING);
  if (process.env.EVRACE_NOISE_SD) config.noise = { sd: Number(process.env.EVRACE_NOISE_SD) };
  if (process.env.EVRACE_SEED) config.seed = Number(process.env.EVRACE_SEED);

  return parseConfig(config);
}
