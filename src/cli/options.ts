import type { ArgsDef } from "citty";
import { consola, LogLevels } from "consola";

import type { ConfigOverrides } from "../config/defaults.ts";
import { RaceEngine } from "../core/engine.ts";
import { EvraceError } from "../core/errors.ts";
import { logger } from "../core/logger.ts";
import { FailurePolicy, type Category } from "../core/decision.ts";

export const configArgs = {
  threshold: {
    type: "string",
    description: "Decision threshold (activation level that ends a trial)",
    alias: "t",
  },
  trials: {
    type: "string",
    description: "Number of trials to run",
    alias: "n",
  },
  ceiling: {
    type: "string",
    description: "Step ceiling after which a trial counts as non-terminating",
  },
  sd: {
    type: "string",
    description: "Standard deviation of the selection noise",
  },
  left: {
    type: "string",
    description: "Base increment per step for the left category",
  },
  right: {
    type: "string",
    description: "Base increment per step for the right category",
  },
  seed: {
    type: "string",
    description: "Seed for reproducible runs",
  },
  skipFailures: {
    type: "boolean",
    description: "Skip trials that hit the step ceiling instead of aborting",
    default: false,
  },
  verbose: {
    type: "boolean",
    description: "Log experiment progress",
    default: false,
  },
} satisfies ArgsDef;

export interface ConfigArgValues {
  threshold?: string;
  trials?: string;
  ceiling?: string;
  sd?: string;
  left?: string;
  right?: string;
  seed?: string;
  skipFailures?: boolean;
  verbose?: boolean;
}

export function overridesFromArgs(args: ConfigArgValues): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (args.threshold !== undefined) overrides.threshold = Number(args.threshold);
  if (args.trials !== undefined) overrides.numTrials = Number(args.trials);
  if (args.ceiling !== undefined) overrides.stepCeiling = Number(args.ceiling);
  if (args.sd !== undefined) overrides.noise = { sd: Number(args.sd) };
  if (args.seed !== undefined) overrides.seed = Number(args.seed);
  if (args.skipFailures) overrides.failurePolicy = FailurePolicy.Skip;

  const baseIncrement: Partial<Record<Category, number>> = {};
  if (args.left !== undefined) baseIncrement.left = Number(args.left);
  if (args.right !== undefined) baseIncrement.right = Number(args.right);
  if (Object.keys(baseIncrement).length > 0) overrides.baseIncrement = baseIncrement;

  return overrides;
}

export function exitOnError(error: unknown): never {
  if (error instanceof EvraceError) {
    consola.error(error.message);
    process.exit(1);
  }
  throw error;
}

export function createEngine(args: ConfigArgValues): RaceEngine {
  if (args.verbose) logger.level = LogLevels.debug;
  try {
    return RaceEngine.create(overridesFromArgs(args));
  } catch (error) {
    return exitOnError(error);
  }
}
