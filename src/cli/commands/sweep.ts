import { defineCommand } from "citty";

import { formatSweep } from "../format.ts";
import { configArgs, createEngine, exitOnError } from "../options.ts";

export function parseThresholds(list: string): number[] {
  return list
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(Number);
}

export const sweepCommand = defineCommand({
  meta: {
    name: "sweep",
    description: "Run one experiment per threshold and compare mean reaction times",
  },
  args: {
    thresholds: {
      type: "positional",
      description: "Comma-separated thresholds, e.g. 5,10,20",
      required: true,
    },
    ...configArgs,
  },
  run({ args }) {
    const engine = createEngine(args);
    try {
      const points = engine.sweep(parseThresholds(args.thresholds));
      console.log(formatSweep(points));
    } catch (error) {
      exitOnError(error);
    }
  },
});
