import { defineCommand } from "citty";

import { formatExperiment } from "../format.ts";
import { configArgs, createEngine, exitOnError } from "../options.ts";

export const runCommand = defineCommand({
  meta: {
    name: "run",
    description: "Run an experiment and summarize the reaction time distribution",
  },
  args: {
    ...configArgs,
    rts: {
      type: "boolean",
      description: "Include the raw reaction time sequence in the output",
      default: false,
    },
  },
  run({ args }) {
    const engine = createEngine(args);
    try {
      const result = engine.runExperiment();
      console.log(formatExperiment(result, engine.config, { includeReactionTimes: args.rts }));
    } catch (error) {
      exitOnError(error);
    }
  },
});
