import { defineCommand } from "citty";

import { formatTrace } from "../format.ts";
import { configArgs, createEngine, exitOnError } from "../options.ts";

export const trialCommand = defineCommand({
  meta: {
    name: "trial",
    description: "Run a single trial and show the activations at every step",
  },
  args: configArgs,
  run({ args }) {
    const engine = createEngine(args);
    try {
      const { result, trace } = engine.traceTrial();
      console.log(formatTrace(result, trace, engine.config));
    } catch (error) {
      exitOnError(error);
    }
  },
});
