#!/usr/bin/env tsx
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { defineCommand, runMain } from "citty";
import { z } from "zod/v4";

import { runCommand } from "./commands/run.ts";
import { sweepCommand } from "./commands/sweep.ts";
import { trialCommand } from "./commands/trial.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_JSON_PATH = join(__dirname, "..", "..", "package.json");

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(PACKAGE_JSON_PATH, "utf-8")));

const main = defineCommand({
  meta: {
    name: "evrace",
    version: pkg.version,
    description: "Two-choice evidence accumulation and reaction time distributions",
  },
  subCommands: {
    run: runCommand,
    trial: trialCommand,
    sweep: sweepCommand,
  },
});

void runMain(main);
