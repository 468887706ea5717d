import Table from "cli-table3";
import kleur from "kleur";

import type { ExperimentConfig } from "../config/defaults.ts";
import type {
  ActivationSnapshot,
  Category,
  ExperimentResult,
  SummaryStats,
  SweepPoint,
  TrialResult,
} from "../core/decision.ts";

export function isInteractive(): boolean {
  return !!process.stdout.isTTY;
}

const dim = (s: string) => kleur.dim(s);
const bold = (s: string) => kleur.bold(s);
const green = (s: string) => kleur.green(s);
const yellow = (s: string) => kleur.yellow(s);
const red = (s: string) => kleur.red(s);
const cyan = (s: string) => kleur.cyan(s);
const magenta = (s: string) => kleur.magenta(s);

const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

function makeTable(head: string[]) {
  return new Table({
    head,
    style: { head: ["dim"], border: ["dim"] },
    chars: TABLE_CHARS,
  });
}

function formatWinner(winner: Category): string {
  return winner === "left" ? cyan(winner) : magenta(winner);
}

function formatConfigLine(config: ExperimentConfig): string {
  return dim(
    `  threshold: ${config.threshold} | left: ${config.baseIncrement.left}` +
      ` | right: ${config.baseIncrement.right} | noise sd: ${config.noise.sd}` +
      ` | ceiling: ${config.stepCeiling}` +
      (config.seed !== null ? ` | seed: ${config.seed}` : ""),
  );
}

function summaryRows(summary: SummaryStats): [string, string][] {
  return [
    ["trials", String(summary.count)],
    ["mean RT", summary.mean.toFixed(2)],
    ["median RT", summary.median.toFixed(2)],
    ["std dev", summary.stddev.toFixed(2)],
    ["min", String(summary.min)],
    ["max", String(summary.max)],
  ];
}

export function formatExperiment(
  result: ExperimentResult,
  config: ExperimentConfig,
  options?: { includeReactionTimes?: boolean },
): string {
  const includeRts = options?.includeReactionTimes ?? false;

  if (!isInteractive()) {
    return JSON.stringify({
      summary: result.summary,
      failures: result.failures,
      ...(includeRts ? { reactionTimes: result.reactionTimes } : {}),
    });
  }

  const lines: string[] = [];
  lines.push(bold("  evrace — reaction time distribution\n"));
  lines.push(formatConfigLine(config));

  const table = makeTable(["statistic", "value"]);
  for (const row of summaryRows(result.summary)) table.push(row);
  lines.push(table.toString());

  if (result.failures.length > 0) {
    lines.push(
      yellow(`  ! ${result.failures.length} trials hit the step ceiling and were skipped`),
    );
  } else {
    lines.push(green(`  + All ${result.summary.count} trials reached threshold`));
  }

  if (includeRts) {
    lines.push("");
    lines.push(dim("  Reaction times:"));
    lines.push(`  ${result.reactionTimes.join(" ")}`);
  }
  return lines.join("\n");
}

export function formatTrace(
  result: TrialResult,
  trace: ActivationSnapshot[],
  config: ExperimentConfig,
): string {
  if (!isInteractive()) {
    return JSON.stringify({ ...result, trace });
  }

  const table = makeTable(["step", "left", "right"]);
  for (const s of trace) {
    const crossed = (v: number) =>
      v >= config.threshold ? green(v.toFixed(3)) : v.toFixed(3);
    table.push([String(s.step), crossed(s.left), crossed(s.right)]);
  }

  const lines: string[] = [];
  lines.push(bold("  evrace — single trial\n"));
  lines.push(formatConfigLine(config));
  lines.push(table.toString());
  lines.push(
    `  winner: ${formatWinner(result.winner)} ${dim("|")} reaction time: ${bold(
      String(result.reactionTime),
    )} steps`,
  );
  return lines.join("\n");
}

export function formatSweep(points: SweepPoint[]): string {
  if (!isInteractive()) {
    return JSON.stringify(
      points.map((p) => ({
        threshold: p.threshold,
        summary: p.summary,
        failures: p.failures.length,
      })),
    );
  }

  const table = makeTable(["threshold", "mean RT", "median", "std dev", "failed"]);
  for (const p of points) {
    table.push([
      String(p.threshold),
      p.summary.mean.toFixed(2),
      p.summary.median.toFixed(2),
      p.summary.stddev.toFixed(2),
      p.failures.length > 0 ? red(String(p.failures.length)) : dim("—"),
    ]);
  }

  return [bold("  evrace — threshold sweep\n"), table.toString()].join("\n");
}
