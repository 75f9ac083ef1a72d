import {
  RangeParseError,
  STARTING_HAND_COMBINATIONS,
  comboCount,
  parseRange,
  rangeLabels
} from "@holdem-toolkit/holdem-range";

import type { RangeCliConfig } from "./config.js";
import { logError } from "./log.js";

export function usage(): string {
  return [
    "Usage:",
    "  range-cli [--combos] [--list] <range>",
    "",
    "Examples:",
    '  range-cli "88+, AJo+, ATs+"',
    "  range-cli --combos JJ+, AK"
  ].join("\n");
}

/** Runs one invocation and returns the process exit code. */
export function runCli(args: readonly string[], config: RangeCliConfig, out: (line: string) => void): number {
  if (args.includes("--help") || args.includes("-h")) {
    out(usage());
    return 0;
  }

  const showCombos = config.showCombos || args.includes("--combos");
  const showList = args.includes("--list");
  const rangeText = args.filter((a) => !a.startsWith("--")).join(" ").trim() || config.defaultRange;

  if (!rangeText) {
    out(usage());
    return 0;
  }

  try {
    const range = parseRange(rangeText);
    const combos = comboCount(range);
    const percent = (combos / STARTING_HAND_COMBINATIONS) * 100;

    out(`Range percent: ${percent.toFixed(config.precision)}%`);
    if (showCombos) out(`Combos: ${combos}/${STARTING_HAND_COMBINATIONS}`);
    if (showList) out(`Hands: ${rangeLabels(range).join(" ")}`);
    return 0;
  } catch (err) {
    if (err instanceof RangeParseError) {
      logError(`Invalid range ${JSON.stringify(rangeText)}`, err);
      return 1;
    }
    throw err;
  }
}
