export interface RangeCliConfig {
  /** Decimal places of the printed percentage */
  precision: number;
  /** Range measured when no argument is given; empty means print usage */
  defaultRange: string;
  /** Also print the combination count */
  showCombos: boolean;
}

const MAX_PRECISION = 6;

function envStr(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return (env[key] ?? "").trim() || fallback;
}

function envBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes";
}

function envInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const v = (env[key] ?? "").trim();
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RangeCliConfig {
  const precision = envInt(env, "RANGE_CLI_PRECISION", 2);
  if (precision < 0 || precision > MAX_PRECISION) {
    throw new Error(`RANGE_CLI_PRECISION must be between 0 and ${MAX_PRECISION}`);
  }

  return {
    precision,
    defaultRange: envStr(env, "RANGE_CLI_DEFAULT_RANGE", ""),
    showCombos: envBool(env, "RANGE_CLI_SHOW_COMBOS", false)
  };
}
