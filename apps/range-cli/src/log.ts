export function logError(msg: string, err?: unknown): void {
  const ts = new Date().toISOString();
  const errStr = err instanceof Error ? err.message : String(err ?? "");
  console.error(`[${ts}] [range-cli] ERROR: ${msg}${errStr ? `: ${errStr}` : ""}`);
}
