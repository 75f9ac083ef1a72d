import "dotenv/config";
import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { logError } from "./log.js";

function main(): void {
  const config = loadConfig();
  process.exitCode = runCli(process.argv.slice(2), config, (line) => console.log(line));
}

try {
  main();
} catch (err) {
  logError("range-cli failed", err);
  process.exitCode = 1;
}
