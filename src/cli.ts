import { Command } from "commander";
import type { CliFlags } from "./lib/config";

export function buildProgram(): Command {
  return new Command()
    .name("disclosure-relay")
    .description(
      "Relay newly disclosed HackerOne Hacktivity reports to a Discord webhook."
    )
    .version("0.1.0")
    .option("--once", "run a single check and exit")
    .option(
      "--interval <seconds>",
      "seconds between checks (POLL_INTERVAL_SECONDS)"
    )
    .option("--limit <n>", "reports fetched per check (FETCH_LIMIT)")
    .option("--webhook <url>", "Discord webhook URL (DISCORD_WEBHOOK_URL)")
    .option(
      "--state-file <path>",
      "where the last seen report id is kept (STATE_FILE)"
    )
    .option(
      "--force",
      "send the current window once, ignoring the last seen id"
    )
    .option(
      "--dry-run",
      "log messages instead of sending them and keep the cursor in memory"
    )
    .option("--port <n>", "serve /health and /admin on this port (PORT)");
}

/** argv in the shape of process.argv (node binary, script, ...args). */
export function parseCliFlags(
  argv: readonly string[],
  program = buildProgram()
): CliFlags {
  program.parse([...argv]);
  return program.opts<CliFlags>();
}
