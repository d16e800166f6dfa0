#!/usr/bin/env node
// CLI entry point for tier-rotate

import { exitCodeFor, loadConfig } from "../cli.js";
import { createLogger, verbosityToLevel } from "../logger.js";
import { resolveLayout } from "../layout.js";
import { calendarToday } from "../dated-file.js";
import { runRotation } from "../orchestrator.js";

async function main(): Promise<number> {
  const config = await loadConfig(process.argv.slice(2));
  if (typeof config === "number") return config;

  const logger = createLogger({ level: verbosityToLevel(config.verbosity) });
  const summary = runRotation({
    layout: resolveLayout(config.rootDir),
    today: calendarToday(),
    logger,
  });

  return exitCodeFor(summary);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Fatal error: ${msg}\n`);
    process.exit(1);
  },
);
