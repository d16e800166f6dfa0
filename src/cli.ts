// src/cli.ts — CLI helpers: help text, argument loading and exit status

import { TOOL_VERSION, UsageError } from "./types.js";
import type { RunSummary } from "./types.js";
import { parseCliArgs, resolveConfig, ROOT_ENV_VAR } from "./config.js";
import type { ResolvedConfig } from "./config.js";

export const EXIT_OK = 0;
export const EXIT_ERRORS = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `
tier-rotate v${TOOL_VERSION}

Rotate dated backup files through daily, weekly, monthly and yearly folders.

Usage:
  tier-rotate [-v N]

Options:
  --verbosity, -v      Verbosity level: 0 (warnings), 1 (info), 2 (debug),
                       3 (debug + every scanned entry). Default: 1
  --help, -h           Show this help text

Environment Variables:
  ${ROOT_ENV_VAR}     Directory holding daily/, weekly/, monthly/, yearly/
                       and quarantine/ (default: install directory)

Exit status:
  0 when every file was handled, 1 when any error was logged, 2 on bad arguments.
`.trim();

/** Resolved config, or the exit status when the run should stop here. */
export async function loadConfig(argv: string[]): Promise<ResolvedConfig | number> {
  try {
    const args = await parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(HELP_TEXT + "\n");
      return EXIT_OK;
    }
    return resolveConfig(args);
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      process.stderr.write(`tier-rotate: error: ${err.message}\n\n${HELP_TEXT}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }
}

/** 0 when the run logged no error, 1 otherwise. */
export function exitCodeFor(summary: RunSummary): number {
  return summary.succeeded ? EXIT_OK : EXIT_ERRORS;
}
