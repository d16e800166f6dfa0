// src/config.ts — Config Resolver
// CLI args (mri) and environment, merged over defaults.

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { UsageError } from "./types.js";
import type { Verbosity } from "./logger.js";

export interface ParsedArgs {
  verbosity?: string;
  help: boolean;
}

export interface ResolvedConfig {
  /** Directory holding the tier folders. */
  rootDir: string;
  verbosity: Verbosity;
}

export const ROOT_ENV_VAR = "TIER_ROTATE_ROOT";

const KNOWN_FLAGS = new Set(["_", "verbosity", "v", "help", "h"]);

/** Directory the tool is installed in: the package root, one level above src/ or dist/. */
export function installDir(): string {
  return resolve(fileURLToPath(new URL("..", import.meta.url)));
}

const DEFAULTS: ResolvedConfig = {
  rootDir: installDir(),
  verbosity: 1,
};

/**
 * Parse CLI args using mri. Throws UsageError on unknown flags or positionals.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { v: "verbosity", h: "help" },
    boolean: ["help"],
    string: ["verbosity"],
  });

  const unknown = Object.keys(args).filter((key) => !KNOWN_FLAGS.has(key));
  if (unknown.length > 0) {
    throw new UsageError(`unrecognized arguments: ${unknown.map((k) => (k.length === 1 ? `-${k}` : `--${k}`)).join(" ")}`);
  }
  if (args._.length > 0) {
    throw new UsageError(`unrecognized arguments: ${args._.join(" ")}`);
  }

  const verbosity = lastValue(args.verbosity);
  return {
    verbosity: typeof verbosity === "string" ? verbosity : undefined,
    help: lastValue(args.help) === true,
  };
}

/** mri collects a repeated flag into an array; the last occurrence wins. */
function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value.at(-1) : value;
}

export function parseVerbosity(raw: string): Verbosity {
  switch (raw.trim()) {
    case "0":
      return 0;
    case "1":
      return 1;
    case "2":
      return 2;
    case "3":
      return 3;
    default:
      throw new UsageError(`argument -v/--verbosity: invalid choice: '${raw}' (choose from 0, 1, 2, 3)`);
  }
}

/**
 * Resolve config from CLI args, environment and defaults.
 * Merge order: defaults ← environment ← CLI args.
 */
export function resolveConfig(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const envRoot = env[ROOT_ENV_VAR];
  return {
    rootDir: envRoot ? resolve(envRoot) : DEFAULTS.rootDir,
    verbosity: args.verbosity !== undefined ? parseVerbosity(args.verbosity) : DEFAULTS.verbosity,
  };
}
