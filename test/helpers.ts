import { mkdtempSync, mkdirSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import dayjs from "dayjs";
import type { Dayjs } from "dayjs";
import { createDatedFile } from "../src/dated-file.js";
import { createLogger } from "../src/logger.js";
import { resolveLayout } from "../src/layout.js";
import type { Logger, LogLevel } from "../src/logger.js";
import type { DatedFileEntry, RotationContext, TierLayout, TierName } from "../src/types.js";

export function day(iso: string): Dayjs {
  return dayjs(iso).startOf("day");
}

export function datedEntry(filename: string, today: Dayjs): DatedFileEntry {
  const file = createDatedFile(filename, today);
  if (file.kind !== "dated") throw new Error(`expected "${filename}" to be dated`);
  return file;
}

export function captureLogger(level: LogLevel = "trace"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    sink: (line) => lines.push(line),
    clock: () => dayjs("2018-03-29T10:15:02.123"),
  });
  return { logger, lines };
}

export interface Sandbox {
  layout: TierLayout;
  context: (today: Dayjs) => RotationContext & { lines: string[] };
  tiers: (...names: TierName[]) => void;
  touch: (tier: TierName, ...filenames: string[]) => void;
  list: (tier: TierName) => string[];
  cleanup: () => void;
}

/** Temporary root directory holding the tier folders. */
export function createSandbox(): Sandbox {
  const root = mkdtempSync(join(tmpdir(), "tier-rotate-"));
  const layout = resolveLayout(root);

  return {
    layout,
    context: (today) => {
      const { logger, lines } = captureLogger();
      return { layout, today, logger, lines };
    },
    tiers: (...names) => {
      for (const name of names) mkdirSync(layout[name], { recursive: true });
    },
    touch: (tier, ...filenames) => {
      for (const filename of filenames) writeFileSync(join(layout[tier], filename), "backup");
    },
    list: (tier) => readdirSync(layout[tier]).sort(),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
