// src/folder-scanner.ts — Folder Scanner

import { existsSync, readdirSync } from "node:fs";
import { createDatedFile, describeDatedFile } from "./dated-file.js";
import type { DatedFileEntry, RotationContext } from "./types.js";

export type ScanContext = Pick<RotationContext, "today" | "logger">;

/**
 * List `folder` (non-recursive, every entry regardless of type) and return the
 * dated entries whose age is at least `minAge` days, in listing order.
 * A missing folder yields nothing.
 */
export function collectDatedFiles(
  folder: string,
  minAge: number,
  context: ScanContext,
): DatedFileEntry[] {
  const { today, logger } = context;

  if (!existsSync(folder)) {
    logger.debug(`Folder "${folder}" does not exist, nothing to scan`);
    return [];
  }

  const files: DatedFileEntry[] = [];
  for (const filename of readdirSync(folder)) {
    const file = createDatedFile(filename, today);
    if (file.kind === "undated") {
      logger.trace(`Skipping undated entry "${filename}"`);
      continue;
    }
    if (file.age < minAge) {
      logger.trace(`Skipping ${describeDatedFile(file)}: younger than ${minAge} days`);
      continue;
    }
    files.push(file);
  }
  return files;
}
