// src/file-actions.ts — Filesystem side effects on dated files
// The in-memory DatedFile is never modified; only the backing entry moves.

import { renameSync, unlinkSync } from "node:fs";
import { join, resolve } from "node:path";
import { formatCalendarDate } from "./date-parser.js";
import { QuarantineGuardError } from "./types.js";
import type { DatedFileEntry, RotationContext } from "./types.js";

export const QUARANTINE_SEPARATOR = "_____";

/** `<today>_____<filename>`: the prefix lets the reaper age the entry by quarantine date. */
export function quarantineName(filename: string, today: RotationContext["today"]): string {
  return `${formatCalendarDate(today)}${QUARANTINE_SEPARATOR}${filename}`;
}

/** Move a file to the next tier, keeping its name. Returns the new path. */
export function moveToTier(
  file: DatedFileEntry,
  sourceFolder: string,
  targetFolder: string,
  context: Pick<RotationContext, "logger">,
): string {
  const target = join(targetFolder, file.filename);
  context.logger.info(`Moving file "${file.filename}" from "${sourceFolder}" to "${targetFolder}"`);
  renameSync(join(sourceFolder, file.filename), target);
  return target;
}

/** Move a file into quarantine under a name prefixed with today's date. Returns the new path. */
export function moveToQuarantine(
  file: DatedFileEntry,
  sourceFolder: string,
  context: RotationContext,
): string {
  const target = join(context.layout.quarantine, quarantineName(file.filename, context.today));
  context.logger.info(`Moving file "${file.filename}" from "${sourceFolder}" to quarantine`);
  renameSync(join(sourceFolder, file.filename), target);
  return target;
}

/**
 * Permanently delete a quarantined file.
 * Throws QuarantineGuardError when `folder` is not the quarantine folder.
 */
export function destroyQuarantined(
  file: DatedFileEntry,
  folder: string,
  context: Pick<RotationContext, "layout" | "logger">,
): void {
  const quarantine = context.layout.quarantine;
  if (resolve(folder) !== resolve(quarantine)) {
    throw new QuarantineGuardError(folder, quarantine);
  }
  context.logger.info(`Erasing file "${file.filename}" from "${folder}"`);
  unlinkSync(join(folder, file.filename));
}
