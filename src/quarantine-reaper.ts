// src/quarantine-reaper.ts — Quarantine Reaper
// Deletion is irreversible, so the first failure stops the cleanup and propagates.

import { collectDatedFiles } from "./folder-scanner.js";
import { destroyQuarantined } from "./file-actions.js";
import { applyToFiles } from "./failure-policy.js";
import { QUARANTINE_RETENTION_DAYS, REAPER_FAILURE_POLICY } from "./tier-rules.js";
import type { RotationContext } from "./types.js";

/**
 * Delete quarantined files older than the retention age. Returns how many were deleted.
 * `onReaped` fires after each deletion, so a caller still sees the files removed
 * before a failure aborted the cleanup.
 */
export function reapQuarantine(
  context: RotationContext,
  onReaped?: (filename: string) => void,
): number {
  const logger = context.logger.child("quarantine-reaper");
  const ctx = { ...context, logger };
  const folder = context.layout.quarantine;

  logger.info("Cleaning up quarantine ...");
  const files = collectDatedFiles(folder, QUARANTINE_RETENTION_DAYS, ctx);
  const outcomes = applyToFiles(
    files,
    (file) => ({
      action: "destroy",
      run: () => {
        destroyQuarantined(file, folder, ctx);
        onReaped?.(file.filename);
      },
    }),
    folder,
    REAPER_FAILURE_POLICY,
    logger,
  );
  return outcomes.length;
}
