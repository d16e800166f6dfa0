// src/failure-policy.ts — Per-file action runner
// Rotators isolate failures, the reaper fails fast. The choice is declared by
// the caller instead of being implied by where a catch happens to sit.

import { FileActionError } from "./types.js";
import type { DatedFileEntry, FailurePolicy, FileAction, FileOutcome } from "./types.js";
import type { Logger } from "./logger.js";

export interface FileStep {
  action: FileAction;
  run: () => void;
}

/**
 * Apply `plan` to every file in order and collect one outcome per file.
 *
 * Under "isolate" a throwing step is logged with its stack, recorded as a
 * failed outcome and the loop continues. Under "fail-fast" the error is
 * rethrown as-is and the remaining files are not visited.
 */
export function applyToFiles(
  files: readonly DatedFileEntry[],
  plan: (file: DatedFileEntry) => FileStep,
  folder: string,
  policy: FailurePolicy,
  logger: Logger,
): FileOutcome[] {
  const outcomes: FileOutcome[] = [];

  for (const file of files) {
    const step = plan(file);
    try {
      step.run();
      outcomes.push({ ok: true, filename: file.filename, action: step.action });
    } catch (err: unknown) {
      if (policy === "fail-fast") throw err;
      const error = new FileActionError(file.filename, folder, step.action, err);
      logger.error(error.message, err);
      outcomes.push({ ok: false, filename: file.filename, action: step.action, error });
    }
  }

  return outcomes;
}

export function countFailures(outcomes: readonly FileOutcome[]): number {
  return outcomes.filter((o) => !o.ok).length;
}
