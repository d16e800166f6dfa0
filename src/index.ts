// src/index.ts — Library API
// runRotation() is the whole pipeline; the pieces are exported for callers that
// want to scan or rotate a single tier.

export { runRotation } from "./orchestrator.js";
export type { RunOptions } from "./orchestrator.js";
export { rotateTier } from "./tier-rotator.js";
export { reapQuarantine } from "./quarantine-reaper.js";
export { collectDatedFiles } from "./folder-scanner.js";
export { parseFiledate } from "./date-parser.js";
export {
  createDatedFile,
  calendarToday,
  describeDatedFile,
  isDated,
  isFirstDayOfWeek,
  isFirstDayOfMonth,
  isFirstDayOfYear,
} from "./dated-file.js";
export { moveToTier, moveToQuarantine, destroyQuarantined, quarantineName } from "./file-actions.js";
export { applyToFiles } from "./failure-policy.js";
export {
  TIER_RULES,
  DAILY_RULE,
  WEEKLY_RULE,
  MONTHLY_RULE,
  QUARANTINE_RETENTION_DAYS,
  REAPER_FAILURE_POLICY,
} from "./tier-rules.js";
export { resolveLayout, bootstrapFolders } from "./layout.js";
export { createLogger, verbosityToLevel } from "./logger.js";
export type { Logger, LogLevel, LogSink, Verbosity } from "./logger.js";

export type {
  TierName,
  RotatingTier,
  TierLayout,
  DatedFile,
  DatedFileEntry,
  UndatedFile,
  FailurePolicy,
  TierRule,
  RotationContext,
  FileAction,
  FileOutcome,
  TierReport,
  RunSummary,
} from "./types.js";
export { TIER_NAMES, TOOL_VERSION, FileActionError, QuarantineGuardError, UsageError } from "./types.js";
