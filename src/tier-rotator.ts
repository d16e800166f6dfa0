// src/tier-rotator.ts — Tier Rotator
// One pass of one rule: scan the source tier, then promote or quarantine each file.

import { collectDatedFiles } from "./folder-scanner.js";
import { describeDatedFile } from "./dated-file.js";
import { moveToQuarantine, moveToTier } from "./file-actions.js";
import { applyToFiles, countFailures } from "./failure-policy.js";
import type { RotationContext, TierReport, TierRule } from "./types.js";

export function rotateTier(rule: TierRule, context: RotationContext): TierReport {
  const logger = context.logger.child("tier-rotator");
  const sourceFolder = context.layout[rule.source];
  const targetFolder = context.layout[rule.target];

  const ctx = { ...context, logger };

  logger.info(`Rotating ${rule.source} files ...`);
  logger.debug(`Promoting to ${rule.target} on ${rule.boundary}, minimum age ${rule.minAge} days`);
  const files = collectDatedFiles(sourceFolder, rule.minAge, ctx);

  const outcomes = applyToFiles(
    files,
    (file) => {
      logger.debug(describeDatedFile(file));
      if (rule.promote(file)) {
        return { action: "promote", run: () => moveToTier(file, sourceFolder, targetFolder, ctx) };
      }
      return { action: "quarantine", run: () => moveToQuarantine(file, sourceFolder, ctx) };
    },
    sourceFolder,
    rule.onFailure,
    logger,
  );

  const succeeded = outcomes.filter((o) => o.ok);
  return {
    tier: rule.source,
    promoted: succeeded.filter((o) => o.action === "promote").length,
    quarantined: succeeded.filter((o) => o.action === "quarantine").length,
    errors: countFailures(outcomes),
  };
}
