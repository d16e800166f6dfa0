// src/orchestrator.ts — Run Orchestrator
// bootstrap → daily → weekly → monthly → quarantine cleanup, one sequential pass.

import { bootstrapFolders } from "./layout.js";
import { rotateTier } from "./tier-rotator.js";
import { reapQuarantine } from "./quarantine-reaper.js";
import { TIER_RULES } from "./tier-rules.js";
import type { RotationContext, RunSummary, TierReport, TierRule } from "./types.js";

export interface RunOptions {
  rules?: readonly TierRule[];
}

/**
 * Run one full rotation. Never throws: an unexpected failure (including a
 * propagated reaper failure) is logged and counted as one error, and the
 * terminal status line is always written.
 */
export function runRotation(context: RotationContext, options: RunOptions = {}): RunSummary {
  const logger = context.logger.child("orchestrator");
  const rules = options.rules ?? TIER_RULES;
  const tiers: TierReport[] = [];
  let reaped = 0;
  let errors = 0;

  try {
    logger.info("File rotation started");
    logger.info(`root: ${context.layout.root}`);

    bootstrapFolders(context.layout, logger);

    for (const rule of rules) {
      const report = rotateTier(rule, context);
      tiers.push(report);
      errors += report.errors;
    }

    reapQuarantine(context, () => {
      reaped += 1;
    });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(msg, err);
    errors += 1;
  } finally {
    logger.info("File rotation completed " + (errors <= 0 ? "successfully" : "with errors"));
  }

  return { tiers, reaped, errors, succeeded: errors <= 0 };
}
