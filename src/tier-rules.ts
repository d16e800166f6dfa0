// src/tier-rules.ts — Promotion rules per tier
// A file moves up only when it sits on the next tier's calendar boundary;
// anything else is retired to quarantine.

import { isFirstDayOfMonth, isFirstDayOfWeek, isFirstDayOfYear } from "./dated-file.js";
import type { FailurePolicy, TierRule } from "./types.js";

export const DAILY_RULE: TierRule = {
  source: "daily",
  target: "weekly",
  minAge: 7,
  boundary: "first day of week or month",
  promote: (file) => isFirstDayOfWeek(file) || isFirstDayOfMonth(file),
  onFailure: "isolate",
};

export const WEEKLY_RULE: TierRule = {
  source: "weekly",
  target: "monthly",
  minAge: 31,
  boundary: "first day of month",
  promote: isFirstDayOfMonth,
  onFailure: "isolate",
};

export const MONTHLY_RULE: TierRule = {
  source: "monthly",
  target: "yearly",
  minAge: 365,
  boundary: "first day of year",
  promote: isFirstDayOfYear,
  onFailure: "isolate",
};

/** Applied in this order on every run. */
export const TIER_RULES: readonly TierRule[] = [DAILY_RULE, WEEKLY_RULE, MONTHLY_RULE];

export const QUARANTINE_RETENTION_DAYS = 31;

export const REAPER_FAILURE_POLICY: FailurePolicy = "fail-fast";
