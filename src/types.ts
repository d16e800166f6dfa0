// src/types.ts — Shared types for the tier rotation engine

import type { Dayjs } from "dayjs";
import type { Logger } from "./logger.js";

export const TOOL_VERSION = "1.0.0";

// ─── Tiers ───────────────────────────────────────────────────────────────────

export const TIER_NAMES = ["daily", "weekly", "monthly", "yearly", "quarantine"] as const;

export type TierName = (typeof TIER_NAMES)[number];

/** Tiers a rotator can read from. */
export type RotatingTier = "daily" | "weekly" | "monthly";

/** Absolute folder path for every tier, keyed by tier name. */
export type TierLayout = {
  root: string;
} & Record<TierName, string>;

// ─── Dated files ─────────────────────────────────────────────────────────────

export interface UndatedFile {
  kind: "undated";
  filename: string;
}

export interface DatedFileEntry {
  kind: "dated";
  filename: string;
  /** Calendar date, held as a UTC midnight. */
  date: Dayjs;
  /** Whole days between today and `date`, snapshot taken at construction. */
  age: number;
}

export type DatedFile = DatedFileEntry | UndatedFile;

// ─── Rules and policies ──────────────────────────────────────────────────────

/**
 * How a component reacts to a failing per-file action.
 * "isolate" logs and counts the failure, then moves on to the next file.
 * "fail-fast" rethrows the first failure to the caller.
 */
export type FailurePolicy = "isolate" | "fail-fast";

export interface TierRule {
  source: RotatingTier;
  target: Exclude<TierName, "daily" | "quarantine">;
  minAge: number;
  /** Human readable form of `promote`, used in debug output. */
  boundary: string;
  promote: (file: DatedFileEntry) => boolean;
  onFailure: FailurePolicy;
}

// ─── Run context and results ─────────────────────────────────────────────────

export interface RotationContext {
  layout: TierLayout;
  today: Dayjs;
  logger: Logger;
}

export type FileAction = "promote" | "quarantine" | "destroy";

export type FileOutcome =
  | { ok: true; filename: string; action: FileAction }
  | { ok: false; filename: string; action: FileAction; error: FileActionError };

export interface TierReport {
  tier: RotatingTier;
  promoted: number;
  quarantined: number;
  errors: number;
}

export interface RunSummary {
  tiers: TierReport[];
  reaped: number;
  errors: number;
  succeeded: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileActionError extends Error {
  constructor(
    public readonly filename: string,
    public readonly folder: string,
    public readonly action: FileAction,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${action} "${filename}" in "${folder}": ${reason}`);
    this.name = "FileActionError";
    if (cause !== undefined) this.cause = cause;
  }
}

export class QuarantineGuardError extends Error {
  constructor(
    public readonly folder: string,
    public readonly quarantine: string,
  ) {
    super(`Refusing to delete from "${folder}": only "${quarantine}" may be reaped`);
    this.name = "QuarantineGuardError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
