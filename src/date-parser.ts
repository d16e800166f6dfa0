// src/date-parser.ts — Filename Date Parser
// Heuristics are tried in order; the first strict match wins.

import dayjs from "dayjs";
import type { Dayjs } from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const DATE_LENGTH = 10;

interface DateHeuristic {
  /** Returns the candidate substring, or undefined when the heuristic cannot apply. */
  extract: (filename: string) => string | undefined;
  format: string;
}

const HEURISTICS: readonly DateHeuristic[] = [
  {
    // "2018-03-22_backup.tar"
    extract: (filename) => filename.slice(0, DATE_LENGTH),
    format: "YYYY-MM-DD",
  },
  {
    // "1521766816_2018_03_23_backup.tar"
    extract: (filename) => {
      const idx = filename.indexOf("_");
      if (idx === -1) return undefined;
      return filename.slice(idx + 1, idx + 1 + DATE_LENGTH);
    },
    format: "YYYY_MM_DD",
  },
];

// Calendar dates are UTC midnights: no local offset, so no DST gap can shift them.

/**
 * Extract the calendar date embedded in a filename.
 * Returns undefined for undated names; never throws.
 */
export function parseFiledate(filename: string): Dayjs | undefined {
  for (const heuristic of HEURISTICS) {
    const candidate = heuristic.extract(filename);
    if (candidate === undefined || candidate.length !== DATE_LENGTH) continue;
    const parsed = dayjs.utc(candidate, heuristic.format, true);
    if (parsed.isValid()) return parsed;
  }
  return undefined;
}

/** Format a calendar date the way quarantine prefixes and debug lines expect. */
export function formatCalendarDate(date: Dayjs): string {
  return date.format("YYYY-MM-DD");
}

/** The local calendar day of `instant`, as a UTC midnight. */
export function toCalendarDate(instant: Dayjs): Dayjs {
  return dayjs.utc(instant.format("YYYY-MM-DD"), "YYYY-MM-DD", true);
}
