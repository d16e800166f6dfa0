// src/dated-file.ts — Dated File entity
// A filename classified as dated (date + age snapshot) or undated.

import dayjs from "dayjs";
import type { Dayjs } from "dayjs";
import { parseFiledate, formatCalendarDate, toCalendarDate } from "./date-parser.js";
import type { DatedFile, DatedFileEntry } from "./types.js";

const MONDAY = 1;

/** Today's local calendar date. */
export function calendarToday(): Dayjs {
  return toCalendarDate(dayjs());
}

/**
 * Classify a filename. The age is computed once against `today`
 * and never re-derived afterwards.
 */
export function createDatedFile(filename: string, today: Dayjs = calendarToday()): DatedFile {
  const date = parseFiledate(filename);
  if (!date) return { kind: "undated", filename };
  return {
    kind: "dated",
    filename,
    date,
    age: toCalendarDate(today).diff(date, "day"),
  };
}

export function isDated(file: DatedFile): file is DatedFileEntry {
  return file.kind === "dated";
}

export function isFirstDayOfWeek(file: DatedFileEntry): boolean {
  return file.date.day() === MONDAY;
}

export function isFirstDayOfMonth(file: DatedFileEntry): boolean {
  return file.date.date() === 1;
}

export function isFirstDayOfYear(file: DatedFileEntry): boolean {
  return file.date.month() === 0 && file.date.date() === 1;
}

/**
 * Debug rendering, e.g.
 * `2018-03-26_db.tar [dated:2018-03-26, age=3, fdow=1, fdom=0, fdoy=0]`.
 */
export function describeDatedFile(file: DatedFile): string {
  if (file.kind === "undated") return file.filename;
  const flag = (value: boolean) => (value ? 1 : 0);
  return (
    `${file.filename} [dated:${formatCalendarDate(file.date)}, age=${file.age}, ` +
    `fdow=${flag(isFirstDayOfWeek(file))}, fdom=${flag(isFirstDayOfMonth(file))}, ` +
    `fdoy=${flag(isFirstDayOfYear(file))}]`
  );
}
