import { format, isValid, parseISO } from "date-fns";
import type { DateRange } from "@timepivot/shared";

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DD` in local time. */
export function formatDay(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function today(): string {
  return formatDay(new Date());
}

/** Parses a `YYYY-MM-DD` day to local midnight, or `undefined` when malformed. */
export function parseDay(value: string): Date | undefined {
  if (!DAY_PATTERN.test(value)) return undefined;
  const date = parseISO(value);
  if (!isValid(date) || formatDay(date) !== value) return undefined;
  return date;
}

/** A single bound names one day, so it is copied to the other side. No bounds stay open. */
export function completeRange(range: DateRange): DateRange {
  const start = range.start ?? range.stop;
  const stop = range.stop ?? range.start;
  return start === undefined || stop === undefined ? {} : { start, stop };
}

export function isDay(value: string): boolean {
  return parseDay(value) !== undefined;
}

/** Parses a full ISO-8601 timestamp, or `undefined` when malformed. */
export function parseTimestamp(value: string): Date | undefined {
  if (!value.includes("T")) return undefined;
  const date = parseISO(value);
  return isValid(date) ? date : undefined;
}
