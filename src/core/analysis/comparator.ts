import {
  addDays,
  differenceInCalendarDays,
  endOfQuarter,
  format,
  isValid,
  parseISO,
  startOfQuarter,
  subQuarters,
} from "date-fns";
import type { ComparisonPeriods, DateRange } from "../types.js";

// ---------------------------------------------------------------------------
// Date range utilities
// ---------------------------------------------------------------------------

export const ISO_DATE = "yyyy-MM-dd";

export type RangePreset = "last_7_days" | "last_30_days" | "last_quarter" | "all_time";

function toDate(iso: string): Date {
  const d = parseISO(iso);
  if (!isValid(d)) {
    throw new RangeError(`Invalid ISO date "${iso}"`);
  }
  return d;
}

export function formatIsoDate(d: Date): string {
  return format(d, ISO_DATE);
}

/** Inclusive number of calendar days in a range */
export function rangeLength(range: DateRange): number {
  return differenceInCalendarDays(toDate(range.until), toDate(range.since)) + 1;
}

export function isWithinRange(date: string, range: DateRange): boolean {
  // ISO dates compare correctly as strings
  return date >= range.since && date <= range.until;
}

/**
 * Pair a range with the immediately preceding range of equal length.
 *
 * Example: 2024-01-08..2024-01-14
 *   current:  2024-01-08 to 2024-01-14
 *   previous: 2024-01-01 to 2024-01-07
 */
export function buildComparisonPeriods(current: DateRange): ComparisonPeriods {
  const days = rangeLength(current);
  const previousEnd = addDays(toDate(current.since), -1);
  const previousStart = addDays(previousEnd, -(days - 1));

  return {
    current: { since: current.since, until: current.until },
    previous: {
      since: formatIsoDate(previousStart),
      until: formatIsoDate(previousEnd),
    },
  };
}

/**
 * Resolve a dashboard preset against the data's date domain.
 * "last_quarter" is the calendar quarter before the one containing `maxDate`.
 */
export function resolvePreset(
  preset: RangePreset,
  minDate: string,
  maxDate: string
): DateRange {
  const max = toDate(maxDate);

  switch (preset) {
    case "all_time":
      return { since: minDate, until: maxDate };
    case "last_7_days":
      return { since: formatIsoDate(addDays(max, -6)), until: maxDate };
    case "last_30_days":
      return { since: formatIsoDate(addDays(max, -29)), until: maxDate };
    case "last_quarter": {
      const previousQuarter = subQuarters(startOfQuarter(max), 1);
      return {
        since: formatIsoDate(previousQuarter),
        until: formatIsoDate(endOfQuarter(previousQuarter)),
      };
    }
  }
}
