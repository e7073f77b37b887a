import { format, isValid, parse, parseISO } from "date-fns";
import { ISO_DATE } from "../core/analysis/comparator.js";

// ---------------------------------------------------------------------------
// Date parsing
// ---------------------------------------------------------------------------
// Exports arrive with ISO dates, US slash dates, European dotted dates or
// spelled-out months depending on the platform and the user's locale.
// Slash dates are read month-first.
// ---------------------------------------------------------------------------

export const DEFAULT_DATE_FORMATS: readonly string[] = [
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "M/d/yyyy",
  "M/d/yy",
  "d.M.yyyy",
  "d-MMM-yyyy",
  "d MMM yyyy",
  "MMM d, yyyy",
  "MMMM d, yyyy",
];

// Anchor for patterns without a time component; only the date is kept.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a date cell into YYYY-MM-DD, or null when no format matches.
 * ISO date-times ("2024-01-05T13:00:00Z") keep their calendar date.
 */
export function parseDate(
  raw: string,
  extraFormats: readonly string[] = []
): string | null {
  const value = raw.trim();
  if (value === "") return null;

  const isoDateTime = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/.exec(value);
  if (isoDateTime) {
    const d = parseISO(isoDateTime[1]);
    return isValid(d) ? format(d, ISO_DATE) : null;
  }

  for (const pattern of [...extraFormats, ...DEFAULT_DATE_FORMATS]) {
    const d = parse(value, pattern, REFERENCE_DATE);
    if (isValid(d) && d.getFullYear() >= 1900) {
      return format(d, ISO_DATE);
    }
  }
  return null;
}
