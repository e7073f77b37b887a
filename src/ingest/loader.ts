import type {
  BusinessRecord,
  LoadResult,
  MarketingRecord,
  Platform,
  RowRejection,
} from "../core/types.js";
import { SourceMissingError } from "../core/errors.js";
import { parseCsv } from "./csv.js";
import type { CsvRow } from "./csv.js";
import { parseDate } from "./dates.js";
import { parseNumeric } from "./numbers.js";
import {
  BUSINESS_COLUMNS,
  MARKETING_COLUMNS,
  resolveColumns,
} from "./columns.js";
import type { BusinessField, ColumnIndex, ColumnSpec, MarketingField } from "./columns.js";

// ---------------------------------------------------------------------------
// Source loaders
// ---------------------------------------------------------------------------
// Turn CSV text into clean records. A row that is cut short, has an
// unparseable date or a non-numeric value is rejected and tallied; a blank
// numeric cell is either coerced to 0 with a warning or rejected, per
// `coerceMissingNumeric`.
// ---------------------------------------------------------------------------

export interface LoadOptions {
  /** Coerce blank numeric cells to 0 (true) or reject the row (false) */
  coerceMissingNumeric: boolean;
  /** Extra date-fns patterns tried before the defaults */
  dateFormats: readonly string[];
  delimiter: string;
}

export const DEFAULT_LOAD_OPTIONS: LoadOptions = {
  coerceMissingNumeric: true,
  dateFormats: [],
  delimiter: ",",
};

type RowOutcome<F extends string> =
  | { ok: true; date: string; text: Map<F, string>; numbers: Map<F, number>; warnings: string[] }
  | { ok: false; reason: string };

function readRow<F extends string>(
  source: string,
  row: CsvRow,
  columns: ColumnIndex<F>,
  specs: ColumnSpec<F>[],
  dateField: F,
  options: LoadOptions
): RowOutcome<F> {
  if (row.error) {
    return { ok: false, reason: row.error };
  }
  // Absent trailing cells are not blanks: the row was cut short
  if (row.cells.length < columns.width) {
    return { ok: false, reason: `short row: ${row.cells.length} of ${columns.width} fields` };
  }

  const rawDate = columns.read(row.cells, dateField) ?? "";
  const date = parseDate(rawDate, options.dateFormats);
  if (date === null) {
    return { ok: false, reason: `unparseable date "${rawDate.trim()}"` };
  }

  const text = new Map<F, string>();
  const numbers = new Map<F, number>();
  const warnings: string[] = [];

  for (const spec of specs) {
    if (spec.field === dateField) continue;
    const raw = columns.read(row.cells, spec.field);

    if (!spec.numeric) {
      text.set(spec.field, (raw ?? "").trim());
      continue;
    }

    // Optional numeric column absent from the export altogether
    if (columns.indexOf(spec.field) < 0) {
      numbers.set(spec.field, 0);
      continue;
    }

    const parsed = parseNumeric(raw, spec.numeric);
    if (parsed.status === "ok") {
      numbers.set(spec.field, parsed.value);
    } else if (parsed.status === "invalid") {
      return { ok: false, reason: `${spec.field}: ${parsed.reason}` };
    } else if (options.coerceMissingNumeric) {
      numbers.set(spec.field, 0);
      warnings.push(`${source} line ${row.line}: missing ${spec.field}, coerced to 0`);
    } else {
      return { ok: false, reason: `${spec.field}: missing value` };
    }
  }

  return { ok: true, date, text, numbers, warnings };
}

function tableOf(source: string, text: string, options: LoadOptions) {
  const table = parseCsv(text, { delimiter: options.delimiter });
  if (!table) {
    throw new SourceMissingError(source, "no header row");
  }
  return table;
}

/**
 * Load one ad platform export. Every record is tagged with `platform`
 * regardless of any platform column in the file.
 */
export function loadMarketingSource(
  platform: Platform,
  text: string,
  options: LoadOptions = DEFAULT_LOAD_OPTIONS
): LoadResult<MarketingRecord> {
  const source = platform;
  const table = tableOf(source, text, options);
  const columns = resolveColumns<MarketingField>(source, table.header, MARKETING_COLUMNS);

  const records: MarketingRecord[] = [];
  const rejected: RowRejection[] = [];
  const warnings: string[] = [];

  for (const row of table.rows) {
    const outcome = readRow(source, row, columns, MARKETING_COLUMNS, "date", options);
    if (!outcome.ok) {
      rejected.push({ source, line: row.line, reason: outcome.reason });
      continue;
    }
    warnings.push(...outcome.warnings);
    const num = (f: MarketingField) => outcome.numbers.get(f) ?? 0;
    const str = (f: MarketingField) => outcome.text.get(f) ?? "";

    records.push({
      date: outcome.date,
      platform,
      tactic: str("tactic"),
      state: str("state"),
      campaign: str("campaign"),
      impressions: num("impressions"),
      clicks: num("clicks"),
      spend: num("spend"),
      attributed_revenue: num("attributed_revenue"),
    });
  }

  return { records, rejected, warnings };
}

/**
 * Load the daily business export. Dates are unique: a row repeating an
 * earlier date is rejected.
 */
export function loadBusinessSource(
  text: string,
  options: LoadOptions = DEFAULT_LOAD_OPTIONS,
  source = "business"
): LoadResult<BusinessRecord> {
  const table = tableOf(source, text, options);
  const columns = resolveColumns<BusinessField>(source, table.header, BUSINESS_COLUMNS);

  const records: BusinessRecord[] = [];
  const rejected: RowRejection[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  for (const row of table.rows) {
    const outcome = readRow(source, row, columns, BUSINESS_COLUMNS, "date", options);
    if (!outcome.ok) {
      rejected.push({ source, line: row.line, reason: outcome.reason });
      continue;
    }
    if (seen.has(outcome.date)) {
      rejected.push({ source, line: row.line, reason: `duplicate date ${outcome.date}` });
      continue;
    }
    seen.add(outcome.date);
    warnings.push(...outcome.warnings);
    const num = (f: BusinessField) => outcome.numbers.get(f) ?? 0;
    if (num("new_orders") > num("orders")) {
      warnings.push(`${source} line ${row.line}: new_orders exceeds orders`);
    }

    records.push({
      date: outcome.date,
      orders: num("orders"),
      new_orders: num("new_orders"),
      new_customers: num("new_customers"),
      total_revenue: num("total_revenue"),
      gross_profit: num("gross_profit"),
      cogs: num("cogs"),
    });
  }

  return { records, rejected, warnings };
}
