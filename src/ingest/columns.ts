import { ParseError } from "../core/errors.js";
import type { NumericKind } from "./numbers.js";

// ---------------------------------------------------------------------------
// Column schemas
// ---------------------------------------------------------------------------
// Headers are matched after lower-casing, trimming and collapsing
// whitespace/underscores, so "Attributed Revenue", "attributed_revenue" and
// "attributed  revenue" all land on the same field.
// ---------------------------------------------------------------------------

export interface ColumnSpec<F extends string> {
  field: F;
  aliases: string[];
  required: boolean;
  /** Numeric parsing rule; absent for text columns */
  numeric?: NumericKind;
}

export type MarketingField =
  | "date"
  | "tactic"
  | "state"
  | "campaign"
  | "impressions"
  | "clicks"
  | "spend"
  | "attributed_revenue";

export type BusinessField =
  | "date"
  | "orders"
  | "new_orders"
  | "new_customers"
  | "total_revenue"
  | "gross_profit"
  | "cogs";

export const MARKETING_COLUMNS: ColumnSpec<MarketingField>[] = [
  { field: "date", aliases: ["date", "day", "reporting date"], required: true },
  { field: "tactic", aliases: ["tactic", "ad type"], required: false },
  { field: "state", aliases: ["state", "region"], required: false },
  { field: "campaign", aliases: ["campaign", "campaign name", "campaign id"], required: false },
  { field: "impressions", aliases: ["impression", "impressions"], required: true, numeric: "count" },
  { field: "clicks", aliases: ["clicks", "click", "link clicks"], required: true, numeric: "count" },
  { field: "spend", aliases: ["spend", "cost", "amount spent"], required: true, numeric: "amount" },
  {
    field: "attributed_revenue",
    aliases: ["attributed revenue", "attributed_revenue", "conversion value", "revenue"],
    required: true,
    numeric: "amount",
  },
];

export const BUSINESS_COLUMNS: ColumnSpec<BusinessField>[] = [
  { field: "date", aliases: ["date", "day"], required: true },
  { field: "orders", aliases: ["# of orders", "orders"], required: true, numeric: "count" },
  { field: "new_orders", aliases: ["# of new orders", "new orders"], required: true, numeric: "count" },
  { field: "new_customers", aliases: ["new customers"], required: true, numeric: "count" },
  { field: "total_revenue", aliases: ["total revenue", "revenue"], required: true, numeric: "amount" },
  { field: "gross_profit", aliases: ["gross profit"], required: true, numeric: "signed_amount" },
  { field: "cogs", aliases: ["cogs", "cost of goods sold"], required: false, numeric: "amount" },
];

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_]+/g, " ");
}

export interface ColumnIndex<F extends string> {
  /** Number of header columns */
  width: number;
  /** Column position of a field, or -1 when an optional column is absent */
  indexOf(field: F): number;
  /** Cell text for a field, undefined when the column is absent or the row is short */
  read(cells: string[], field: F): string | undefined;
}

/**
 * Map each field to its column index. Throws ParseError listing every
 * missing required column.
 */
export function resolveColumns<F extends string>(
  source: string,
  header: string[],
  specs: ColumnSpec<F>[]
): ColumnIndex<F> {
  const positions = new Map<string, number>();
  header.forEach((h, i) => {
    const key = normalizeHeader(h);
    if (!positions.has(key)) positions.set(key, i);
  });

  const resolved = new Map<F, number>();
  const missing: string[] = [];

  for (const spec of specs) {
    const index = spec.aliases
      .map((a) => positions.get(normalizeHeader(a)))
      .find((i): i is number => i !== undefined);
    if (index === undefined && spec.required) {
      missing.push(spec.field);
    }
    resolved.set(spec.field, index ?? -1);
  }

  if (missing.length > 0) {
    throw new ParseError(
      source,
      `missing required column${missing.length > 1 ? "s" : ""} ${missing.join(", ")} (found: ${header.join(", ")})`
    );
  }

  const indexOf = (field: F): number => resolved.get(field) ?? -1;
  return {
    width: header.length,
    indexOf,
    read(cells, field) {
      const i = indexOf(field);
      return i >= 0 ? cells[i] : undefined;
    },
  };
}
