// ---------------------------------------------------------------------------
// Numeric cell coercion
// ---------------------------------------------------------------------------

export type NumericKind = "count" | "amount" | "signed_amount";

export type NumericParse =
  | { status: "ok"; value: number }
  | { status: "blank" }
  | { status: "invalid"; reason: string };

const STRIP = /[\s$€£,]/g;

/**
 * Parse an exported numeric cell. Currency symbols, thousands separators and
 * whitespace are ignored; "(12.50)" is read as -12.50.
 */
export function parseNumeric(raw: string | undefined, kind: NumericKind): NumericParse {
  if (raw === undefined) return { status: "blank" };
  let text = raw.trim();
  if (text === "" || /^(n\/?a|null|nan|-)$/i.test(text)) return { status: "blank" };

  let negative = false;
  const parenthesized = /^\((.*)\)$/.exec(text);
  if (parenthesized) {
    negative = true;
    text = parenthesized[1];
  }

  const cleaned = text.replace(STRIP, "");
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(cleaned)) {
    return { status: "invalid", reason: `"${raw}" is not a number` };
  }

  const value = negative ? -Number(cleaned) : Number(cleaned);
  if (!Number.isFinite(value)) {
    return { status: "invalid", reason: `"${raw}" is not a finite number` };
  }
  if (kind !== "signed_amount" && value < 0) {
    return { status: "invalid", reason: `"${raw}" is negative` };
  }
  if (kind === "count" && !Number.isInteger(value)) {
    return { status: "invalid", reason: `"${raw}" is not a whole number` };
  }
  // normalise -0
  return { status: "ok", value: value === 0 ? 0 : value };
}
