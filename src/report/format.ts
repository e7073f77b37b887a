// ---------------------------------------------------------------------------
// Display formatting
// ---------------------------------------------------------------------------

/** $1.2M, $3.4K, $950 */
export function formatCurrencyCompact(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? "-" : "";
  if (abs >= 1_000_000) return `${sign}$${(abs / 1_000_000).toFixed(1)}M`;
  if (abs >= 1_000) return `${sign}$${(abs / 1_000).toFixed(1)}K`;
  return `${sign}$${Math.round(abs).toLocaleString("en-US")}`;
}

/** $1,234.56 */
export function formatCurrency(value: number, fractionDigits = 2): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}$${Math.abs(value).toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  })}`;
}

/** 2.50x */
export function formatMultiplier(value: number): string {
  return `${value.toFixed(2)}x`;
}

/** Fraction to percent: 0.1234 → "12.3%" */
export function formatPercent(fraction: number, fractionDigits = 1): string {
  return `${(fraction * 100).toFixed(fractionDigits)}%`;
}

/** Signed percent change: 12.34 → "+12.3%" */
export function formatChange(percent: number): string {
  const sign = percent > 0 ? "+" : "";
  return `${sign}${percent.toFixed(1)}%`;
}
