import type {
  BusinessRatios,
  BusinessRecord,
  MarketingRatios,
  MarketingTotals,
} from "../types.js";

// ---------------------------------------------------------------------------
// KPI ratios
// ---------------------------------------------------------------------------
// Every ratio is computed from summed counters and yields 0 when its
// denominator is 0, so a day without spend still renders.
// ---------------------------------------------------------------------------

/** numerator / denominator, or 0 when the denominator is 0 or not finite */
export function safeDivide(numerator: number, denominator: number): number {
  if (denominator === 0 || !Number.isFinite(denominator)) return 0;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : 0;
}

export function emptyMarketingTotals(): MarketingTotals {
  return { impressions: 0, clicks: 0, spend: 0, attributed_revenue: 0 };
}

/** Add `source` counters into `target` in place */
export function addMarketingTotals(target: MarketingTotals, source: MarketingTotals): void {
  target.impressions += source.impressions;
  target.clicks += source.clicks;
  target.spend += source.spend;
  target.attributed_revenue += source.attributed_revenue;
}

export function computeMarketingRatios(totals: MarketingTotals): MarketingRatios {
  return {
    ctr: safeDivide(totals.clicks, totals.impressions),
    cpc: safeDivide(totals.spend, totals.clicks),
    cpm: safeDivide(totals.spend, totals.impressions) * 1000,
    roas: safeDivide(totals.attributed_revenue, totals.spend),
  };
}

export function computeBusinessRatios(
  business: BusinessRecord,
  attributedRevenue: number
): BusinessRatios {
  const gap = business.total_revenue - attributedRevenue;
  return {
    aov: safeDivide(business.total_revenue, business.orders),
    profit_margin: safeDivide(business.gross_profit, business.total_revenue),
    new_customer_rate: safeDivide(business.new_customers, business.orders),
    attribution_gap: gap,
    attribution_gap_pct: safeDivide(gap, business.total_revenue),
  };
}
