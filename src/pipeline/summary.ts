import type { CombinedRow, DateRange, MarketingTotals, Platform } from "../core/types.js";
import { computeMarketingRatios, safeDivide } from "../core/analysis/ratios.js";
import { buildComparisonPeriods } from "../core/analysis/comparator.js";
import { percentChange } from "../core/analysis/change.js";
import { aggregateMarketing } from "./aggregate.js";
import { filter } from "./filter.js";
import type { FilterCriteria, FilterInput } from "./filter.js";

// ---------------------------------------------------------------------------
// Summary statistics
// ---------------------------------------------------------------------------
// Totals, headline ratios, per-platform performance and period-over-period
// deltas for one filtered window. This is what KPI cards and the insight
// layer consume.
// ---------------------------------------------------------------------------

export interface PlatformPerformance extends MarketingTotals {
  platform: Platform;
  roas: number;
  ctr: number;
  cpc: number;
  cpm: number;
}

export interface SummaryTotals extends MarketingTotals {
  total_revenue: number;
  orders: number;
  new_customers: number;
  gross_profit: number;
}

export interface PeriodDeltas {
  previous: DateRange;
  /** Percent changes against the previous window */
  spend: number;
  attributed_revenue: number;
  total_revenue: number;
  orders: number;
  roas: number;
}

export interface SummaryStats {
  /** Dates actually covered by the window's business rows; null when empty */
  dateRange: DateRange | null;
  days: number;
  totals: SummaryTotals;
  overall_roas: number;
  aov: number;
  profit_margin: number;
  /** total_revenue − attributed_revenue */
  attribution_gap: number;
  /** attribution_gap / total_revenue */
  attribution_gap_pct: number;
  platforms: PlatformPerformance[];
  /** Highest ROAS among platforms with spend */
  topPlatform: PlatformPerformance | null;
  /** Lowest ROAS among platforms with spend */
  bottomPlatform: PlatformPerformance | null;
  /** Null when the preceding window has no business rows */
  deltas: PeriodDeltas | null;
}

export function sumCombined(rows: readonly CombinedRow[]): SummaryTotals {
  const totals: SummaryTotals = {
    impressions: 0,
    clicks: 0,
    spend: 0,
    attributed_revenue: 0,
    total_revenue: 0,
    orders: 0,
    new_customers: 0,
    gross_profit: 0,
  };
  for (const row of rows) {
    totals.impressions += row.impressions;
    totals.clicks += row.clicks;
    totals.spend += row.spend;
    totals.attributed_revenue += row.attributed_revenue;
    totals.total_revenue += row.total_revenue;
    totals.orders += row.orders;
    totals.new_customers += row.new_customers;
    totals.gross_profit += row.gross_profit;
  }
  return totals;
}

export function summarize(input: FilterInput, criteria: FilterCriteria = {}): SummaryStats {
  const view = filter(input, criteria);
  const combined = view.combined;
  const totals = sumCombined(combined);

  // Only marketing on business days counts, matching the joined totals
  const businessDates = new Set(combined.map((r) => r.date));
  const platforms: PlatformPerformance[] = aggregateMarketing(
    view.marketingRecords.filter((r) => businessDates.has(r.date)),
    ["platform"]
  ).flatMap((row) =>
    row.platform === undefined
      ? []
      : [
          {
            platform: row.platform,
            impressions: row.impressions,
            clicks: row.clicks,
            spend: row.spend,
            attributed_revenue: row.attributed_revenue,
            ...computeMarketingRatios(row),
          },
        ]
  );

  const ranked = platforms
    .filter((p) => p.spend > 0)
    .sort((a, b) => b.roas - a.roas);

  const dateRange =
    combined.length > 0
      ? { since: combined[0].date, until: combined[combined.length - 1].date }
      : null;
  const attributionGap = totals.total_revenue - totals.attributed_revenue;

  return {
    dateRange,
    days: combined.length,
    totals,
    overall_roas: safeDivide(totals.attributed_revenue, totals.spend),
    aov: safeDivide(totals.total_revenue, totals.orders),
    profit_margin: safeDivide(totals.gross_profit, totals.total_revenue),
    attribution_gap: attributionGap,
    attribution_gap_pct: safeDivide(attributionGap, totals.total_revenue),
    platforms,
    topPlatform: ranked[0] ?? null,
    bottomPlatform: ranked[ranked.length - 1] ?? null,
    deltas: computeDeltas(input, criteria, totals, dateRange),
  };
}

function computeDeltas(
  input: FilterInput,
  criteria: FilterCriteria,
  current: SummaryTotals,
  covered: DateRange | null
): PeriodDeltas | null {
  const window = criteria.dateRange ?? covered;
  if (!window) return null;

  const { previous } = buildComparisonPeriods(window);
  const prior = filter(input, { dateRange: previous, platforms: criteria.platforms });
  if (prior.combined.length === 0) return null;

  const before = sumCombined(prior.combined);
  return {
    previous,
    spend: percentChange(current.spend, before.spend),
    attributed_revenue: percentChange(current.attributed_revenue, before.attributed_revenue),
    total_revenue: percentChange(current.total_revenue, before.total_revenue),
    orders: percentChange(current.orders, before.orders),
    roas: percentChange(
      safeDivide(current.attributed_revenue, current.spend),
      safeDivide(before.attributed_revenue, before.spend)
    ),
  };
}
