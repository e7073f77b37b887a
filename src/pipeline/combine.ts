import type {
  AggregatedMarketingRow,
  BusinessRecord,
  CombinedRow,
  MarketingTotals,
} from "../core/types.js";
import {
  addMarketingTotals,
  computeBusinessRatios,
  computeMarketingRatios,
  emptyMarketingTotals,
} from "../core/analysis/ratios.js";

// ---------------------------------------------------------------------------
// Business ⟕ marketing join
// ---------------------------------------------------------------------------
// Left outer join on date with the business table driving: every business
// date appears once, marketing dates without a business row are dropped.
// Aggregates may be per date or per date × platform; they are summed per
// date through a lookup map before ratios are derived.
// ---------------------------------------------------------------------------

function totalsByDate(
  aggregates: readonly AggregatedMarketingRow[]
): Map<string, MarketingTotals> {
  const byDate = new Map<string, MarketingTotals>();
  for (const row of aggregates) {
    if (row.date === undefined) {
      throw new RangeError("combine needs marketing aggregates grouped by date");
    }
    let totals = byDate.get(row.date);
    if (!totals) {
      totals = emptyMarketingTotals();
      byDate.set(row.date, totals);
    }
    addMarketingTotals(totals, row);
  }
  return byDate;
}

export function combine(
  businessRows: readonly BusinessRecord[],
  marketingAggregates: readonly AggregatedMarketingRow[]
): CombinedRow[] {
  const marketing = totalsByDate(marketingAggregates);

  const rows = businessRows.map((business): CombinedRow => {
    const totals = marketing.get(business.date) ?? emptyMarketingTotals();
    return {
      date: business.date,
      orders: business.orders,
      new_orders: business.new_orders,
      new_customers: business.new_customers,
      total_revenue: business.total_revenue,
      gross_profit: business.gross_profit,
      cogs: business.cogs,
      impressions: totals.impressions,
      clicks: totals.clicks,
      spend: totals.spend,
      attributed_revenue: totals.attributed_revenue,
      ...computeMarketingRatios(totals),
      ...computeBusinessRatios(business, totals.attributed_revenue),
    };
  });

  return rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Marketing dates the join dropped, ascending */
export function findUnmatchedMarketingDates(
  businessRows: readonly BusinessRecord[],
  marketingAggregates: readonly AggregatedMarketingRow[]
): string[] {
  const businessDates = new Set(businessRows.map((r) => r.date));
  const unmatched = new Set<string>();
  for (const row of marketingAggregates) {
    if (row.date !== undefined && !businessDates.has(row.date)) {
      unmatched.add(row.date);
    }
  }
  return [...unmatched].sort();
}
