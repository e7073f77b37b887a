import type { PlatformPerformance, SummaryStats } from "../../pipeline/summary.js";
import type { Platform } from "../../core/types.js";
import { buildInsightSnapshot } from "../snapshot.js";
import type { ReadonlySnapshot } from "../snapshot.js";

export function platform(name: Platform, spend: number, roas: number): PlatformPerformance {
  return {
    platform: name,
    impressions: 10_000,
    clicks: 200,
    spend,
    attributed_revenue: spend * roas,
    roas,
    ctr: 0.02,
    cpc: spend / 200,
    cpm: spend / 10,
  };
}

export function summaryWith(overrides: Partial<SummaryStats> = {}): SummaryStats {
  const platforms = [platform("Google", 1000, 5), platform("Facebook", 1000, 1.5)];
  return {
    dateRange: { since: "2024-03-01", until: "2024-03-07" },
    days: 7,
    totals: {
      impressions: 20_000,
      clicks: 400,
      spend: 2000,
      attributed_revenue: 6500,
      total_revenue: 10_000,
      orders: 100,
      new_customers: 40,
      gross_profit: 4000,
    },
    overall_roas: 4,
    aov: 100,
    profit_margin: 0.4,
    attribution_gap: 1000,
    attribution_gap_pct: 0.1,
    platforms,
    topPlatform: platforms[0],
    bottomPlatform: platforms[1],
    deltas: null,
    ...overrides,
  };
}

export function snapshotWith(overrides: Partial<SummaryStats> = {}): ReadonlySnapshot {
  return buildInsightSnapshot({ combined: [], aggregates: [], summary: summaryWith(overrides) });
}
