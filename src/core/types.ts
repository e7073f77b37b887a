// ---------------------------------------------------------------------------
// Platforms
// ---------------------------------------------------------------------------

export const PLATFORMS = ["Facebook", "Google", "TikTok"] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((p) => p === value);
}

// ---------------------------------------------------------------------------
// Source records — one per ingested CSV row
// ---------------------------------------------------------------------------

/** One campaign-day-platform row from an ad platform export */
export interface MarketingRecord {
  /** ISO date (YYYY-MM-DD) */
  date: string;
  platform: Platform;
  /** e.g. ASC, Prospecting, Retargeting, Spark Ads */
  tactic: string;
  /** e.g. NY, CA */
  state: string;
  campaign: string;
  impressions: number;
  clicks: number;
  spend: number;
  attributed_revenue: number;
}

/** One calendar day of business results */
export interface BusinessRecord {
  /** ISO date (YYYY-MM-DD), unique across the business table */
  date: string;
  orders: number;
  new_orders: number;
  new_customers: number;
  total_revenue: number;
  /** May be negative */
  gross_profit: number;
  cogs: number;
}

// ---------------------------------------------------------------------------
// Derived rows
// ---------------------------------------------------------------------------

export interface MarketingTotals {
  impressions: number;
  clicks: number;
  spend: number;
  attributed_revenue: number;
}

/** Ratios are fractions (0.25 = 25%) and 0 when their denominator is 0 */
export interface MarketingRatios {
  ctr: number;
  cpc: number;
  cpm: number;
  roas: number;
}

export type GroupKey = "date" | "platform" | "tactic" | "state" | "campaign";

/**
 * Marketing records summed over a grouping key. Key fields that were not
 * part of the grouping are absent.
 */
export interface AggregatedMarketingRow extends MarketingTotals, MarketingRatios {
  date?: string;
  platform?: Platform;
  tactic?: string;
  state?: string;
  campaign?: string;
  /** Number of source records folded into this row */
  row_count: number;
}

export interface BusinessRatios {
  aov: number;
  profit_margin: number;
  new_customer_rate: number;
  attribution_gap: number;
  attribution_gap_pct: number;
}

/** One business date joined with that date's marketing totals */
export interface CombinedRow
  extends BusinessRecord,
    MarketingTotals,
    MarketingRatios,
    BusinessRatios {}

// ---------------------------------------------------------------------------
// Time ranges
// ---------------------------------------------------------------------------

export interface DateRange {
  since: string; // YYYY-MM-DD
  until: string; // YYYY-MM-DD
}

export interface ComparisonPeriods {
  current: DateRange;
  previous: DateRange;
}

// ---------------------------------------------------------------------------
// Ingestion report
// ---------------------------------------------------------------------------

export interface RowRejection {
  /** Source name, e.g. "Facebook" or "business" */
  source: string;
  /** 1-based line number in the source text */
  line: number;
  reason: string;
}

export interface LoadResult<T> {
  records: T[];
  rejected: RowRejection[];
  warnings: string[];
}

export interface DataQualityReport {
  rejectedRows: RowRejection[];
  warnings: string[];
  /** Marketing dates dropped by the join because no business row exists */
  unmatchedMarketingDates: string[];
  /** Clean record count per source */
  rowCounts: Record<string, number>;
}
