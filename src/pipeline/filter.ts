import type {
  AggregatedMarketingRow,
  BusinessRecord,
  CombinedRow,
  DateRange,
  MarketingRecord,
  Platform,
} from "../core/types.js";
import { isWithinRange } from "../core/analysis/comparator.js";
import { aggregateMarketing, DEFAULT_GROUP_KEYS } from "./aggregate.js";
import { combine } from "./combine.js";

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------
// Summed ratios cannot be split back into platforms, so a platform
// restriction re-runs aggregation on the raw records before the join.
// ---------------------------------------------------------------------------

export interface FilterCriteria {
  /** Inclusive bounds; omitted means all dates */
  dateRange?: DateRange;
  /** Platforms to keep; omitted means all platforms */
  platforms?: readonly Platform[];
}

export interface FilterInput {
  marketingRecords: readonly MarketingRecord[];
  businessRecords: readonly BusinessRecord[];
}

export interface FilteredView {
  combined: CombinedRow[];
  /** Date × platform aggregates restricted to the criteria */
  aggregates: AggregatedMarketingRow[];
  /** Marketing records that passed the platform and date criteria */
  marketingRecords: MarketingRecord[];
}

/** Inclusive date filter over any date-keyed rows */
export function filterByDateRange<T extends { date?: string }>(
  rows: readonly T[],
  range: DateRange | undefined
): T[] {
  if (!range) return [...rows];
  return rows.filter((r) => r.date !== undefined && isWithinRange(r.date, range));
}

export function filter(input: FilterInput, criteria: FilterCriteria = {}): FilteredView {
  const platforms = criteria.platforms;
  const marketingRecords = filterByDateRange(
    platforms
      ? input.marketingRecords.filter((r) => platforms.includes(r.platform))
      : input.marketingRecords,
    criteria.dateRange
  );
  const businessRecords = filterByDateRange(input.businessRecords, criteria.dateRange);

  const aggregates = aggregateMarketing(marketingRecords, DEFAULT_GROUP_KEYS);
  return {
    combined: combine(businessRecords, aggregates),
    aggregates,
    marketingRecords,
  };
}
