import type {
  AggregatedMarketingRow,
  GroupKey,
  MarketingRecord,
  MarketingTotals,
} from "../core/types.js";
import {
  addMarketingTotals,
  computeMarketingRatios,
  emptyMarketingTotals,
} from "../core/analysis/ratios.js";

// ---------------------------------------------------------------------------
// Marketing aggregation
// ---------------------------------------------------------------------------
// Single-pass fold into an accumulator keyed by the grouping tuple. Ratios
// are derived from the summed counters afterwards: the CTR of a group is
// total clicks / total impressions, never the mean of per-row CTRs.
// ---------------------------------------------------------------------------

export const DEFAULT_GROUP_KEYS: readonly GroupKey[] = ["date", "platform"];

const KEY_ORDER: readonly GroupKey[] = ["date", "platform", "tactic", "state", "campaign"];

interface Accumulator {
  key: Pick<MarketingRecord, GroupKey>;
  totals: MarketingTotals;
  count: number;
}

function tupleKey(record: MarketingRecord, keys: readonly GroupKey[]): string {
  // JSON keeps values containing separators unambiguous
  return JSON.stringify(keys.map((k) => record[k]));
}

export function aggregateMarketing(
  records: readonly MarketingRecord[],
  groupKeys: readonly GroupKey[] = DEFAULT_GROUP_KEYS
): AggregatedMarketingRow[] {
  const keys = KEY_ORDER.filter((k) => groupKeys.includes(k));
  const groups = new Map<string, Accumulator>();

  for (const record of records) {
    const id = tupleKey(record, keys);
    let acc = groups.get(id);
    if (!acc) {
      acc = { key: record, totals: emptyMarketingTotals(), count: 0 };
      groups.set(id, acc);
    }
    addMarketingTotals(acc.totals, record);
    acc.count++;
  }

  const rows = [...groups.values()].map((acc) => toRow(acc, keys));
  return rows.sort((a, b) => compareRows(a, b, keys));
}

function toRow(acc: Accumulator, keys: readonly GroupKey[]): AggregatedMarketingRow {
  const row: AggregatedMarketingRow = {
    ...acc.totals,
    ...computeMarketingRatios(acc.totals),
    row_count: acc.count,
  };
  for (const k of keys) {
    switch (k) {
      case "date":
        row.date = acc.key.date;
        break;
      case "platform":
        row.platform = acc.key.platform;
        break;
      case "tactic":
        row.tactic = acc.key.tactic;
        break;
      case "state":
        row.state = acc.key.state;
        break;
      case "campaign":
        row.campaign = acc.key.campaign;
        break;
    }
  }
  return row;
}

function compareRows(
  a: AggregatedMarketingRow,
  b: AggregatedMarketingRow,
  keys: readonly GroupKey[]
): number {
  for (const k of keys) {
    const av = a[k] ?? "";
    const bv = b[k] ?? "";
    if (av < bv) return -1;
    if (av > bv) return 1;
  }
  return 0;
}
