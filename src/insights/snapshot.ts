import type { AggregatedMarketingRow, CombinedRow, DataQualityReport } from "../core/types.js";
import type { SummaryStats } from "../pipeline/summary.js";
import { deepFreeze } from "../core/freeze.js";
import type { DeepReadonly } from "../core/freeze.js";

// ---------------------------------------------------------------------------
// Insight snapshot
// ---------------------------------------------------------------------------
// A frozen copy of the computed tables. It is the only thing prompt
// construction sees, so nothing the insight layer does can reach back into
// the pipeline's output.
// ---------------------------------------------------------------------------

export interface InsightSnapshot {
  combined: CombinedRow[];
  aggregates: AggregatedMarketingRow[];
  summary: SummaryStats;
  dataQuality: {
    rejectedRows: number;
    unmatchedMarketingDates: number;
  };
}

export type ReadonlySnapshot = DeepReadonly<InsightSnapshot>;

export type ReadonlySummary = DeepReadonly<SummaryStats>;

export interface SnapshotInput {
  combined: readonly CombinedRow[];
  aggregates: readonly AggregatedMarketingRow[];
  summary: SummaryStats;
  report?: DataQualityReport;
}

export function buildInsightSnapshot(input: SnapshotInput): ReadonlySnapshot {
  const snapshot: InsightSnapshot = structuredClone({
    combined: [...input.combined],
    aggregates: [...input.aggregates],
    summary: input.summary,
    dataQuality: {
      rejectedRows: input.report?.rejectedRows.length ?? 0,
      unmatchedMarketingDates: input.report?.unmatchedMarketingDates.length ?? 0,
    },
  });
  return deepFreeze(snapshot);
}
