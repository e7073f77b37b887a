import type { DateRange, Platform } from "../core/types.js";
import type { RangePreset } from "../core/analysis/comparator.js";
import type { PipelineResult } from "../pipeline/pipeline.js";
import type { FilteredView } from "../pipeline/filter.js";
import type { SummaryStats } from "../pipeline/summary.js";
import type { ReadonlySnapshot } from "../insights/snapshot.js";

// ---------------------------------------------------------------------------
// Dashboard orchestration types
// ---------------------------------------------------------------------------

export interface ViewSelection {
  /** Explicit range; takes precedence over `preset` */
  dateRange?: DateRange;
  preset?: RangePreset;
  platforms?: readonly Platform[];
}

export interface DashboardView {
  /** Resolved date window, or null for all dates */
  dateRange: DateRange | null;
  platforms: readonly Platform[] | null;
  result: PipelineResult;
  filtered: FilteredView;
  summary: SummaryStats;
  snapshot: ReadonlySnapshot;
}
