import type { DashboardConfig } from "../config/types.js";
import { toFileLayout, toLoadOptions } from "../config/loader.js";
import { resolvePreset } from "../core/analysis/comparator.js";
import type { DateRange } from "../core/types.js";
import { createLogger } from "../core/logger.js";
import { PipelineCache } from "../pipeline/cache.js";
import type { PipelineResult } from "../pipeline/pipeline.js";
import { filter } from "../pipeline/filter.js";
import { summarize } from "../pipeline/summary.js";
import { buildInsightSnapshot } from "../insights/snapshot.js";
import { createInsightService } from "../insights/service.js";
import type { InsightAnswer, InsightService } from "../insights/service.js";
import { formatDashboard } from "../report/format-dashboard.js";
import { createFileSources } from "../sources/file-source.js";
import type { SourceSet } from "../sources/types.js";
import type { DashboardView, ViewSelection } from "./types.js";

// ---------------------------------------------------------------------------
// Dashboard runner
// ---------------------------------------------------------------------------
// Ties the cached pipeline, per-view filtering and the insight service
// together. Every view recomputes its summary from the cached records; the
// pipeline itself only reruns when a source changes.
// ---------------------------------------------------------------------------

const log = createLogger("dashboard");

export class Dashboard {
  constructor(
    private readonly cache: PipelineCache,
    readonly insights: InsightService
  ) {}

  async view(selection: ViewSelection = {}): Promise<DashboardView> {
    const result = await this.cache.get();
    const dateRange = resolveRange(result, selection);
    const criteria = { dateRange: dateRange ?? undefined, platforms: selection.platforms };

    const filtered = filter(result, criteria);
    const summary = summarize(result, criteria);
    if (filtered.combined.length === 0) {
      log.info("No data for the selected range", { dateRange });
    }

    return {
      dateRange,
      platforms: selection.platforms ?? null,
      result,
      filtered,
      summary,
      snapshot: buildInsightSnapshot({
        combined: filtered.combined,
        aggregates: filtered.aggregates,
        summary,
        report: result.report,
      }),
    };
  }

  async render(selection: ViewSelection = {}): Promise<string> {
    const view = await this.view(selection);
    return formatDashboard(view.result, view.summary);
  }

  async ask(question: string, selection: ViewSelection = {}): Promise<InsightAnswer> {
    const view = await this.view(selection);
    return this.insights.ask(question, view.snapshot);
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}

function resolveRange(result: PipelineResult, selection: ViewSelection): DateRange | null {
  if (selection.dateRange) return selection.dateRange;
  if (!selection.preset) return null;

  // Business rows are sorted by date in the combined table
  const first = result.combined[0];
  const last = result.combined[result.combined.length - 1];
  if (!first || !last) return null;
  return resolvePreset(selection.preset, first.date, last.date);
}

export interface CreateDashboardOptions {
  /** Sources to read instead of the config's data folder */
  sources?: SourceSet;
  /** Insight service to use instead of one built from `config.llm` */
  insights?: InsightService;
}

export function createDashboard(
  config: DashboardConfig,
  options: CreateDashboardOptions = {}
): Dashboard {
  const sources = options.sources ?? createFileSources(toFileLayout(config));
  const cache = new PipelineCache(sources, { load: toLoadOptions(config) });
  return new Dashboard(cache, options.insights ?? createInsightService(config.llm));
}
