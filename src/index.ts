// ---------------------------------------------------------------------------
// marketing-intel — Marketing performance KPIs joined to business results
// ---------------------------------------------------------------------------

// Core types
export type {
  Platform,
  MarketingRecord,
  BusinessRecord,
  MarketingTotals,
  MarketingRatios,
  BusinessRatios,
  GroupKey,
  AggregatedMarketingRow,
  CombinedRow,
  DateRange,
  ComparisonPeriods,
  RowRejection,
  LoadResult,
  DataQualityReport,
} from "./core/types.js";
export { PLATFORMS, isPlatform } from "./core/types.js";

// Errors & logging
export {
  PipelineError,
  SourceMissingError,
  ParseError,
  EmptyResultError,
  isPipelineError,
  errorMessage,
} from "./core/errors.js";
export type { PipelineErrorCode } from "./core/errors.js";
export { createLogger } from "./core/logger.js";
export type { Logger, LogLevel } from "./core/logger.js";

// Analysis helpers
export {
  safeDivide,
  computeMarketingRatios,
  computeBusinessRatios,
} from "./core/analysis/ratios.js";
export { percentChange } from "./core/analysis/change.js";
export { buildComparisonPeriods, resolvePreset } from "./core/analysis/comparator.js";
export type { RangePreset } from "./core/analysis/comparator.js";

// Ingestion
export { parseCsv } from "./ingest/csv.js";
export type { CsvTable, CsvRow, CsvOptions } from "./ingest/csv.js";
export { parseDate, DEFAULT_DATE_FORMATS } from "./ingest/dates.js";
export { parseNumeric } from "./ingest/numbers.js";
export {
  loadMarketingSource,
  loadBusinessSource,
  DEFAULT_LOAD_OPTIONS,
} from "./ingest/loader.js";
export type { LoadOptions } from "./ingest/loader.js";

// Sources
export type { DataSource, SourceSet } from "./sources/types.js";
export { FileSource, createFileSources } from "./sources/file-source.js";
export type { FileLayout } from "./sources/file-source.js";
export { MemorySource } from "./sources/memory-source.js";

// Pipeline
export { aggregateMarketing, DEFAULT_GROUP_KEYS } from "./pipeline/aggregate.js";
export { combine, findUnmatchedMarketingDates } from "./pipeline/combine.js";
export { filter, filterByDateRange } from "./pipeline/filter.js";
export type { FilterCriteria, FilterInput, FilteredView } from "./pipeline/filter.js";
export { runPipeline, readSources, processSources } from "./pipeline/pipeline.js";
export type { PipelineResult, SourceTexts } from "./pipeline/pipeline.js";
export { PipelineCache, fingerprintSources } from "./pipeline/cache.js";
export type { PipelineCacheOptions, PipelineRunner } from "./pipeline/cache.js";
export { summarize, sumCombined } from "./pipeline/summary.js";
export type {
  SummaryStats,
  SummaryTotals,
  PlatformPerformance,
  PeriodDeltas,
} from "./pipeline/summary.js";

// Insights
export { buildInsightSnapshot } from "./insights/snapshot.js";
export type { InsightSnapshot, ReadonlySnapshot, ReadonlySummary } from "./insights/snapshot.js";
export {
  ruleBasedInsights,
  keyFindings,
  executiveSummary,
} from "./insights/rules.js";
export type { InsightFinding, InsightSections, Severity } from "./insights/rules.js";
export type { LlmProvider, GenerateOptions } from "./insights/provider.js";
export { GeminiProvider } from "./insights/gemini-provider.js";
export { MockLlmProvider } from "./insights/mock-provider.js";
export { buildChatPrompt, buildNarrativePrompt } from "./insights/prompts.js";
export {
  InsightService,
  createInsightService,
  NOT_CONFIGURED_MESSAGE,
} from "./insights/service.js";
export type { InsightAnswer, InsightServiceOptions } from "./insights/service.js";
export { withTimeout, TimeoutError } from "./insights/timeout.js";

// Reports
export {
  formatCurrency,
  formatCurrencyCompact,
  formatMultiplier,
  formatPercent,
  formatChange,
} from "./report/format.js";
export { formatDashboard, kpiCards, platformTable } from "./report/format-dashboard.js";
export type { KpiCard } from "./report/format-dashboard.js";

// Config
export { loadConfig, buildConfig } from "./config/loader.js";
export type { DashboardConfig, RawDashboardConfig, LlmConfig } from "./config/types.js";

// Orchestrator
export { Dashboard, createDashboard } from "./orchestrator/runner.js";
export type { CreateDashboardOptions } from "./orchestrator/runner.js";
export type { DashboardView, ViewSelection } from "./orchestrator/types.js";
