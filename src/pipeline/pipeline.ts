import { PLATFORMS } from "../core/types.js";
import type {
  AggregatedMarketingRow,
  BusinessRecord,
  CombinedRow,
  DataQualityReport,
  MarketingRecord,
  Platform,
  RowRejection,
} from "../core/types.js";
import { EmptyResultError } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import type { LoadOptions } from "../ingest/loader.js";
import {
  DEFAULT_LOAD_OPTIONS,
  loadBusinessSource,
  loadMarketingSource,
} from "../ingest/loader.js";
import type { SourceSet } from "../sources/types.js";
import { aggregateMarketing, DEFAULT_GROUP_KEYS } from "./aggregate.js";
import { combine, findUnmatchedMarketingDates } from "./combine.js";

// ---------------------------------------------------------------------------
// KPI pipeline
// ---------------------------------------------------------------------------
// sources → clean records → date × platform aggregates → combined table.
// Reading is async; everything after is synchronous and deterministic in
// the source text.
// ---------------------------------------------------------------------------

const log = createLogger("pipeline");

export interface PipelineResult {
  readonly marketingRecords: readonly MarketingRecord[];
  readonly businessRecords: readonly BusinessRecord[];
  /** Ordered by date then platform */
  readonly aggregates: readonly AggregatedMarketingRow[];
  /** Ordered by date */
  readonly combined: readonly CombinedRow[];
  readonly report: DataQualityReport;
}

export interface SourceTexts {
  business: string;
  marketing: { platform: Platform; text: string }[];
}

/** Read every source in the set. Any unreadable source fails the whole read. */
export async function readSources(sources: SourceSet): Promise<SourceTexts> {
  const marketingEntries = PLATFORMS.flatMap((platform) => {
    const source = sources.marketing[platform];
    return source ? [{ platform, source }] : [];
  });

  const [business, ...marketingTexts] = await Promise.all([
    sources.business.read(),
    ...marketingEntries.map((e) => e.source.read()),
  ]);

  return {
    business,
    marketing: marketingEntries.map((e, i) => ({ platform: e.platform, text: marketingTexts[i] })),
  };
}

/** Run the synchronous part of the pipeline over already-read texts */
export function processSources(
  texts: SourceTexts,
  options: LoadOptions = DEFAULT_LOAD_OPTIONS
): PipelineResult {
  const rejectedRows: RowRejection[] = [];
  const warnings: string[] = [];
  const rowCounts: Record<string, number> = {};

  const business = loadBusinessSource(texts.business, options);
  rejectedRows.push(...business.rejected);
  warnings.push(...business.warnings);
  rowCounts.business = business.records.length;

  const marketingRecords: MarketingRecord[] = [];
  for (const { platform, text } of texts.marketing) {
    const loaded = loadMarketingSource(platform, text, options);
    marketingRecords.push(...loaded.records);
    rejectedRows.push(...loaded.rejected);
    warnings.push(...loaded.warnings);
    rowCounts[platform] = loaded.records.length;
  }

  if (business.records.length === 0) {
    throw new EmptyResultError(
      business.rejected.length > 0
        ? `all ${business.rejected.length} business rows were rejected`
        : "the business source has no data rows"
    );
  }

  const aggregates = aggregateMarketing(marketingRecords, DEFAULT_GROUP_KEYS);
  const combined = combine(business.records, aggregates);
  const unmatchedMarketingDates = findUnmatchedMarketingDates(business.records, aggregates);

  if (rejectedRows.length > 0) {
    log.warn("Rows rejected during load", { rejected: rejectedRows.length });
  }
  if (unmatchedMarketingDates.length > 0) {
    log.info("Marketing dates without business rows were dropped", {
      dates: unmatchedMarketingDates.length,
    });
  }
  log.info("Pipeline complete", {
    days: combined.length,
    marketingRecords: marketingRecords.length,
  });

  return {
    marketingRecords,
    businessRecords: business.records,
    aggregates,
    combined,
    report: { rejectedRows, warnings, unmatchedMarketingDates, rowCounts },
  };
}

export async function runPipeline(
  sources: SourceSet,
  options: LoadOptions = DEFAULT_LOAD_OPTIONS
): Promise<PipelineResult> {
  const texts = await readSources(sources);
  return processSources(texts, options);
}
