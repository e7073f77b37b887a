import type { ReadonlySnapshot } from "./snapshot.js";

// ---------------------------------------------------------------------------
// Prompt construction
// ---------------------------------------------------------------------------

/** Most recent days included verbatim in a prompt */
export const RECENT_DAYS = 14;

function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Compact JSON context describing the snapshot */
export function snapshotContext(snapshot: ReadonlySnapshot): string {
  const s = snapshot.summary;
  const context = {
    dateRange: s.dateRange,
    days: s.days,
    totals: s.totals,
    overall_roas: round(s.overall_roas),
    aov: round(s.aov),
    profit_margin: round(s.profit_margin),
    attribution_gap: round(s.attribution_gap, 2),
    attribution_gap_pct: round(s.attribution_gap_pct),
    platforms: s.platforms.map((p) => ({
      platform: p.platform,
      spend: p.spend,
      attributed_revenue: p.attributed_revenue,
      roas: round(p.roas),
      ctr: round(p.ctr),
      cpc: round(p.cpc),
      cpm: round(p.cpm),
    })),
    deltas: s.deltas,
    recentDays: snapshot.combined.slice(-RECENT_DAYS).map((row) => ({
      date: row.date,
      total_revenue: row.total_revenue,
      spend: row.spend,
      attributed_revenue: row.attributed_revenue,
      roas: round(row.roas),
      orders: row.orders,
    })),
    dataQuality: snapshot.dataQuality,
  };
  return JSON.stringify(context, null, 2);
}

export function buildChatPrompt(question: string, snapshot: ReadonlySnapshot): string {
  return [
    "You are a marketing analytics assistant for an e-commerce business.",
    "Answer the question using only the data below. Ratios are fractions (0.25 = 25%); money is in USD.",
    "If the data cannot answer the question, say so.",
    "",
    "DATA:",
    snapshotContext(snapshot),
    "",
    `QUESTION: ${question.trim()}`,
  ].join("\n");
}

export function buildNarrativePrompt(snapshot: ReadonlySnapshot): string {
  return [
    "You are a marketing analytics assistant for an e-commerce business.",
    "Write a short executive summary in markdown of the marketing performance below:",
    "headline metrics, the strongest and weakest platform, the attribution gap,",
    "and two or three concrete recommendations. Ratios are fractions; money is in USD.",
    "",
    "DATA:",
    snapshotContext(snapshot),
  ].join("\n");
}
