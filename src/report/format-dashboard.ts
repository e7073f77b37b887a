import type { PipelineResult } from "../pipeline/pipeline.js";
import type { SummaryStats } from "../pipeline/summary.js";
import { keyFindings } from "../insights/rules.js";
import {
  formatChange,
  formatCurrency,
  formatCurrencyCompact,
  formatMultiplier,
  formatPercent,
} from "./format.js";

// ---------------------------------------------------------------------------
// Text dashboard
// ---------------------------------------------------------------------------

export interface KpiCard {
  label: string;
  value: string;
  /** Percent change against the previous window, when known */
  change: string | null;
}

export function kpiCards(summary: SummaryStats): KpiCard[] {
  const d = summary.deltas;
  return [
    {
      label: "Total Spend",
      value: formatCurrencyCompact(summary.totals.spend),
      change: d ? formatChange(d.spend) : null,
    },
    {
      label: "Attributed Revenue",
      value: formatCurrencyCompact(summary.totals.attributed_revenue),
      change: d ? formatChange(d.attributed_revenue) : null,
    },
    {
      label: "Business Revenue",
      value: formatCurrencyCompact(summary.totals.total_revenue),
      change: d ? formatChange(d.total_revenue) : null,
    },
    {
      label: "Overall ROAS",
      value: formatMultiplier(summary.overall_roas),
      change: d ? formatChange(d.roas) : null,
    },
    {
      label: "Attribution Gap",
      value: formatPercent(summary.attribution_gap_pct),
      change: null,
    },
  ];
}

function pad(cells: string[], widths: number[]): string {
  return cells.map((c, i) => (i === 0 ? c.padEnd(widths[i]) : c.padStart(widths[i]))).join("  ");
}

/** Fixed-width platform comparison table */
export function platformTable(summary: SummaryStats): string[] {
  const header = ["Platform", "Spend", "Revenue", "ROAS", "CTR", "CPC", "CPM"];
  const rows = summary.platforms.map((p) => [
    p.platform,
    formatCurrency(p.spend),
    formatCurrency(p.attributed_revenue),
    formatMultiplier(p.roas),
    formatPercent(p.ctr, 2),
    formatCurrency(p.cpc),
    formatCurrency(p.cpm),
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  return [pad(header, widths), ...rows.map((r) => pad(r, widths))];
}

export function formatDashboard(result: PipelineResult, summary: SummaryStats): string {
  const lines: string[] = [];
  const range = summary.dateRange;

  lines.push("# Marketing Performance");
  lines.push(range ? `${range.since} to ${range.until} (${summary.days} days)` : "No data for range");
  lines.push("");

  for (const card of kpiCards(summary)) {
    lines.push(card.change ? `${card.label}: ${card.value} (${card.change})` : `${card.label}: ${card.value}`);
  }

  lines.push("");
  lines.push("## Platforms");
  if (summary.platforms.length === 0) {
    lines.push("No marketing data in this period.");
  } else {
    lines.push(...platformTable(summary));
  }

  lines.push("");
  lines.push("## Key Insights");
  for (const finding of keyFindings(summary)) {
    lines.push(`- [${finding.severity}] ${finding.message}`);
  }

  const { rejectedRows, unmatchedMarketingDates } = result.report;
  if (rejectedRows.length > 0 || unmatchedMarketingDates.length > 0) {
    lines.push("");
    lines.push("## Data Quality");
    if (rejectedRows.length > 0) {
      lines.push(`- ${rejectedRows.length} row(s) rejected during load`);
    }
    if (unmatchedMarketingDates.length > 0) {
      lines.push(
        `- ${unmatchedMarketingDates.length} marketing date(s) without business data: ${unmatchedMarketingDates.join(", ")}`
      );
    }
  }

  return lines.join("\n");
}
