import { safeDivide } from "../core/analysis/ratios.js";
import { formatChange, formatMultiplier, formatPercent } from "../report/format.js";
import type { ReadonlySummary } from "./snapshot.js";

// ---------------------------------------------------------------------------
// Rule-based insights
// ---------------------------------------------------------------------------
// Template narration that works without any LLM. Thresholds:
//   ROAS          > 3.5 excellent, > 2.5 good, otherwise needs attention
//   Attribution   > 50% critical gap, > 30% moderate, otherwise healthy
// ---------------------------------------------------------------------------

export type Severity = "critical" | "warning" | "info" | "healthy";

export interface InsightFinding {
  severity: Severity;
  topic: "roas" | "attribution" | "platform";
  message: string;
  recommendation: string | null;
}

export interface InsightSections {
  performance: string;
  recommendations: string[];
  trends: string;
  attribution: string;
  findings: InsightFinding[];
}

function gapPercent(summary: ReadonlySummary): number {
  return summary.attribution_gap_pct * 100;
}

export function performanceInsight(summary: ReadonlySummary): string {
  const roas = summary.overall_roas;
  const gap = gapPercent(summary);
  const lines: string[] = [];

  if (roas > 3.5) {
    lines.push(
      `- Excellent marketing ROI: overall ROAS of ${formatMultiplier(roas)} shows highly efficient spend.`
    );
  } else if (roas > 2.5) {
    lines.push(
      `- Good marketing performance: ROAS of ${formatMultiplier(roas)} is solid, with room to optimise individual channels.`
    );
  } else {
    lines.push(
      `- ROAS needs attention: at ${formatMultiplier(roas)} it is below the 2.50x threshold. Review spend allocation.`
    );
  }

  if (gap > 50) {
    lines.push(
      `- Critical attribution gap: ${gap.toFixed(1)}% of revenue is not tracked back to marketing. Fixing tracking should be a top priority.`
    );
  } else if (gap > 30) {
    lines.push(
      `- Moderate attribution gap: ${gap.toFixed(1)}% of revenue is unattributed. Better tracking would sharpen the picture.`
    );
  } else {
    lines.push(
      `- Healthy attribution: a gap of ${gap.toFixed(1)}% indicates effective tracking.`
    );
  }

  return lines.join("\n");
}

export function recommendations(summary: ReadonlySummary): string[] {
  const best = summary.topPlatform;
  const worst = summary.bottomPlatform;
  if (!best || !worst) {
    return ["No platform spend in this period to base recommendations on."];
  }

  const recs: string[] = [];
  if (best.roas > 3.0) {
    recs.push(
      `Scale ${best.platform}: ROAS of ${formatMultiplier(best.roas)} supports a larger budget. Build lookalike audiences from its top campaigns.`
    );
  }
  if (worst.platform !== best.platform && worst.roas < 2.0) {
    recs.push(
      `Optimise ${worst.platform}: ROAS is low at ${formatMultiplier(worst.roas)}. Audit creatives and targeting, and reallocate budget if it does not recover.`
    );
  }
  if (gapPercent(summary) > 40) {
    recs.push(
      "Improve tracking precision: the attribution gap may hide the true performance of some channels. Consider server-side tagging or a customer data platform."
    );
  } else {
    recs.push(
      "Keep A/B testing: tracking is solid, so test ad copy, visuals and landing pages to find new winners."
    );
  }
  return recs;
}

export function trendInsight(summary: ReadonlySummary): string {
  const share = safeDivide(summary.totals.attributed_revenue, summary.totals.total_revenue);
  const lines = [`Marketing impact: tracked marketing accounts for ${formatPercent(share)} of total revenue.`];

  const deltas = summary.deltas;
  if (deltas) {
    lines.push(
      `Against ${deltas.previous.since} – ${deltas.previous.until}: revenue ${formatChange(deltas.total_revenue)}, spend ${formatChange(deltas.spend)}, ROAS ${formatChange(deltas.roas)}.`
    );
  }
  return lines.join("\n");
}

export function attributionInsight(summary: ReadonlySummary): string {
  const gap = gapPercent(summary);
  if (gap < 20) {
    return `Excellent attribution: only ${gap.toFixed(1)}% of revenue is unattributed.`;
  }
  return `Attribution gap: ${gap.toFixed(1)}% of revenue is unattributed; tracking needs improvement.`;
}

/** Headline findings for the insights panel */
export function keyFindings(summary: ReadonlySummary): InsightFinding[] {
  const findings: InsightFinding[] = [];
  const roas = summary.overall_roas;
  const gap = gapPercent(summary);

  if (roas > 3) {
    findings.push({
      severity: "healthy",
      topic: "roas",
      message: "Strong ROAS: overall ROAS is above 3x.",
      recommendation: null,
    });
  } else if (roas > 2) {
    findings.push({
      severity: "warning",
      topic: "roas",
      message: "Moderate ROAS: overall ROAS is between 2x and 3x.",
      recommendation: "Optimise underperforming campaigns.",
    });
  } else {
    findings.push({
      severity: "critical",
      topic: "roas",
      message: "Low ROAS: overall ROAS is below 2x.",
      recommendation: "Immediate optimisation is needed.",
    });
  }

  if (gap > 50) {
    findings.push({
      severity: "critical",
      topic: "attribution",
      message: "High attribution gap: more than 50% of revenue is unattributed.",
      recommendation: "Make tracking improvements a priority.",
    });
  } else if (gap > 25) {
    findings.push({
      severity: "warning",
      topic: "attribution",
      message: "Moderate attribution gap: between 25% and 50% of revenue is unattributed.",
      recommendation: "Review the attribution model.",
    });
  } else {
    findings.push({
      severity: "healthy",
      topic: "attribution",
      message: "Good attribution: less than 25% of revenue is unattributed.",
      recommendation: null,
    });
  }

  const best = summary.topPlatform;
  const worst = summary.bottomPlatform;
  if (best && worst) {
    if (best.roas > worst.roas + 0.5) {
      findings.push({
        severity: "info",
        topic: "platform",
        message: `Top performer: ${best.platform} leads with ROAS of ${formatMultiplier(best.roas)}.`,
        recommendation: null,
      });
    }
    if (worst.roas < 2.0) {
      findings.push({
        severity: "warning",
        topic: "platform",
        message: `Optimisation opportunity: ${worst.platform} has the lowest ROAS at ${formatMultiplier(worst.roas)}.`,
        recommendation: `Audit ${worst.platform} campaigns or shift budget toward better performers.`,
      });
    }
  }

  return findings;
}

export function executiveSummary(summary: ReadonlySummary): string {
  const roas = summary.overall_roas;
  return [
    "## Executive Summary",
    "",
    "**Key Metrics:**",
    `- **Overall ROAS**: ${formatMultiplier(roas)}`,
    `- **Attribution Gap**: ${formatPercent(summary.attribution_gap_pct)}`,
    "",
    "**Strategic Insight:**",
    `Marketing performance shows ${roas > 3 ? "strong" : "moderate"} ROI with clear optimisation opportunities.`,
  ].join("\n");
}

export function ruleBasedInsights(summary: ReadonlySummary): InsightSections {
  return {
    performance: performanceInsight(summary),
    recommendations: recommendations(summary),
    trends: trendInsight(summary),
    attribution: attributionInsight(summary),
    findings: keyFindings(summary),
  };
}
