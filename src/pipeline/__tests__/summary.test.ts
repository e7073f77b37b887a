import { describe, it, expect } from "vitest";
import { summarize } from "../summary.js";
import { sampleBusiness, sampleMarketing } from "./fixtures.js";

const input = { marketingRecords: sampleMarketing(), businessRecords: sampleBusiness() };

describe("summarize", () => {
  it("computes totals and headline ratios from the joined table", () => {
    const s = summarize(input);
    expect(s.dateRange).toEqual({ since: "2024-03-01", until: "2024-03-05" });
    expect(s.days).toBe(3);
    expect(s.totals).toEqual({
      impressions: 1800,
      clicks: 80,
      spend: 250,
      attributed_revenue: 225,
      total_revenue: 1700,
      orders: 17,
      new_customers: 5,
      gross_profit: 680,
    });
    expect(s.overall_roas).toBe(0.9);
    expect(s.aov).toBe(100);
    expect(s.profit_margin).toBe(0.4);
    expect(s.attribution_gap).toBe(1475);
    expect(s.attribution_gap_pct).toBeCloseTo(1475 / 1700, 12);
  });

  it("ranks platforms by ROAS using only marketing on business dates", () => {
    const s = summarize(input);
    expect(s.platforms.map((p) => [p.platform, p.spend, p.roas])).toEqual([
      ["Facebook", 150, 0.5],
      ["Google", 100, 1.5],
    ]);
    expect(s.topPlatform?.platform).toBe("Google");
    expect(s.bottomPlatform?.platform).toBe("Facebook");
  });

  it("has no deltas when the preceding window is empty", () => {
    expect(summarize(input).deltas).toBeNull();
  });

  it("compares against the preceding window of equal length", () => {
    const s = summarize(input, { dateRange: { since: "2024-03-02", until: "2024-03-02" } });
    expect(s.deltas).toEqual({
      previous: { since: "2024-03-01", until: "2024-03-01" },
      spend: -75,
      attributed_revenue: -87.5,
      total_revenue: -50,
      orders: -50,
      roas: -50,
    });
  });

  it("summarises an empty window without throwing", () => {
    const s = summarize(input, { dateRange: { since: "2025-01-01", until: "2025-01-31" } });
    expect(s.dateRange).toBeNull();
    expect(s.days).toBe(0);
    expect(s.overall_roas).toBe(0);
    expect(s.platforms).toEqual([]);
    expect(s.topPlatform).toBeNull();
    expect(s.deltas).toBeNull();
  });
});
