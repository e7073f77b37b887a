import { describe, it, expect } from "vitest";
import { runPipeline } from "../pipeline.js";
import { MemorySource } from "../../sources/memory-source.js";
import type { SourceSet } from "../../sources/types.js";
import { EmptyResultError, ParseError, SourceMissingError } from "../../core/errors.js";

const MARKETING_HEADER = "date,tactic,state,campaign,impression,clicks,spend,attributed revenue";
const BUSINESS_HEADER = "date,# of orders,# of new orders,new customers,total revenue,gross profit,COGS";

const BUSINESS = [
  BUSINESS_HEADER,
  "2024-03-01,10,4,4,1000,400,600",
  "2024-03-02,5,1,1,500,200,300",
  "2024-03-03,oops,1,1,500,200,300",
].join("\n");

const FACEBOOK = [
  MARKETING_HEADER,
  "2024-03-01,ASC,CA,Spring,1000,20,100,50",
  "2024-03-02,ASC,CA,Spring,300,40,50,25",
  "2024-03-09,ASC,CA,Spring,100,1,10,5",
].join("\n");

const GOOGLE = [MARKETING_HEADER, "2024-03-01,Search,NY,Brand,500,20,100,150"].join("\n");

function sources(overrides: Partial<Record<"business" | "Facebook" | "Google" | "TikTok", string | null>> = {}): SourceSet {
  const text = (key: keyof typeof overrides, fallback: string): string | null =>
    key in overrides ? (overrides[key] ?? null) : fallback;
  return {
    business: new MemorySource("business", text("business", BUSINESS)),
    marketing: {
      Facebook: new MemorySource("Facebook", text("Facebook", FACEBOOK)),
      Google: new MemorySource("Google", text("Google", GOOGLE)),
      TikTok: new MemorySource("TikTok", text("TikTok", MARKETING_HEADER)),
    },
  };
}

describe("runPipeline", () => {
  it("produces aggregates, the combined table and a data-quality report", async () => {
    const result = await runPipeline(sources());

    expect(result.combined.map((r) => [r.date, r.spend, r.attributed_revenue])).toEqual([
      ["2024-03-01", 200, 200],
      ["2024-03-02", 50, 25],
    ]);
    expect(result.aggregates.map((r) => `${r.date}/${r.platform}`)).toEqual([
      "2024-03-01/Facebook",
      "2024-03-01/Google",
      "2024-03-02/Facebook",
      "2024-03-09/Facebook",
    ]);
    expect(result.report.rejectedRows).toEqual([
      { source: "business", line: 4, reason: 'orders: "oops" is not a number' },
    ]);
    expect(result.report.unmatchedMarketingDates).toEqual(["2024-03-09"]);
    expect(result.report.rowCounts).toEqual({ business: 2, Facebook: 3, Google: 1, TikTok: 0 });
  });

  it("is deterministic for the same input", async () => {
    const a = await runPipeline(sources());
    const b = await runPipeline(sources());
    expect(a).toEqual(b);
  });

  it("keeps one row per business date when every marketing source is empty", async () => {
    const result = await runPipeline(
      sources({ Facebook: MARKETING_HEADER, Google: MARKETING_HEADER })
    );
    expect(result.combined).toHaveLength(2);
    expect(result.combined.every((r) => r.spend === 0 && r.attribution_gap === r.total_revenue)).toBe(true);
  });

  it("skips platforms absent from the source set", async () => {
    const set = sources();
    delete set.marketing.TikTok;
    const result = await runPipeline(set);
    expect(result.report.rowCounts).toEqual({ business: 2, Facebook: 3, Google: 1 });
  });

  it("fails with SourceMissingError when a source has no content", async () => {
    await expect(runPipeline(sources({ Google: null }))).rejects.toBeInstanceOf(SourceMissingError);
    await expect(runPipeline(sources({ business: "" }))).rejects.toThrow(
      'Source "business" is missing: no header row'
    );
  });

  it("fails with ParseError when a required column is missing", async () => {
    await expect(runPipeline(sources({ TikTok: "date,spend\n" }))).rejects.toBeInstanceOf(ParseError);
  });

  it("fails with EmptyResultError when no business row survives", async () => {
    await expect(runPipeline(sources({ business: BUSINESS_HEADER }))).rejects.toThrow(
      new EmptyResultError("the business source has no data rows")
    );
    await expect(
      runPipeline(sources({ business: `${BUSINESS_HEADER}\nbad-date,1,1,1,1,1,1` }))
    ).rejects.toThrow("No data: all 1 business rows were rejected");
  });
});
