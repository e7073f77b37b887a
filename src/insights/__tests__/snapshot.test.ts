import { describe, it, expect } from "vitest";
import { buildInsightSnapshot } from "../snapshot.js";
import { buildChatPrompt, buildNarrativePrompt, RECENT_DAYS } from "../prompts.js";
import { combine } from "../../pipeline/combine.js";
import { business } from "../../pipeline/__tests__/fixtures.js";
import { summaryWith } from "./helpers.js";

describe("buildInsightSnapshot", () => {
  it("deep-freezes a copy of its input", () => {
    const summary = summaryWith();
    const snapshot = buildInsightSnapshot({ combined: [], aggregates: [], summary });

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.summary.platforms[0])).toBe(true);

    summary.platforms[0].spend = 1;
    expect(snapshot.summary.platforms[0].spend).toBe(1000);
  });

  it("counts data-quality issues from the report", () => {
    const snapshot = buildInsightSnapshot({
      combined: [],
      aggregates: [],
      summary: summaryWith(),
      report: {
        rejectedRows: [{ source: "business", line: 3, reason: "duplicate date 2024-03-01" }],
        warnings: [],
        unmatchedMarketingDates: ["2024-03-09", "2024-03-10"],
        rowCounts: {},
      },
    });
    expect(snapshot.dataQuality).toEqual({ rejectedRows: 1, unmatchedMarketingDates: 2 });
  });
});

describe("prompts", () => {
  it("includes only the most recent days", () => {
    const days = Array.from({ length: 20 }, (_, i) =>
      business(`2024-03-${String(i + 1).padStart(2, "0")}`, 1, 100)
    );
    const snapshot = buildInsightSnapshot({ combined: combine(days, []), aggregates: [], summary: summaryWith() });
    const prompt = buildNarrativePrompt(snapshot);

    expect(RECENT_DAYS).toBe(14);
    expect(prompt).not.toContain('"date": "2024-03-06"');
    expect(prompt).toContain('"date": "2024-03-07"');
    expect(prompt).toContain('"date": "2024-03-20"');
  });

  it("puts the question last", () => {
    const snapshot = buildInsightSnapshot({ combined: [], aggregates: [], summary: summaryWith() });
    const prompt = buildChatPrompt("Why is TikTok missing?", snapshot);
    expect(prompt.split("\n").at(-1)).toBe("QUESTION: Why is TikTok missing?");
  });
});
