import { describe, it, expect } from "vitest";
import {
  buildComparisonPeriods,
  isWithinRange,
  rangeLength,
  resolvePreset,
} from "../comparator.js";

// ---------------------------------------------------------------------------
// buildComparisonPeriods
// ---------------------------------------------------------------------------

describe("buildComparisonPeriods", () => {
  it("builds the preceding week for a 7-day range", () => {
    const periods = buildComparisonPeriods({ since: "2024-01-08", until: "2024-01-14" });
    expect(periods.current).toEqual({ since: "2024-01-08", until: "2024-01-14" });
    expect(periods.previous).toEqual({ since: "2024-01-01", until: "2024-01-07" });
  });

  it("handles a single-day range", () => {
    const periods = buildComparisonPeriods({ since: "2024-03-01", until: "2024-03-01" });
    expect(periods.previous).toEqual({ since: "2024-02-29", until: "2024-02-29" });
  });

  it("crosses month and year boundaries", () => {
    const periods = buildComparisonPeriods({ since: "2024-01-01", until: "2024-01-10" });
    expect(periods.previous).toEqual({ since: "2023-12-22", until: "2023-12-31" });
  });

  it("rejects an invalid date", () => {
    expect(() => buildComparisonPeriods({ since: "not-a-date", until: "2024-01-10" })).toThrow(
      RangeError
    );
  });
});

describe("rangeLength / isWithinRange", () => {
  it("counts days inclusively", () => {
    expect(rangeLength({ since: "2024-02-01", until: "2024-02-29" })).toBe(29);
  });

  it("includes both bounds", () => {
    const range = { since: "2024-02-01", until: "2024-02-03" };
    expect(isWithinRange("2024-02-01", range)).toBe(true);
    expect(isWithinRange("2024-02-03", range)).toBe(true);
    expect(isWithinRange("2024-02-04", range)).toBe(false);
    expect(isWithinRange("2024-01-31", range)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// resolvePreset
// ---------------------------------------------------------------------------

describe("resolvePreset", () => {
  const min = "2024-01-01";
  const max = "2024-05-20";

  it("all_time spans the data domain", () => {
    expect(resolvePreset("all_time", min, max)).toEqual({ since: min, until: max });
  });

  it("last_7_days ends on the latest date", () => {
    expect(resolvePreset("last_7_days", min, max)).toEqual({
      since: "2024-05-14",
      until: "2024-05-20",
    });
  });

  it("last_30_days ends on the latest date", () => {
    expect(resolvePreset("last_30_days", min, max)).toEqual({
      since: "2024-04-21",
      until: "2024-05-20",
    });
  });

  it("last_quarter is the previous calendar quarter", () => {
    expect(resolvePreset("last_quarter", min, max)).toEqual({
      since: "2024-01-01",
      until: "2024-03-31",
    });
    expect(resolvePreset("last_quarter", min, "2024-02-10")).toEqual({
      since: "2023-10-01",
      until: "2023-12-31",
    });
  });
});
