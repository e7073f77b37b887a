import { describe, it, expect } from "vitest";
import { parseCsv } from "../csv.js";

describe("parseCsv", () => {
  it("splits a simple table and numbers lines from 1", () => {
    const table = parseCsv("date,spend\n2024-03-01,10\n2024-03-02,20\n");
    expect(table?.header).toEqual(["date", "spend"]);
    expect(table?.rows).toEqual([
      { line: 2, cells: ["2024-03-01", "10"] },
      { line: 3, cells: ["2024-03-02", "20"] },
    ]);
  });

  it("keeps delimiters and doubled quotes inside quoted fields", () => {
    const table = parseCsv('campaign,spend\n"Spring, ""Big"" Sale","1,200.50"\n');
    expect(table?.rows[0].cells).toEqual(['Spring, "Big" Sale', "1,200.50"]);
  });

  it("allows a quoted field to span lines", () => {
    const table = parseCsv('a,b\n"line one\nline two",x\nnext,y\n');
    expect(table?.rows).toEqual([
      { line: 2, cells: ["line one\nline two", "x"] },
      { line: 4, cells: ["next", "y"] },
    ]);
  });

  it("handles CRLF line endings, a BOM and blank lines", () => {
    const table = parseCsv("\uFEFF date , spend \r\n\r\n2024-03-01,5\r\n");
    expect(table?.header).toEqual(["date", "spend"]);
    expect(table?.rows).toEqual([{ line: 3, cells: ["2024-03-01", "5"] }]);
  });

  it("reads a final record without a trailing newline", () => {
    const table = parseCsv("a,b\n1,2");
    expect(table?.rows).toEqual([{ line: 2, cells: ["1", "2"] }]);
  });

  it("supports a custom delimiter", () => {
    const table = parseCsv("a;b\n1;2\n", { delimiter: ";" });
    expect(table?.rows[0].cells).toEqual(["1", "2"]);
  });

  it("returns null for empty or whitespace-only text", () => {
    expect(parseCsv("")).toBeNull();
    expect(parseCsv("\n  \n")).toBeNull();
  });

  it("returns a header with no rows for a header-only file", () => {
    expect(parseCsv("date,spend\n")).toEqual({ header: ["date", "spend"], rows: [] });
  });

  it("reads an unterminated quote literally and flags only its record", () => {
    const table = parseCsv('a,b,c\n1,"open,2\n3,4,5\n6,7,8\n');
    expect(table?.rows).toEqual([
      { line: 2, cells: ["1", '"open', "2"], error: "unterminated quoted field" },
      { line: 3, cells: ["3", "4", "5"] },
      { line: 4, cells: ["6", "7", "8"] },
    ]);
  });

  it("flags an unterminated quote on the last line", () => {
    const table = parseCsv('a,b\n1,2\n3,"x');
    expect(table?.rows).toEqual([
      { line: 2, cells: ["1", "2"] },
      { line: 3, cells: ["3", '"x'], error: "unterminated quoted field" },
    ]);
  });
});
