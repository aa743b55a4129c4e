import { describe, expect, it } from "vitest";
import { renderReport, toJsonReport } from "./report";

describe("renderReport", () => {
  it("formats the header, tag section and word section", () => {
    const report = renderReport(
      "https://example.com",
      [
        { key: "p", count: 12 },
        { key: "html", count: 1 },
      ],
      [
        { key: "cat", count: 2 },
        { key: "sat", count: 1 },
      ]
    );
    expect(report.split("\n")).toEqual([
      "Report for https://example.com",
      "==============================",
      "",
      "HTML tag frequencies:",
      "  p                   12",
      "  html                 1",
      "",
      "Top 2 words:",
      "  1. cat                       2",
      "  2. sat                       1",
      "",
    ]);
  });

  it("widens the rank column to the digit count of the list length", () => {
    const words = Array.from({ length: 10 }, (_, i) => ({ key: `w${String.fromCharCode(97 + i)}`, count: 10 - i }));
    const lines = renderReport("src", [], words).split("\n");
    expect(lines).toContain("   1. wa                       10");
    expect(lines).toContain("  10. wj                        1");
  });

  it("still prints the word header when no words are shown", () => {
    const report = renderReport("src", [{ key: "p", count: 1 }], []);
    expect(report.endsWith("Top 0 words:\n")).toBe(true);
  });

  it("does not truncate long names", () => {
    const lines = renderReport("src", [{ key: "averyveryverylongtag", count: 3 }], []).split("\n");
    expect(lines[4]).toBe("  averyveryverylongtag      3");
  });
});

describe("toJsonReport", () => {
  it("numbers words from one", () => {
    expect(
      toJsonReport({
        source: "https://example.com",
        tags: [{ key: "p", count: 1 }],
        words: [
          { key: "cat", count: 2 },
          { key: "sat", count: 1 },
        ],
        tokenCount: 3,
        visibleTextLength: 11,
      })
    ).toEqual({
      source: "https://example.com",
      tags: [{ tag: "p", count: 1 }],
      words: [
        { rank: 1, word: "cat", count: 2 },
        { rank: 2, word: "sat", count: 1 },
      ],
      tokenCount: 3,
    });
  });
});
