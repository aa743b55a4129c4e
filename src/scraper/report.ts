import { AnalysisResult, JsonReport, RankedList } from "./types";

const TAG_WIDTH = 15;
const WORD_WIDTH = 20;
const COUNT_WIDTH = 6;

export function renderReport(source: string, tagCounts: RankedList, wordCounts: RankedList) {
  const lines: string[] = [];
  const header = `Report for ${source}`;
  lines.push(header);
  lines.push("=".repeat(header.length));
  lines.push("");

  lines.push("HTML tag frequencies:");
  for (const { key, count } of tagCounts) {
    lines.push(`  ${key.padEnd(TAG_WIDTH)} ${String(count).padStart(COUNT_WIDTH)}`);
  }
  lines.push("");

  lines.push(`Top ${wordCounts.length} words:`);
  const rankWidth = String(wordCounts.length).length;
  wordCounts.forEach(({ key, count }, idx) => {
    const rank = String(idx + 1).padStart(rankWidth);
    lines.push(`  ${rank}. ${key.padEnd(WORD_WIDTH)} ${String(count).padStart(COUNT_WIDTH)}`);
  });
  lines.push("");

  return lines.join("\n");
}

export function toJsonReport(result: AnalysisResult): JsonReport {
  return {
    source: result.source,
    tags: result.tags.map(({ key, count }) => ({ tag: key, count })),
    words: result.words.map(({ key, count }, idx) => ({ rank: idx + 1, word: key, count })),
    tokenCount: result.tokenCount,
  };
}
