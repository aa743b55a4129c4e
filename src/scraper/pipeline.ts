import { rankKeys } from "./frequency";
import { DEFAULT_STOPWORDS, tokenize, toStopWordSet } from "./nlp";
import { parseHtml } from "./parser";
import { renderReport } from "./report";
import { tagFrequencies } from "./tagCounter";
import { AnalysisOptions, AnalysisResult, DocumentTree, RankedList } from "./types";
import { DEFAULT_HIDDEN_TAGS, extractVisibleText, toTagSet } from "./visibleText";

export const DEFAULT_TOP = 100;

export type WordAnalysis = {
  words: RankedList;
  tokenCount: number;
  visibleTextLength: number;
};

/** Visible text → tokens → top words. */
export function wordFrequencies(tree: DocumentTree, options: AnalysisOptions = {}): WordAnalysis {
  const top = options.top ?? DEFAULT_TOP;
  const stopWords = options.stopWords ? toStopWordSet(options.stopWords) : DEFAULT_STOPWORDS;
  const hiddenTags = options.hiddenTags ? toTagSet(options.hiddenTags) : DEFAULT_HIDDEN_TAGS;

  const text = extractVisibleText(tree, hiddenTags);
  const tokens = tokenize(text, stopWords);
  return { words: rankKeys(tokens, top), tokenCount: tokens.length, visibleTextLength: text.length };
}

export function analyzeHtml(html: string, source: string, options: AnalysisOptions = {}): AnalysisResult {
  const tree = parseHtml(html);
  // tags come from the whole tree, hidden elements included
  const tags = tagFrequencies(tree);
  return { source, tags, ...wordFrequencies(tree, options) };
}

export function renderAnalysis(result: AnalysisResult) {
  return renderReport(result.source, result.tags, result.words);
}
