import { z } from "zod";
import { ScraperConfig } from "../config/scraper";
import { fetchHtml } from "../scraper/fetcher";
import { parseHtml } from "../scraper/parser";
import { wordFrequencies } from "../scraper/pipeline";
import { tagFrequencies } from "../scraper/tagCounter";
import { AnalysisResult } from "../scraper/types";
import { InvalidInputError } from "../utils/errors";
import { Logger, silentLogger } from "../utils/logger";

function isHttpUrl(value: string) {
  try {
    return ["http:", "https:"].includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

export const urlSchema = z
  .string()
  .trim()
  .url("Must be an absolute URL")
  .refine(isHttpUrl, "Only http and https URLs are supported");

export const topSchema = z.number().int("Must be an integer").nonnegative("Must not be negative");

export type AnalyzeUrlInput = {
  url: string;
  top?: number;
  stopWords?: Iterable<string>;
  timeoutMs?: number;
};

export type AnalyzeDeps = {
  config: ScraperConfig;
  logger?: Logger;
  fetchPage?: typeof fetchHtml;
};

export function validateUrl(url: string) {
  const parsed = urlSchema.safeParse(url);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid URL "${url}": ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function validateTop(top: number) {
  const parsed = topSchema.safeParse(top);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid top value ${top}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export async function analyzeUrl(input: AnalyzeUrlInput, deps: AnalyzeDeps): Promise<AnalysisResult> {
  const logger = deps.logger ?? silentLogger;
  const fetchPage = deps.fetchPage ?? fetchHtml;

  const url = validateUrl(input.url);
  const top = validateTop(input.top ?? deps.config.defaultTop);

  logger.info(`Fetching ${url} ...`);
  const html = await fetchPage(url, {
    timeoutMs: input.timeoutMs ?? deps.config.timeoutMs,
    userAgent: deps.config.userAgent,
  });
  logger.debug(`Received ${html.length} characters`);

  const tree = parseHtml(html);

  logger.info("Analysing HTML structure ...");
  const tags = tagFrequencies(tree);

  logger.info("Extracting and processing text ...");
  const result: AnalysisResult = { source: url, tags, ...wordFrequencies(tree, { top, stopWords: input.stopWords }) };
  logger.debug(`${result.tokenCount} tokens, ${result.tags.length} distinct tags`);
  return result;
}
