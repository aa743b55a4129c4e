import { readFile } from "fs/promises";
import { parseArgs } from "util";
import { z } from "zod";
import { loadScraperConfig } from "../config/scraper";
import { fetchHtml } from "../scraper/fetcher";
import { parseStopWordList } from "../scraper/nlp";
import { renderAnalysis } from "../scraper/pipeline";
import { toJsonReport } from "../scraper/report";
import { analyzeUrl, validateTop } from "../services/analyze.service";
import { AppError, InvalidInputError, errorMessage } from "../utils/errors";
import { Logger, createLogger } from "../utils/logger";

export const USAGE = `Usage: webfreq <url> [options]

Scrape a web page and analyse word/tag frequencies.

Arguments:
  url                      Fully-qualified URL to scrape.

Options:
  -t, --top <n>            Number of most frequent words to show (default: 100).
  -T, --timeout <seconds>  Fetch timeout in seconds (default: 10).
      --stop-words <file>  Replace the built-in stop-words with a file, one per line.
      --json               Print the report as JSON.
  -h, --help               Show this help.

Exit status: 0 success, 1 network or HTTP error, 2 invalid URL, arguments or parse error.`;

export type CommandDeps = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetchPage?: typeof fetchHtml;
  print?: (text: string) => void;
  readTextFile?: (path: string) => Promise<string>;
};

const integerArg = z.string().trim().regex(/^-?\d+$/, "Must be an integer").transform(Number);
const secondsArg = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Must be a number of seconds")
  .transform(Number)
  .refine((n) => n > 0, "Must be greater than zero");

function parseOption<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, string>, raw: string) {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid --${name} "${raw}": ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        top: { type: "string", short: "t" },
        timeout: { type: "string", short: "T" },
        "stop-words": { type: "string" },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new InvalidInputError(errorMessage(err), { cause: err });
  }
}

async function loadStopWords(path: string, read: (path: string) => Promise<string>) {
  try {
    return parseStopWordList(await read(path));
  } catch (err) {
    throw new InvalidInputError(`Cannot read stop-word file ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Runs the analysis for a command line and resolves to the process exit code. */
export async function runAnalyzeCommand(argv: string[], deps: CommandDeps = {}) {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((text: string) => console.log(text));
  const readTextFile = deps.readTextFile ?? ((path: string) => readFile(path, "utf8"));
  let logger = deps.logger ?? createLogger();

  try {
    const config = loadScraperConfig(env);
    logger = deps.logger ?? createLogger(config.logLevel);

    const { values, positionals } = parseCommandLine(argv);
    if (values.help) {
      print(USAGE);
      return 0;
    }
    if (positionals.length !== 1) {
      throw new InvalidInputError(
        positionals.length ? `Expected one url, got ${positionals.length}` : "Missing required argument: url"
      );
    }

    const top = values.top === undefined ? config.defaultTop : validateTop(parseOption("top", integerArg, values.top));
    const timeoutMs =
      values.timeout === undefined ? config.timeoutMs : Math.round(parseOption("timeout", secondsArg, values.timeout) * 1000);
    const stopWords = values["stop-words"] ? await loadStopWords(values["stop-words"], readTextFile) : undefined;

    const result = await analyzeUrl(
      { url: positionals[0], top, timeoutMs, stopWords },
      { config, logger, fetchPage: deps.fetchPage }
    );

    print(values.json ? JSON.stringify(toJsonReport(result), null, 2) : renderAnalysis(result));
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      logger.error(err.message);
      if (err instanceof InvalidInputError) logger.info("Run with --help for usage.");
      return err.exitCode;
    }
    throw err;
  }
}
