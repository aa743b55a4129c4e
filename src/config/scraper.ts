import { z } from "zod";
import { ConfigError } from "../utils/errors";
import { LOG_LEVELS, LogLevel } from "../utils/logger";
import { staticCorsOrigins } from "./cors";

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; WebFreqBot/1.0)";

const envSchema = z.object({
  SCRAPER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SCRAPER_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  SCRAPER_DEFAULT_TOP: z.coerce.number().int().nonnegative().default(100),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  PORT: z.coerce.number().int().positive().max(65_535).default(5050),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  CORS_ORIGIN: z.string().optional(),
});

export type ScraperConfig = {
  timeoutMs: number;
  userAgent: string;
  defaultTop: number;
  logLevel: LogLevel;
};

export type ServerConfig = {
  port: number;
  rateLimitMax: number;
  corsOrigins: string[];
};

// Empty strings count as unset, so a blank line in .env falls back to the default.
function presentOnly(env: NodeJS.ProcessEnv) {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
}

function parseEnv(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(presentOnly(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid scraper configuration: ${issues}`);
  }
  return parsed;
}

export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = parseEnv(env);
  return {
    timeoutMs: parsed.data.SCRAPER_TIMEOUT_MS,
    userAgent: parsed.data.SCRAPER_USER_AGENT,
    defaultTop: parsed.data.SCRAPER_DEFAULT_TOP,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const { data } = parseEnv(env);
  return {
    port: data.PORT,
    rateLimitMax: data.RATE_LIMIT_MAX,
    corsOrigins: staticCorsOrigins(data.CORS_ORIGIN),
  };
}
