import axios from "axios";
import { FetchError } from "../utils/errors";
import { DEFAULT_USER_AGENT } from "../config/scraper";

export type FetchOptions = {
  timeoutMs?: number;
  userAgent?: string;
};

function describeFailure(err: unknown) {
  if (axios.isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}${err.response.statusText ? ` ${err.response.statusText}` : ""}`;
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") return "request timed out";
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** One GET, no retries. Any failure, including a non-2xx status, becomes a FetchError. */
export async function fetchHtml(url: string, options: FetchOptions = {}) {
  try {
    const res = await axios.get<string>(url, {
      timeout: options.timeoutMs ?? 10_000,
      responseType: "text",
      headers: {
        "User-Agent": options.userAgent || DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
    });
    return res.data ?? "";
  } catch (err) {
    throw new FetchError(`Failed to fetch ${url}: ${describeFailure(err)}`, { cause: err });
  }
}
