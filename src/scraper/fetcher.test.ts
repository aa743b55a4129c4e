import axios, { AxiosError, AxiosHeaders, AxiosResponse } from "axios";
import { describe, expect, it, vi } from "vitest";
import { FetchError } from "../utils/errors";
import { fetchHtml } from "./fetcher";

function response(status: number, data: string, statusText = "OK"): AxiosResponse<string> {
  return { data, status, statusText, headers: {}, config: { headers: new AxiosHeaders() } };
}

describe("fetchHtml", () => {
  it("returns the body and sends the configured headers and timeout", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(response(200, "<p>hi</p>"));

    await expect(fetchHtml("https://example.com/", { timeoutMs: 2500, userAgent: "test-agent" })).resolves.toBe(
      "<p>hi</p>"
    );
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith("https://example.com/", {
      timeout: 2500,
      responseType: "text",
      headers: { "User-Agent": "test-agent", Accept: "text/html,application/xhtml+xml" },
    });
  });

  it("defaults to a ten second timeout", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(response(200, ""));
    await fetchHtml("https://example.com/");
    expect(get.mock.calls[0][1]).toMatchObject({ timeout: 10_000 });
  });

  it("reports HTTP errors with the status", async () => {
    const failed = new AxiosError(
      "Request failed with status code 404",
      "ERR_BAD_REQUEST",
      undefined,
      undefined,
      response(404, "", "Not Found")
    );
    vi.spyOn(axios, "get").mockRejectedValue(failed);

    const err = await fetchHtml("https://example.com/missing").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({
      message: "Failed to fetch https://example.com/missing: HTTP 404 Not Found",
      exitCode: 1,
      status: 502,
    });
  });

  it("reports timeouts", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(new AxiosError("timeout of 10ms exceeded", "ECONNABORTED"));
    await expect(fetchHtml("https://example.com/slow")).rejects.toThrow(
      "Failed to fetch https://example.com/slow: request timed out"
    );
  });

  it("reports transport errors with their code", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(new AxiosError("getaddrinfo ENOTFOUND nope.invalid", "ENOTFOUND"));
    await expect(fetchHtml("https://nope.invalid/")).rejects.toThrow(
      "Failed to fetch https://nope.invalid/: ENOTFOUND: getaddrinfo ENOTFOUND nope.invalid"
    );
  });

  it("does not retry", async () => {
    const get = vi.spyOn(axios, "get").mockRejectedValue(new AxiosError("socket hang up", "ECONNRESET"));
    await expect(fetchHtml("https://example.com/")).rejects.toBeInstanceOf(FetchError);
    expect(get).toHaveBeenCalledTimes(1);
  });
});
