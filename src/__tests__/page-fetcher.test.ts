import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fetchPageHtml, DEFAULT_USER_AGENT, DEFAULT_FETCH_TIMEOUT_MS } from "../page-fetcher";
import { FetchError } from "../errors";

const PAGE_URL = "https://x.com/careers";

describe("fetchPageHtml", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the response body", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("<html><body>jobs</body></html>", { status: 200 })
    );

    await expect(fetchPageHtml(PAGE_URL)).resolves.toBe("<html><body>jobs</body></html>");
  });

  it("should send a descriptive user agent and follow redirects", async () => {
    const fetchMock = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("ok", { status: 200 }));

    await fetchPageHtml(PAGE_URL);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [requested, init] = fetchMock.mock.calls[0];
    expect(requested).toBe(PAGE_URL);
    expect(init).toMatchObject({
      method: "GET",
      redirect: "follow",
      headers: expect.objectContaining({ "User-Agent": DEFAULT_USER_AGENT }),
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should use a custom user agent", async () => {
    const fetchMock = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("ok", { status: 200 }));

    await fetchPageHtml(PAGE_URL, { userAgent: "acme-bot/2.0" });

    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      headers: expect.objectContaining({ "User-Agent": "acme-bot/2.0" }),
    });
  });

  it("should throw FetchError with the status code on non-success responses", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("missing", { status: 404, statusText: "Not Found" })
    );

    const error = await fetchPageHtml(PAGE_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      stage: "fetch",
      url: PAGE_URL,
      status: 404,
      message: "HTTP 404: Not Found (https://x.com/careers)",
    });
  });

  it("should not retry after a failure", async () => {
    const fetchMock = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("down", { status: 503, statusText: "Service Unavailable" }));

    await expect(fetchPageHtml(PAGE_URL)).rejects.toBeInstanceOf(FetchError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should carry the underlying cause on network failures", async () => {
    const refused = new Error("connect ECONNREFUSED 127.0.0.1:443");
    vi.spyOn(globalThis, "fetch").mockRejectedValue(
      new TypeError("fetch failed", { cause: refused })
    );

    const error = await fetchPageHtml(PAGE_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      status: null,
      message: "Failed to fetch https://x.com/careers: connect ECONNREFUSED 127.0.0.1:443",
    });
    expect(error instanceof FetchError ? error.cause : undefined).toBe(refused);
  });

  it("should report timeouts", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
      name: "TimeoutError",
    });
    vi.spyOn(globalThis, "fetch").mockRejectedValue(timeout);

    await expect(fetchPageHtml(PAGE_URL, { timeoutMs: 5000 })).rejects.toMatchObject({
      message: "Timed out after 5000ms fetching https://x.com/careers",
    });
  });

  it("should default to a 30 second timeout", () => {
    expect(DEFAULT_FETCH_TIMEOUT_MS).toBe(30_000);
  });
});
