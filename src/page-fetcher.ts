/**
 * Page Fetcher Module
 * Fetches the raw HTML of a careers page with a single GET request
 */

import { FetchError } from "./errors";
import { logger } from "./logger";

/**
 * Identifies the scraper to the sites it visits
 */
export const DEFAULT_USER_AGENT = "careers-scraper/1.0";

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface FetchPageOptions {
  userAgent?: string;
  timeoutMs?: number;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Fetches HTML content from a URL. No retries: any failure aborts the run.
 */
export async function fetchPageHtml(
  url: string,
  options: FetchPageOptions = {}
): Promise<string> {
  const userAgent = options.userAgent || DEFAULT_USER_AGENT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  logger.debug(`Fetching careers page: ${url}`, { context: { timeoutMs } });

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new FetchError(url, `Timed out after ${timeoutMs}ms fetching ${url}`, {
        cause: error,
      });
    }
    // undici reports the socket error (ECONNREFUSED, ENOTFOUND...) as the cause
    const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new FetchError(url, `Failed to fetch ${url}: ${reason}`, { cause });
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status}: ${response.statusText} (${url})`, {
      status: response.status,
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(url, `Failed to read response body from ${url}`, {
      cause: error,
    });
  }
}
