/**
 * Careers Scraper
 * fetch -> extract -> persist for a single careers page
 */

import type { ScraperConfig } from "./config";
import { persistPostings, redactTarget } from "./database";
import { extractJobPostings } from "./job-extractor";
import { logger } from "./logger";
import { fetchPageHtml } from "./page-fetcher";

export interface ScrapeResult {
  sourceUrl: string;
  found: number;
  inserted: number;
  /** Database target with any token redacted */
  target: string;
}

/**
 * Runs the pipeline once. Any stage failure aborts the remaining stages,
 * and the database is only opened after fetching and extraction succeed.
 */
export async function scrapeAndStore(config: ScraperConfig): Promise<ScrapeResult> {
  const html = await fetchPageHtml(config.url, {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
  });

  const postings = extractJobPostings(html, config.url, config.selectors);

  if (postings.length === 0) {
    logger.warning(`No job containers matched "${config.selectors.job}" on ${config.url}`);
  } else {
    logger.info(`Extracted ${postings.length} postings from ${config.url}`);
  }

  const inserted = await persistPostings(postings, config.url, config.dbTarget, {
    replace: config.replace,
  });

  return {
    sourceUrl: config.url,
    found: postings.length,
    inserted,
    target: redactTarget(config.dbTarget),
  };
}
