/**
 * Job Extractor Module
 * Applies user-supplied CSS selectors to a careers page and returns one
 * posting per job-container element, in document order
 */

import { load, type CheerioAPI } from "cheerio";
import { ExtractionError } from "./errors";
import { logger } from "./logger";

export interface JobSelectors {
  job: string;
  title: string;
  location: string;
  link: string;
}

/**
 * One extracted posting. `sourceUrl` is the page it came from; the
 * persistence timestamp is added when the batch is stored.
 */
export interface JobPosting {
  title: string | null;
  location: string | null;
  link: string | null;
  sourceUrl: string;
}

/**
 * Minimal view of a parsed element that selector queries run against
 */
export interface SelectorScope {
  selectAll(selector: string): SelectorScope[];
  selectOne(selector: string): SelectorScope | null;
  text(): string;
  attr(name: string): string | null;
}

type ElementSelection = ReturnType<ReturnType<CheerioAPI["root"]>["children"]>;

class CheerioScope implements SelectorScope {
  constructor(private readonly selection: ElementSelection) {}

  selectAll(selector: string): SelectorScope[] {
    const matches = this.selection.find(selector);
    const scopes: SelectorScope[] = [];
    for (let i = 0; i < matches.length; i++) {
      scopes.push(new CheerioScope(matches.eq(i)));
    }
    return scopes;
  }

  selectOne(selector: string): SelectorScope | null {
    const match = this.selection.find(selector).first();
    return match.length > 0 ? new CheerioScope(match) : null;
  }

  text(): string {
    return this.selection.text();
  }

  attr(name: string): string | null {
    return this.selection.attr(name) ?? null;
  }
}

/**
 * Parses HTML into a scope over the document's top-level elements
 */
export function parseDocument(html: string): SelectorScope {
  const $ = load(html);
  return new CheerioScope($.root().children());
}

function query<T>(selector: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    throw new ExtractionError(selector, error);
  }
}

/**
 * Trimmed text, or null when nothing is left
 */
export function cleanText(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Resolves a possibly relative href against the page URL.
 * Values that are not parseable as URLs are returned as written.
 */
export function resolveLink(href: string | null, sourceUrl: string): string | null {
  const value = cleanText(href);
  if (value === null) return null;

  try {
    return new URL(value, sourceUrl).href;
  } catch {
    logger.debug(`Keeping unparseable link as-is: ${value}`);
    return value;
  }
}

function extractPosting(
  container: SelectorScope,
  selectors: JobSelectors,
  sourceUrl: string
): JobPosting {
  const titleNode = query(selectors.title, () => container.selectOne(selectors.title));
  const locationNode = query(selectors.location, () =>
    container.selectOne(selectors.location)
  );
  const linkNode = query(selectors.link, () => container.selectOne(selectors.link));

  return {
    title: cleanText(titleNode ? titleNode.text() : null),
    location: cleanText(locationNode ? locationNode.text() : null),
    link: resolveLink(linkNode ? linkNode.attr("href") : null, sourceUrl),
    sourceUrl,
  };
}

/**
 * Extracts job postings from HTML.
 * Every job-container match yields exactly one posting; missing sub-elements
 * leave the corresponding field null. No match at all yields [].
 */
export function extractJobPostings(
  html: string,
  sourceUrl: string,
  selectors: JobSelectors
): JobPosting[] {
  const document = parseDocument(html);

  // Compile every selector against the document up front so a malformed
  // sub-selector is reported even when no container matches
  for (const selector of [selectors.title, selectors.location, selectors.link]) {
    query(selector, () => document.selectOne(selector));
  }

  const containers = query(selectors.job, () => document.selectAll(selectors.job));
  const postings = containers.map((container) =>
    extractPosting(container, selectors, sourceUrl)
  );

  logger.debug(`Matched ${containers.length} job containers`, {
    context: { selector: selectors.job, sourceUrl },
  });

  return postings;
}
