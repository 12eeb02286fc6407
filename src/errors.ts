/**
 * Scraper Errors
 * One error class per pipeline stage, all terminal for the current run
 */

export type ScraperStage = "config" | "fetch" | "extract" | "persist";

export class ScraperError extends Error {
  readonly stage: ScraperStage;

  constructor(stage: ScraperStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScraperError";
    this.stage = stage;
  }
}

/**
 * Invalid or missing command-line flags / environment variables
 */
export class ConfigError extends ScraperError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

/**
 * Network failure, timeout or non-2xx response while fetching the careers page
 */
export class FetchError extends ScraperError {
  readonly url: string;
  readonly status: number | null;

  constructor(
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super("fetch", message, { cause: options?.cause });
    this.name = "FetchError";
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/**
 * Malformed CSS selector. Missing fields are not errors.
 */
export class ExtractionError extends ScraperError {
  readonly selector: string;

  constructor(selector: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("extract", `Invalid selector "${selector}": ${reason}`, { cause });
    this.name = "ExtractionError";
    this.selector = selector;
  }
}

export class PersistenceError extends ScraperError {
  readonly target: string;

  constructor(target: string, message: string, cause?: unknown) {
    const reason =
      cause === undefined ? "" : `: ${cause instanceof Error ? cause.message : String(cause)}`;
    super("persist", `${message} (${target})${reason}`, { cause });
    this.name = "PersistenceError";
    this.target = target;
  }
}
