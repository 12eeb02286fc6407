/**
 * Configuration management
 * Command-line flags first, environment variables second
 */

import { parseArgs } from "node:util";
import { ConfigError } from "./errors";
import type { JobSelectors } from "./job-extractor";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./page-fetcher";

export type Env = Record<string, string | undefined>;

export interface ScraperConfig {
  url: string;
  selectors: JobSelectors;
  dbTarget: string;
  replace: boolean;
  userAgent: string;
  timeoutMs: number;
}

export type CliCommand = { kind: "help" } | { kind: "scrape"; config: ScraperConfig };

export const USAGE = `
Usage:
  scrape-careers --url <careers page> \\
    --job-selector <css> --title-selector <css> \\
    --location-selector <css> --link-selector <css> \\
    [--db-url <path | md:database>] [--replace] \\
    [--user-agent <string>] [--timeout <ms>]

Environment:
  CAREERS_DB_URL             Database target when --db-url is omitted
  CAREERS_DB_PATH            Used when neither --db-url nor CAREERS_DB_URL is set
  CAREERS_USER_AGENT         Default User-Agent (${DEFAULT_USER_AGENT})
  CAREERS_FETCH_TIMEOUT_MS   Default fetch timeout (${DEFAULT_FETCH_TIMEOUT_MS})
  LOG_LEVEL                  error | warning | info | debug
`;

const OPTIONS = {
  url: { type: "string" },
  "job-selector": { type: "string" },
  "title-selector": { type: "string" },
  "location-selector": { type: "string" },
  "link-selector": { type: "string" },
  "db-url": { type: "string" },
  replace: { type: "boolean", default: false },
  "user-agent": { type: "string" },
  timeout: { type: "string" },
  help: { type: "boolean", short: "h", default: false },
} as const;

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Database target precedence: flag > CAREERS_DB_URL > CAREERS_DB_PATH.
 * Empty values count as unset.
 */
export function resolveDatabaseTarget(flag: string | undefined, env: Env): string {
  const target =
    nonEmpty(flag) ?? nonEmpty(env.CAREERS_DB_URL) ?? nonEmpty(env.CAREERS_DB_PATH);

  if (!target) {
    throw new ConfigError(
      "No database target: pass --db-url or set CAREERS_DB_URL / CAREERS_DB_PATH"
    );
  }
  return target;
}

export function parseTimeout(value: string | undefined): number {
  const raw = nonEmpty(value);
  if (raw === undefined) return DEFAULT_FETCH_TIMEOUT_MS;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Timeout must be a positive number of milliseconds, got "${raw}"`);
  }
  return parsed;
}

function requireFlag(values: Record<string, unknown>, name: string): string {
  const raw = values[name];
  const value = typeof raw === "string" ? nonEmpty(raw) : undefined;
  if (value === undefined) {
    throw new ConfigError(`Missing required option --${name}`);
  }
  return value;
}

function parseSourceUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`--url must be an absolute URL, got "${value}"`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`--url must use http or https, got "${parsed.protocol}"`);
  }
  return value;
}

/**
 * Parses argv (without the node/script prefix) into a command
 */
export function parseCommand(argv: string[], env: Env): CliCommand {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  if (values.help === true) {
    return { kind: "help" };
  }

  return { kind: "scrape", config: loadConfig(values, env) };
}

/**
 * Builds the scraper configuration from parsed flag values and the environment
 */
export function loadConfig(values: Record<string, unknown>, env: Env): ScraperConfig {
  const url = parseSourceUrl(requireFlag(values, "url"));

  const selectors: JobSelectors = {
    job: requireFlag(values, "job-selector"),
    title: requireFlag(values, "title-selector"),
    location: requireFlag(values, "location-selector"),
    link: requireFlag(values, "link-selector"),
  };

  const dbFlag = typeof values["db-url"] === "string" ? values["db-url"] : undefined;
  const userAgentFlag =
    typeof values["user-agent"] === "string" ? values["user-agent"] : undefined;
  const timeoutFlag = typeof values.timeout === "string" ? values.timeout : undefined;

  return {
    url,
    selectors,
    dbTarget: resolveDatabaseTarget(dbFlag, env),
    replace: values.replace === true,
    userAgent: nonEmpty(userAgentFlag) ?? nonEmpty(env.CAREERS_USER_AGENT) ?? DEFAULT_USER_AGENT,
    timeoutMs: parseTimeout(timeoutFlag ?? env.CAREERS_FETCH_TIMEOUT_MS),
  };
}
