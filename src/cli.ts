/**
 * Command-line runner
 * Returns the process exit code instead of exiting, so it can be tested
 */

import { scrapeAndStore } from "./careers-scraper";
import { USAGE, parseCommand, type Env } from "./config";
import { ScraperError } from "./errors";
import { logger } from "./logger";

const STAGE_LABELS: Record<ScraperError["stage"], string> = {
  config: "Configuration",
  fetch: "Fetch",
  extract: "Extraction",
  persist: "Persistence",
};

export async function runCli(argv: string[], env: Env): Promise<number> {
  try {
    const command = parseCommand(argv, env);

    if (command.kind === "help") {
      console.log(USAGE);
      return 0;
    }

    const result = await scrapeAndStore(command.config);
    console.log(`Inserted ${result.inserted} jobs into ${result.target}.`);
    return 0;
  } catch (error) {
    logger.errorFromException(error, { source: "cli" });

    if (error instanceof ScraperError) {
      console.error(`\n✗ ${STAGE_LABELS[error.stage]} failed: ${error.message}`);
      if (error.stage === "config") {
        console.error(USAGE);
      }
    } else {
      console.error("\n✗ Error:", error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}
