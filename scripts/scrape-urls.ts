/**
 * Scrapes one or more URLs with the configured renderer and prints the JSON
 * result, in the same shape the HTTP API returns.
 *
 * Usage: npx tsx scripts/scrape-urls.ts [--format markdown|html|both] [--concurrency 3] [--delay 1] [--metadata] <url...>
 *
 * Renderer settings come from the environment (.env), see .env.example.
 */

import { createScrapeCommand, type ScrapeCommandOptions } from "../src/cli/scrape-command.js";
import { scrapingConfig } from "../src/config/env.js";
import { buildScrapeOptions } from "../src/services/scraper/options.js";
import { toBatchResponse } from "../src/services/scraper/response.js";
import { createScraperService } from "../src/services/scraper/index.js";
import { validateUrlBatch } from "../src/services/validation/url-validator.js";

async function scrapeUrls(urls: string[], options: ScrapeCommandOptions) {
  const scrapeOptions = buildScrapeOptions(
    {
      outputFormat: options.format,
      extractMetadata: options.metadata,
      maxConcurrent: options.concurrency,
      delayBetweenRequests: options.delay,
    },
    scrapingConfig,
  );

  const validUrls = validateUrlBatch(urls);
  const { scraperService } = createScraperService();

  try {
    const batch = await scraperService.scrapeBatch(validUrls, scrapeOptions, {
      onResult: (result, completed, total) => {
        console.error(`[${completed}/${total}] ${result.success ? "ok" : "failed"} ${result.url}`);
      },
    });
    console.log(JSON.stringify(toBatchResponse(batch), null, 2));
    if (batch.failedCount === batch.totalUrls) process.exitCode = 1;
  } finally {
    await scraperService.close();
  }
}

createScrapeCommand(scrapeUrls)
  .parseAsync()
  .catch((error: unknown) => {
    console.error("Scrape failed:", error);
    process.exit(1);
  });
