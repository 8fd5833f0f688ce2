import { contentProcessingConfig, scrapingConfig } from "../../config/env.js";
import { ContentProcessor } from "../content/content-processor.js";
import { selectRenderer } from "../renderer/index.js";
import type { PageRenderer } from "../renderer/types.js";
import { ScraperService } from "./scraper.service.js";

/** Wires the configured renderer and content processor into a scraper. */
export const createScraperService = (renderer: PageRenderer = selectRenderer()) => {
  const contentProcessor = new ContentProcessor(contentProcessingConfig);
  const scraperService = new ScraperService({ renderer, contentProcessor, config: scrapingConfig });
  return { scraperService, contentProcessor };
};
