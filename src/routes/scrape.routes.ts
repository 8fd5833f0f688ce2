import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { SERVICE_NAME, SERVICE_VERSION } from "../lib/service-info.js";
import type { ContentProcessingConfig } from "../services/content/types.js";
import { buildScrapeOptions, type ScrapeOptionsInput } from "../services/scraper/options.js";
import { toBatchResponse, toScrapeResponse } from "../services/scraper/response.js";
import type { ScraperService } from "../services/scraper/scraper.service.js";
import { OUTPUT_FORMATS, type BatchResult, type ScrapingConfig } from "../services/scraper/types.js";
import { MAX_URL_LENGTH, validateUrlBatch } from "../services/validation/url-validator.js";

export const MAX_BATCH_SIZE = 50;

const urlSchema = z.string().trim().url().max(MAX_URL_LENGTH);

const scrapeOptionsSchema = z.object({
  wait_time: z.number().int().min(1).max(30).optional(),
  headless: z.boolean().optional(),
  include_title: z.boolean().optional(),
  remove_elements: z.array(z.string().min(1).max(100)).max(50).optional(),
  extract_metadata: z.boolean().optional(),
  output_format: z.enum(["markdown", "html", "both"]).optional(),
});

const singleScrapeSchema = scrapeOptionsSchema.extend({
  url: urlSchema,
});

const batchScrapeSchema = scrapeOptionsSchema.extend({
  urls: z
    .array(urlSchema)
    .min(1)
    .max(MAX_BATCH_SIZE)
    .refine((urls) => new Set(urls).size === urls.length, { message: "Duplicate URLs are not allowed" }),
  max_concurrent: z.number().int().min(1).max(10).optional(),
  delay_between_requests: z.number().min(0.1).max(10).optional(),
});

type ScrapeOptionsPayload = z.infer<typeof scrapeOptionsSchema> & {
  max_concurrent?: number;
  delay_between_requests?: number;
};

const toOptionsInput = (payload: ScrapeOptionsPayload): ScrapeOptionsInput => ({
  waitTime: payload.wait_time,
  headless: payload.headless,
  includeTitle: payload.include_title,
  removeElements: payload.remove_elements,
  extractMetadata: payload.extract_metadata,
  outputFormat: payload.output_format,
  maxConcurrent: payload.max_concurrent,
  delayBetweenRequests: payload.delay_between_requests,
});

/** 200 when every URL succeeded, 422 when none did, 207 otherwise. */
export const resolveBatchStatus = (batch: Pick<BatchResult, "totalUrls" | "successfulCount">): number => {
  if (batch.successfulCount === batch.totalUrls) return 200;
  if (batch.successfulCount === 0) return 422;
  return 207;
};

export interface ScrapeRouterDeps {
  scraper: ScraperService;
  scrapingConfig: ScrapingConfig;
  contentConfig: ContentProcessingConfig;
  batchLimiter?: RequestHandler;
}

export const createScrapeRouter = ({ scraper, scrapingConfig, contentConfig, batchLimiter }: ScrapeRouterDeps) => {
  const router = Router();

  router.post("/", async (req, res, next) => {
    try {
      const payload = singleScrapeSchema.parse(req.body);
      const options = buildScrapeOptions(toOptionsInput(payload), scrapingConfig);
      const result = await scraper.scrapeSingle(payload.url, options);
      res.status(result.success ? 200 : 422).json(toScrapeResponse(result));
    } catch (error) {
      next(error);
    }
  });

  if (batchLimiter) router.use("/batch", batchLimiter);

  router.post("/batch", async (req, res, next) => {
    try {
      const payload = batchScrapeSchema.parse(req.body);
      const options = buildScrapeOptions(toOptionsInput(payload), scrapingConfig);
      const urls = validateUrlBatch(payload.urls);
      const batch = await scraper.scrapeBatch(urls, options);
      res.status(resolveBatchStatus(batch)).json(toBatchResponse(batch));
    } catch (error) {
      next(error);
    }
  });

  router.get("/status", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: "operational",
      version: SERVICE_VERSION,
      renderer: scraper.rendererName,
      timestamp: new Date().toISOString(),
      capabilities: {
        single_scrape: true,
        batch_scrape: true,
        max_concurrent: scrapingConfig.maxConcurrentRequests,
        supported_formats: OUTPUT_FORMATS,
        metadata_extraction: true,
        custom_selectors: true,
      },
      limits: {
        max_concurrent_requests: scrapingConfig.maxConcurrentRequests,
        max_wait_time: scrapingConfig.maxWaitTime,
        request_timeout: scrapingConfig.requestTimeout,
        max_batch_size: MAX_BATCH_SIZE,
        max_url_length: MAX_URL_LENGTH,
        max_content_length: contentConfig.maxContentLength,
      },
    });
  });

  return router;
};
