import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";
import pLimit from "p-limit";
import { logger } from "../../lib/logger.js";
import type { ContentProcessor } from "../content/content-processor.js";
import { extractPageMetadata, htmlToText, removeElements } from "../content/html-cleaner.js";
import type { PageRenderer, RenderedPage } from "../renderer/types.js";
import { isValidUrl } from "../validation/url-validator.js";
import { ScrapeError, classifyRenderFailure, errorMessage, toScrapeError } from "./errors.js";
import { buildFailureResult, buildSuccessResult, summarizeBatch } from "./results.js";
import type { BatchResult, ScrapeOptions, ScrapeResult, ScrapeStage, ScrapeSuccess, ScrapingConfig } from "./types.js";

export interface ScraperServiceDeps {
  renderer: PageRenderer;
  contentProcessor: ContentProcessor;
  config: ScrapingConfig;
}

export interface BatchHooks {
  /** Called as each URL finishes, in completion order. */
  onResult?: (result: ScrapeResult, completed: number, total: number) => void;
}

const secondsSince = (startedAt: number) => (performance.now() - startedAt) / 1000;

export class ScraperService {
  constructor(private readonly deps: ScraperServiceDeps) {}

  get rendererName(): string {
    return this.deps.renderer.name;
  }

  /** Releases the renderer's browser processes or clients. */
  close(): Promise<void> {
    return this.deps.renderer.close();
  }

  /** Scrapes one URL. Never rejects: every failure comes back as a failed result. */
  async scrapeSingle(url: string, options: ScrapeOptions): Promise<ScrapeResult> {
    const startedAt = performance.now();

    try {
      this.enter("validating", url);
      if (!isValidUrl(url)) {
        throw ScrapeError.validation(`Invalid or unsafe URL: ${url}`, { field: "url", value: url });
      }

      this.enter("rendering", url);
      const page = await this.render(url, options);

      this.enter("normalizing", url);
      const result = this.normalize(url, page, options, startedAt);

      this.enter("done", url);
      logger.info(
        { url, wordCount: result.wordCount, processingTime: result.processingTime },
        "Scrape completed",
      );
      return result;
    } catch (error) {
      const failure = toScrapeError(error, url);
      logger.warn({ url, errorKind: failure.kind, error: failure.message }, "Scrape failed");
      return buildFailureResult(url, failure, secondsSince(startedAt));
    }
  }

  /**
   * Scrapes a list of URLs through a pool sized for this call. A slot pauses
   * between scrapes while URLs are still queued. Results arrive in completion order.
   */
  async scrapeBatch(urls: readonly string[], options: ScrapeOptions, hooks: BatchHooks = {}): Promise<BatchResult> {
    const startedAt = performance.now();
    if (!urls.length) return summarizeBatch([], 0);

    const limit = pLimit(Math.min(options.maxConcurrent, urls.length));
    const delayMs = options.delayBetweenRequests * 1000;
    const results: ScrapeResult[] = [];

    logger.info(
      { totalUrls: urls.length, maxConcurrent: options.maxConcurrent, delay: options.delayBetweenRequests },
      "Starting batch scrape",
    );

    const tasks = urls.map((url) =>
      limit(async () => {
        const taskStartedAt = performance.now();
        let result: ScrapeResult;
        try {
          result = await this.scrapeSingle(url, options);
        } catch (error) {
          result = buildFailureResult(url, toScrapeError(error, url), secondsSince(taskStartedAt));
        }

        results.push(result);
        hooks.onResult?.(result, results.length, urls.length);

        if (delayMs > 0 && limit.pendingCount > 0) {
          await sleep(delayMs);
        }
      }),
    );

    const settled = await Promise.allSettled(tasks);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        logger.error({ err: outcome.reason }, "Batch task rejected outside its own error handling");
      }
    }

    const batch = summarizeBatch(results, secondsSince(startedAt));
    logger.info(
      {
        totalUrls: batch.totalUrls,
        successful: batch.successfulCount,
        failed: batch.failedCount,
        processingTime: batch.processingTime,
      },
      "Batch scrape completed",
    );
    return batch;
  }

  private enter(stage: ScrapeStage, url: string) {
    logger.debug({ url, stage }, "Scrape stage");
  }

  private async render(url: string, options: ScrapeOptions): Promise<RenderedPage> {
    const deadlineSeconds = this.deps.config.requestTimeout;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        // Settle the race before the renderer reacts to the abort.
        reject(
          ScrapeError.timeout(`Scrape of ${url} exceeded ${deadlineSeconds}s`, {
            url,
            timeoutSeconds: deadlineSeconds,
          }),
        );
        controller.abort();
      }, deadlineSeconds * 1000);
    });

    const rendering = this.deps.renderer.render({
      url,
      headless: options.headless,
      includeTitle: options.includeTitle,
      timeoutMs: options.waitTime * 1000,
      signal: controller.signal,
    });

    try {
      return await Promise.race([rendering, deadline]);
    } catch (error) {
      if (controller.signal.aborted) {
        // The caller's pool slot stays taken until the renderer lets go of the page.
        await rendering.then(
          () => logger.debug({ url }, "Render finished after its deadline"),
          (lateError: unknown) => logger.debug({ url, err: lateError }, "Render settled after its deadline"),
        );
      }
      throw classifyRenderFailure(error, { url, timeoutSeconds: options.waitTime });
    } finally {
      clearTimeout(timer);
    }
  }

  private normalize(url: string, page: RenderedPage, options: ScrapeOptions, startedAt: number): ScrapeSuccess {
    this.deps.contentProcessor.ensureWithinLimit(page.html);

    const selectors = Array.from(new Set([...this.deps.config.defaultRemoveElements, ...options.removeElements]));

    let stripped: string;
    try {
      stripped = removeElements(page.html, selectors);
    } catch (error) {
      throw ScrapeError.contentProcessing(`Element removal failed for ${url}: ${errorMessage(error)}`, {
        url,
        stage: "element_removal",
      });
    }

    const metadata = options.extractMetadata ? extractPageMetadata(page.html) : undefined;
    const title = options.includeTitle ? page.title.trim() || undefined : undefined;
    const processed = this.deps.contentProcessor.process(stripped, title, options.outputFormat);

    return buildSuccessResult({
      url,
      title,
      content: processed.content,
      html: processed.html,
      metadata,
      measuredText: processed.content ?? htmlToText(processed.html ?? ""),
      processingTime: secondsSince(startedAt),
    });
  }
}
