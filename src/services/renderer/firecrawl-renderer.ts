import FirecrawlApp from "@mendable/firecrawl-js";
import { logger } from "../../lib/logger.js";
import type { PageRenderer, RenderRequest, RenderedPage } from "./types.js";

// Subset of the SDK document we read.
interface FirecrawlScrapeDocument {
  rawHtml?: string;
  html?: string;
  metadata?: {
    title?: string | string[];
    ogTitle?: string;
    statusCode?: number;
    error?: string;
    [key: string]: unknown;
  };
}

export interface FirecrawlRendererOptions {
  apiKey: string;
  apiUrl?: string;
}

/**
 * Renders through the hosted Firecrawl scrape API. The SDK call cannot be
 * cancelled, so an aborted request is only dropped by the caller's deadline.
 */
export class FirecrawlRenderer implements PageRenderer {
  readonly name = "firecrawl";

  private client: FirecrawlApp | null = null;

  constructor(private readonly options: FirecrawlRendererOptions) {}

  private getClient(): FirecrawlApp {
    if (!this.client) {
      this.client = new FirecrawlApp({ apiKey: this.options.apiKey, apiUrl: this.options.apiUrl });
    }
    return this.client;
  }

  async render(request: RenderRequest): Promise<RenderedPage> {
    const document = (await this.getClient().scrape(request.url, {
      formats: ["rawHtml"],
      onlyMainContent: false,
      blockAds: true,
      timeout: request.timeoutMs,
    })) as unknown as FirecrawlScrapeDocument;

    const statusCode = document.metadata?.statusCode;
    if (statusCode && statusCode >= 400) {
      throw new Error(`net::ERR_HTTP_RESPONSE_CODE_FAILURE ${statusCode} for ${request.url}`);
    }

    const html = document.rawHtml ?? document.html;
    if (html === undefined) {
      logger.warn({ url: request.url, error: document.metadata?.error }, "Firecrawl returned no HTML");
      throw new Error(`Firecrawl returned no HTML for ${request.url}`);
    }

    return { html, title: request.includeTitle ? this.readTitle(document) : "" };
  }

  async close(): Promise<void> {
    this.client = null;
  }

  private readTitle(document: FirecrawlScrapeDocument): string {
    const title = document.metadata?.title;
    if (Array.isArray(title)) return title[0] ?? "";
    return title ?? document.metadata?.ogTitle ?? "";
  }
}
