import type { ScrapeErrorCode, ScrapeErrorDetails, ScrapeErrorKind } from "./errors.js";

export type OutputFormat = "markdown" | "html" | "both";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["markdown", "html", "both"];

export interface ScrapeOptions {
  readonly waitTime: number;
  readonly headless: boolean;
  readonly includeTitle: boolean;
  readonly removeElements: readonly string[];
  readonly extractMetadata: boolean;
  readonly outputFormat: OutputFormat;
  readonly maxConcurrent: number;
  /** Seconds a batch slot pauses after each scrape. */
  readonly delayBetweenRequests: number;
}

export interface ScrapingConfig {
  readonly defaultWaitTime: number;
  readonly maxWaitTime: number;
  readonly maxConcurrentRequests: number;
  /** Hard ceiling in seconds for one render, browser start-up included. */
  readonly requestTimeout: number;
  readonly defaultRemoveElements: readonly string[];
}

export interface PageMetadata {
  description?: string;
  keywords?: string;
  author?: string;
  publishedDate?: string;
  canonicalUrl?: string;
  language?: string;
}

export interface ScrapeSuccess {
  readonly success: true;
  readonly url: string;
  readonly title?: string;
  readonly content?: string;
  readonly html?: string;
  readonly metadata?: PageMetadata;
  readonly length: number;
  readonly wordCount: number;
  readonly processingTime: number;
  readonly timestamp: string;
}

export interface ScrapeFailure {
  readonly success: false;
  readonly url: string;
  readonly processingTime: number;
  readonly timestamp: string;
  readonly error: string;
  readonly errorKind: ScrapeErrorKind;
  readonly errorCode: ScrapeErrorCode;
  readonly errorDetails: ScrapeErrorDetails;
}

export type ScrapeResult = ScrapeSuccess | ScrapeFailure;

export interface BatchResult {
  readonly success: true;
  readonly totalUrls: number;
  readonly successfulCount: number;
  readonly failedCount: number;
  readonly results: readonly ScrapeResult[];
  readonly processingTime: number;
  readonly totalWords: number;
  readonly totalContentLength: number;
  readonly averageProcessingTime: number | null;
  readonly timestamp: string;
}

export type ScrapeStage = "pending" | "validating" | "rendering" | "normalizing" | "done";
