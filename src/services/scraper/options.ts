import { validateCssSelectors } from "../validation/selector-validator.js";
import type { OutputFormat, ScrapeOptions, ScrapingConfig } from "./types.js";

export interface ScrapeOptionsInput {
  waitTime?: number;
  headless?: boolean;
  includeTitle?: boolean;
  removeElements?: readonly string[] | null;
  extractMetadata?: boolean;
  outputFormat?: OutputFormat;
  maxConcurrent?: number;
  delayBetweenRequests?: number;
}

export const DEFAULT_SCRAPE_OPTIONS = {
  waitTime: 5,
  headless: true,
  includeTitle: true,
  extractMetadata: false,
  outputFormat: "markdown",
  maxConcurrent: 3,
  delayBetweenRequests: 1.0,
} as const satisfies Omit<ScrapeOptions, "removeElements">;

export const WAIT_TIME_RANGE = { min: 1, max: 30 } as const;
export const MAX_CONCURRENT_RANGE = { min: 1, max: 10 } as const;
export const DELAY_RANGE = { min: 0, max: 10 } as const;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

/**
 * Applies defaults and service limits once and freezes the result. Unsafe
 * selectors are dropped; more than the allowed number is a validation error.
 */
export const buildScrapeOptions = (input: ScrapeOptionsInput, config: ScrapingConfig): ScrapeOptions => {
  const waitTime = clamp(
    Math.round(input.waitTime ?? config.defaultWaitTime),
    WAIT_TIME_RANGE.min,
    Math.min(WAIT_TIME_RANGE.max, config.maxWaitTime),
  );

  const maxConcurrent = clamp(
    Math.round(input.maxConcurrent ?? DEFAULT_SCRAPE_OPTIONS.maxConcurrent),
    MAX_CONCURRENT_RANGE.min,
    Math.min(MAX_CONCURRENT_RANGE.max, config.maxConcurrentRequests),
  );

  const delayBetweenRequests = clamp(
    input.delayBetweenRequests ?? DEFAULT_SCRAPE_OPTIONS.delayBetweenRequests,
    DELAY_RANGE.min,
    DELAY_RANGE.max,
  );

  return Object.freeze({
    waitTime,
    headless: input.headless ?? DEFAULT_SCRAPE_OPTIONS.headless,
    includeTitle: input.includeTitle ?? DEFAULT_SCRAPE_OPTIONS.includeTitle,
    removeElements: Object.freeze(validateCssSelectors(input.removeElements)),
    extractMetadata: input.extractMetadata ?? DEFAULT_SCRAPE_OPTIONS.extractMetadata,
    outputFormat: input.outputFormat ?? DEFAULT_SCRAPE_OPTIONS.outputFormat,
    maxConcurrent,
    delayBetweenRequests,
  });
};
