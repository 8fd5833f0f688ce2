import { ScrapeError } from "./errors.js";
import type { BatchResult, PageMetadata, ScrapeFailure, ScrapeResult, ScrapeSuccess } from "./types.js";

const WHITESPACE_RUN = /\s+/;

export const countWords = (text: string): number => text.split(WHITESPACE_RUN).filter(Boolean).length;

const roundSeconds = (seconds: number) => Math.round(seconds * 1000) / 1000;

export interface SuccessInput {
  url: string;
  title?: string;
  content?: string;
  html?: string;
  metadata?: PageMetadata;
  /** Text used for length and word count. */
  measuredText: string;
  processingTime: number;
}

export const buildSuccessResult = (input: SuccessInput): ScrapeSuccess => {
  if (input.content === undefined && input.html === undefined) {
    throw ScrapeError.contentProcessing(`No content produced for ${input.url}`, {
      url: input.url,
      stage: "conversion",
    });
  }

  const result: ScrapeSuccess = {
    success: true,
    url: input.url,
    ...(input.title ? { title: input.title } : {}),
    ...(input.content !== undefined ? { content: input.content } : {}),
    ...(input.html !== undefined ? { html: input.html } : {}),
    ...(input.metadata ? { metadata: Object.freeze({ ...input.metadata }) } : {}),
    length: input.measuredText.length,
    wordCount: countWords(input.measuredText),
    processingTime: roundSeconds(input.processingTime),
    timestamp: new Date().toISOString(),
  };
  return Object.freeze(result);
};

export const buildFailureResult = (url: string, error: ScrapeError, processingTime: number): ScrapeFailure => {
  const result: ScrapeFailure = {
    success: false,
    url,
    processingTime: roundSeconds(processingTime),
    timestamp: new Date().toISOString(),
    error: error.message,
    errorKind: error.kind,
    errorCode: error.code,
    errorDetails: error.details,
  };
  return Object.freeze(result);
};

export const summarizeBatch = (results: readonly ScrapeResult[], processingTime: number): BatchResult => {
  let successfulCount = 0;
  let totalWords = 0;
  let totalContentLength = 0;
  let totalProcessingTime = 0;

  for (const result of results) {
    totalProcessingTime += result.processingTime;
    if (result.success) {
      successfulCount += 1;
      totalWords += result.wordCount;
      totalContentLength += result.length;
    }
  }

  const batch: BatchResult = {
    success: true,
    totalUrls: results.length,
    successfulCount,
    failedCount: results.length - successfulCount,
    results: Object.freeze([...results]),
    processingTime: roundSeconds(processingTime),
    totalWords,
    totalContentLength,
    averageProcessingTime: results.length ? roundSeconds(totalProcessingTime / results.length) : null,
    timestamp: new Date().toISOString(),
  };
  return Object.freeze(batch);
};
