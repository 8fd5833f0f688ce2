import type { BatchResult, PageMetadata, ScrapeResult } from "./types.js";

const toMetadataResponse = (metadata: PageMetadata) => ({
  ...(metadata.description ? { description: metadata.description } : {}),
  ...(metadata.keywords ? { keywords: metadata.keywords } : {}),
  ...(metadata.author ? { author: metadata.author } : {}),
  ...(metadata.publishedDate ? { published_date: metadata.publishedDate } : {}),
  ...(metadata.canonicalUrl ? { canonical_url: metadata.canonicalUrl } : {}),
  ...(metadata.language ? { language: metadata.language } : {}),
});

export const toScrapeResponse = (result: ScrapeResult) => {
  if (!result.success) {
    return {
      success: false,
      url: result.url,
      error: result.error,
      error_type: result.errorKind,
      error_code: result.errorCode,
      error_details: result.errorDetails,
      processing_time: result.processingTime,
      timestamp: result.timestamp,
    };
  }

  return {
    success: true,
    url: result.url,
    ...(result.title !== undefined ? { title: result.title } : {}),
    ...(result.content !== undefined ? { content: result.content } : {}),
    ...(result.html !== undefined ? { html: result.html } : {}),
    ...(result.metadata ? { metadata: toMetadataResponse(result.metadata) } : {}),
    length: result.length,
    word_count: result.wordCount,
    processing_time: result.processingTime,
    timestamp: result.timestamp,
  };
};

export const toBatchResponse = (batch: BatchResult) => ({
  success: batch.success,
  total_urls: batch.totalUrls,
  successful_scrapes: batch.successfulCount,
  failed_scrapes: batch.failedCount,
  results: batch.results.map(toScrapeResponse),
  processing_time: batch.processingTime,
  total_words: batch.totalWords,
  total_content_length: batch.totalContentLength,
  average_processing_time: batch.averageProcessingTime,
  timestamp: batch.timestamp,
});
