import * as cheerio from "cheerio";
import { logger } from "../../lib/logger.js";
import type { PageMetadata } from "../scraper/types.js";

const SCRIPT_BLOCK = /<script[^>]*>[\s\S]*?<\/script>/gi;
const STYLE_BLOCK = /<style[^>]*>[\s\S]*?<\/style>/gi;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const WHITESPACE_RUN = /\s+/g;
const BLANK_LINES = /\n\s*\n/g;

const PUBLISHED_DATE_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[name="publication_date"]',
  'meta[name="date"]',
];

/** Strips scripts, styles and comments, then collapses whitespace. */
export const cleanHtml = (html: string): string =>
  html
    .replace(SCRIPT_BLOCK, "")
    .replace(STYLE_BLOCK, "")
    .replace(HTML_COMMENT, "")
    .replace(WHITESPACE_RUN, " ")
    .replace(BLANK_LINES, "\n")
    .trim();

/**
 * Removes every element matching one of the selectors. A selector the parser
 * rejects is skipped with a warning.
 */
export const removeElements = (html: string, selectors: readonly string[]): string => {
  if (!selectors.length) return html;

  const $ = cheerio.load(html);
  for (const selector of selectors) {
    try {
      $(selector).remove();
    } catch (error) {
      logger.warn({ err: error, selector }, "Skipping selector that could not be applied");
    }
  }
  return $.html();
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const extractPageMetadata = (html: string): PageMetadata => {
  const $ = cheerio.load(html);
  const metadata: PageMetadata = {};

  const description = nonEmpty($('meta[name="description"]').attr("content"));
  if (description) metadata.description = description;

  const keywords = nonEmpty($('meta[name="keywords"]').attr("content"));
  if (keywords) metadata.keywords = keywords;

  const author = nonEmpty($('meta[name="author"]').attr("content"));
  if (author) metadata.author = author;

  for (const selector of PUBLISHED_DATE_SELECTORS) {
    const date = nonEmpty($(selector).attr("content"));
    if (date) {
      metadata.publishedDate = date;
      break;
    }
  }
  if (!metadata.publishedDate) {
    const datetime = nonEmpty($("time[datetime]").first().attr("datetime"));
    if (datetime) metadata.publishedDate = datetime;
  }

  const canonicalUrl = nonEmpty($('link[rel="canonical"]').attr("href"));
  if (canonicalUrl) metadata.canonicalUrl = canonicalUrl;

  const language = nonEmpty($("html").attr("lang"));
  if (language) metadata.language = language;

  return metadata;
};

/** Visible text of a document with whitespace collapsed. */
export const htmlToText = (html: string): string => {
  const $ = cheerio.load(html);
  $("head, script, style, noscript, template").remove();
  // Keeps words of adjacent blocks apart.
  $("*").append(" ");
  return $.root().text().replace(WHITESPACE_RUN, " ").trim();
};
