import { logger } from "../../lib/logger.js";
import { ScrapeError, errorMessage, type ProcessingStage } from "../scraper/errors.js";
import { cleanHtml } from "./html-cleaner.js";
import { htmlToMarkdown } from "./markdown.js";
import { cleanupMarkdown } from "./markdown-cleanup.js";
import type { ContentProcessingConfig, ContentStats, OutputFormat, ProcessedContent } from "./types.js";

const SUMMARY_MARKUP = /[#*_`[\]()]/g;
const WHITESPACE_RUN = /\s+/g;
const HEADER_LINE = /^#+/gm;
const MARKDOWN_LINK = /\[.*?\]\(.*?\)/g;
const CODE_FENCE = /```/g;

const runStage = <T>(stage: ProcessingStage, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ScrapeError) throw error;
    throw ScrapeError.contentProcessing(`Content processing failed during ${stage}: ${errorMessage(error)}`, {
      stage,
    });
  }
};

const countMatches = (text: string, pattern: RegExp): number => text.match(pattern)?.length ?? 0;

/**
 * Turns rendered HTML into the requested output formats. Holds only its
 * frozen configuration, so one instance is shared by every scrape.
 */
export class ContentProcessor {
  constructor(private readonly config: ContentProcessingConfig) {}

  /** Rejects documents over the configured size before any parsing. */
  ensureWithinLimit(html: string): void {
    if (html.length > this.config.maxContentLength) {
      throw ScrapeError.contentProcessing(
        `Content too large: ${html.length} characters exceeds ${this.config.maxContentLength}`,
        { stage: "validation" },
      );
    }
  }

  process(html: string, title: string | undefined, outputFormat: OutputFormat): ProcessedContent {
    this.ensureWithinLimit(html);

    return runStage("conversion", () => {
      const processed: ProcessedContent = {};

      if (outputFormat === "html" || outputFormat === "both") {
        processed.html = runStage("html_cleaning", () => cleanHtml(html));
      }

      if (outputFormat === "markdown" || outputFormat === "both") {
        const converted = runStage("html_to_markdown", () => htmlToMarkdown(html, this.config.rules));
        const markdown = runStage("markdown_cleaning", () => cleanupMarkdown(converted));
        processed.content = this.withTitle(markdown, title);

        if (processed.content.length < this.config.minContentLength) {
          logger.warn(
            { length: processed.content.length, minLength: this.config.minContentLength },
            "Extracted content is shorter than expected",
          );
        }
      }

      return processed;
    });
  }

  summarize(text: string, maxLength = 200): string {
    const plain = text.replace(SUMMARY_MARKUP, "").replace(WHITESPACE_RUN, " ").trim();
    if (plain.length <= maxLength) return plain;

    const cut = plain.slice(0, maxLength);
    const sentenceEnd = Math.max(cut.lastIndexOf("."), cut.lastIndexOf("!"), cut.lastIndexOf("?"));
    if (sentenceEnd >= maxLength * 0.7) return cut.slice(0, sentenceEnd + 1);

    const lastSpace = cut.lastIndexOf(" ");
    if (lastSpace >= maxLength * 0.8) return `${cut.slice(0, lastSpace)}…`;

    return `${cut}…`;
  }

  stats(text: string): ContentStats {
    const base = {
      characters: text.length,
      words: text.split(WHITESPACE_RUN).filter(Boolean).length,
      lines: text.split("\n").length,
    };

    try {
      return {
        ...base,
        headers: countMatches(text, HEADER_LINE),
        links: countMatches(text, MARKDOWN_LINK),
        codeBlockPairs: Math.floor(countMatches(text, CODE_FENCE) / 2),
      };
    } catch (error) {
      logger.warn({ err: error }, "Failed to compute markdown statistics");
      return { ...base, headers: 0, links: 0, codeBlockPairs: 0 };
    }
  }

  private withTitle(markdown: string, title: string | undefined): string {
    const heading = title?.trim();
    if (!heading) return markdown;
    return markdown ? `# ${heading}\n\n${markdown}` : `# ${heading}`;
  }
}
