import type { OutputFormat } from "../scraper/types.js";

/** Rules for turning HTML into markdown. Passed by value, never mutated. */
export interface MarkdownRules {
  readonly ignoreLinks: boolean;
  readonly ignoreImages: boolean;
  /** Wrap width for paragraph lines; 0 disables wrapping. */
  readonly bodyWidth: number;
  /** Keep unicode punctuation as-is instead of folding it to ASCII. */
  readonly unicodeSnob: boolean;
  readonly ignoreEmphasis: boolean;
  /** Drop the target of `#fragment` links and keep their text. */
  readonly skipInternalLinks: boolean;
}

export interface ContentProcessingConfig {
  readonly rules: MarkdownRules;
  readonly maxContentLength: number;
  readonly minContentLength: number;
}

export interface ProcessedContent {
  content?: string;
  html?: string;
}

export interface ContentStats {
  characters: number;
  words: number;
  lines: number;
  headers: number;
  links: number;
  codeBlockPairs: number;
}

export type { OutputFormat };
