import { logger } from "../../lib/logger.js";
import { ScrapeError } from "../scraper/errors.js";

export const MAX_SELECTORS = 50;
const MAX_SELECTOR_LENGTH = 200;

const DANGEROUS_PATTERNS = ["javascript:", "eval(", "<script", "</script>", "onclick=", "onerror=", "onload="];
const SELECTOR_CHARACTERS = /^[a-zA-Z0-9\s.#[\]:\-_,>+~*="'()]+$/;

export const isSafeCssSelector = (selector: unknown): boolean => {
  if (typeof selector !== "string" || !selector) return false;
  if (selector.length > MAX_SELECTOR_LENGTH) return false;

  const lowered = selector.toLowerCase();
  if (DANGEROUS_PATTERNS.some((pattern) => lowered.includes(pattern))) return false;

  return SELECTOR_CHARACTERS.test(selector);
};

export const validateCssSelectors = (selectors: readonly unknown[] | null | undefined): string[] => {
  if (!selectors?.length) return [];

  if (selectors.length > MAX_SELECTORS) {
    throw ScrapeError.validation(`Too many CSS selectors (max ${MAX_SELECTORS})`, { field: "remove_elements" });
  }

  const safe: string[] = [];
  for (const selector of selectors) {
    if (typeof selector === "string" && isSafeCssSelector(selector)) {
      safe.push(selector);
    } else {
      logger.warn({ selector }, "Ignoring unsafe CSS selector");
    }
  }
  return safe;
};
