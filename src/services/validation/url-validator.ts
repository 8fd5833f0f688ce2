import { logger } from "../../lib/logger.js";
import { ScrapeError } from "../scraper/errors.js";

export const MAX_URL_LENGTH = 2048;
export const MAX_VALIDATED_BATCH = 100;

const URL_PATTERN =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[\/?]\S+)$/i;

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

const BLOCKED_EXTENSIONS = [
  ".pdf", ".doc", ".docx", ".xls", ".xlsx", ".ppt", ".pptx",
  ".zip", ".rar", ".tar", ".gz", ".exe", ".dmg", ".pkg",
  ".mp3", ".mp4", ".avi", ".mov", ".wav", ".flv",
];

const BLOCKED_HOSTS = new Set(["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"]);

// Loopback, private and link-local IPv4 ranges.
const PRIVATE_IPV4_PREFIXES = [
  /^10\./,
  /^172\.1[6-9]\./,
  /^172\.2[0-9]\./,
  /^172\.3[0-1]\./,
  /^192\.168\./,
  /^127\./,
  /^0\./,
  /^169\.254\./,
];

const SUSPICIOUS_KEYWORDS = ["admin", "login", "secure", "private", "internal"];

const parseUrl = (url: string): URL | null => {
  try {
    return new URL(url);
  } catch {
    return null;
  }
};

const hasValidFormat = (url: string): boolean => {
  if (!URL_PATTERN.test(url)) return false;

  const parsed = parseUrl(url);
  if (!parsed || !ALLOWED_PROTOCOLS.has(parsed.protocol) || !parsed.host) return false;

  const path = parsed.pathname.toLowerCase();
  return !BLOCKED_EXTENSIONS.some((extension) => path.endsWith(extension));
};

const isPrivateIp = (hostname: string) => PRIVATE_IPV4_PREFIXES.some((pattern) => pattern.test(hostname));

const isSafeTarget = (url: string): boolean => {
  const parsed = parseUrl(url);
  const hostname = parsed?.hostname.toLowerCase();
  if (!hostname) return false;

  if (BLOCKED_HOSTS.has(hostname) || isPrivateIp(hostname)) return false;

  const lowered = url.toLowerCase();
  for (const keyword of SUSPICIOUS_KEYWORDS) {
    if (hostname.includes(keyword) || lowered.includes(`/${keyword}`)) {
      logger.warn({ url, keyword }, "URL matches a suspicious pattern");
    }
  }
  return true;
};

/** Format and safety check in one. Never throws. */
export const isValidUrl = (url: unknown): boolean =>
  typeof url === "string" && hasValidFormat(url) && isSafeTarget(url);

export const validateUrlStrict = (url: unknown): void => {
  if (typeof url !== "string") {
    throw ScrapeError.validation("URL must be a string", { field: "url", value: url });
  }
  if (!url.trim()) {
    throw ScrapeError.validation("URL cannot be empty", { field: "url", value: url });
  }
  if (url.length > MAX_URL_LENGTH) {
    throw ScrapeError.validation(`URL too long (max ${MAX_URL_LENGTH} characters)`, { field: "url", value: url });
  }
  if (!hasValidFormat(url)) {
    throw ScrapeError.validation(`Invalid URL format: ${url}`, { field: "url", value: url });
  }
  if (!isSafeTarget(url)) {
    throw ScrapeError.validation(`URL not allowed for scraping: ${url}`, { field: "url", value: url });
  }
};

/**
 * Keeps the valid URLs of a batch in input order. Fails only when none of
 * them pass; the rejected ones are logged.
 */
export const validateUrlBatch = (urls: readonly unknown[]): string[] => {
  if (!urls.length) {
    throw ScrapeError.validation("URL list cannot be empty", { field: "urls" });
  }
  if (urls.length > MAX_VALIDATED_BATCH) {
    throw ScrapeError.validation(`Too many URLs in batch (max ${MAX_VALIDATED_BATCH})`, { field: "urls" });
  }

  const valid: string[] = [];
  const invalid: { url: string; error: string }[] = [];

  for (const url of urls) {
    try {
      validateUrlStrict(url);
      if (typeof url === "string") valid.push(url);
    } catch (error) {
      if (!(error instanceof ScrapeError)) throw error;
      invalid.push({ url: String(url), error: error.message });
    }
  }

  if (!valid.length) {
    throw ScrapeError.validation("No valid URLs found in batch", {
      field: "urls",
      extra: { invalid_count: invalid.length, examples: invalid.slice(0, 3) },
    });
  }

  if (invalid.length) {
    logger.warn({ invalidCount: invalid.length, invalid }, "Dropping invalid URLs from batch");
  }

  return valid;
};

export const getDomainFromUrl = (url: string): string | null => {
  const host = parseUrl(url)?.host.toLowerCase();
  return host ? host : null;
};

/** Trims, lower-cases the host and drops the fragment. Unparseable input comes back as given. */
export const normalizeUrl = (url: string): string => {
  const parsed = parseUrl(url.trim());
  if (!parsed) return url;
  parsed.hash = "";
  parsed.hostname = parsed.hostname.toLowerCase();
  return parsed.toString();
};
