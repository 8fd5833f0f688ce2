import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { ContentProcessingConfig } from "../services/content/types.js";
import type { ScrapingConfig } from "../services/scraper/types.js";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

const booleanString = z
  .union([z.string(), z.boolean()])
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (!value) return false;
    return ["1", "true", "yes", "on"].includes(value.toLowerCase());
  });

// Blank lines copied from .env.example mean "not set".
const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const DEFAULT_REMOVE_ELEMENTS = [
  "script",
  "style",
  "noscript",
  "nav",
  "header",
  "footer",
  ".advertisement",
  ".ads",
  ".ad",
  ".social-share",
  ".social-sharing",
  "#comments",
  ".comments",
  ".sidebar",
  ".related-articles",
  ".newsletter-signup",
  ".popup",
  ".cookie-notice",
  ".gdpr-notice",
];

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  ),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_BATCH_PER_MINUTE: z.coerce.number().int().positive().default(10),
  RENDERER_PROVIDER: z.enum(["playwright", "firecrawl"]).default("playwright"),
  BROWSER_EXECUTABLE_PATH: z.preprocess(emptyAsUndefined, z.string().optional()),
  FIRECRAWL_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  FIRECRAWL_API_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SCRAPER_DEFAULT_WAIT_TIME: z.coerce.number().int().min(1).max(30).default(5),
  SCRAPER_MAX_WAIT_TIME: z.coerce.number().int().min(1).max(120).default(30),
  SCRAPER_MAX_CONCURRENT_REQUESTS: z.coerce.number().int().min(1).max(50).default(10),
  SCRAPER_REQUEST_TIMEOUT: z.coerce.number().positive().default(60),
  SCRAPER_DEFAULT_REMOVE_ELEMENTS: z.string().optional(),
  CONTENT_IGNORE_LINKS: booleanString.default(true),
  CONTENT_IGNORE_IMAGES: booleanString.default(true),
  CONTENT_BODY_WIDTH: z.coerce.number().int().min(0).default(0),
  CONTENT_UNICODE_SNOB: booleanString.default(true),
  CONTENT_IGNORE_EMPHASIS: booleanString.default(false),
  CONTENT_SKIP_INTERNAL_LINKS: booleanString.default(true),
  CONTENT_MAX_LENGTH: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  CONTENT_MIN_LENGTH: z.coerce.number().int().min(0).default(100),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error("❌ Invalid environment configuration", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const splitList = (value: string | undefined) =>
  value ? value.split(",").map((item) => item.trim()).filter(Boolean) : [];

const allowedOrigins = splitList(parsed.data.CORS_ALLOWED_ORIGINS);
const removeElements = splitList(parsed.data.SCRAPER_DEFAULT_REMOVE_ELEMENTS);

export const env = {
  ...parsed.data,
  LOG_LEVEL: parsed.data.LOG_LEVEL ?? (parsed.data.NODE_ENV === "test" ? "silent" : "info"),
  CORS_ALLOWED_ORIGINS_LIST: allowedOrigins,
};

export const isProduction = env.NODE_ENV === "production";

export const scrapingConfig: ScrapingConfig = Object.freeze({
  defaultWaitTime: env.SCRAPER_DEFAULT_WAIT_TIME,
  maxWaitTime: env.SCRAPER_MAX_WAIT_TIME,
  maxConcurrentRequests: env.SCRAPER_MAX_CONCURRENT_REQUESTS,
  requestTimeout: env.SCRAPER_REQUEST_TIMEOUT,
  defaultRemoveElements: Object.freeze(removeElements.length ? removeElements : DEFAULT_REMOVE_ELEMENTS),
});

export const contentProcessingConfig: ContentProcessingConfig = Object.freeze({
  rules: Object.freeze({
    ignoreLinks: env.CONTENT_IGNORE_LINKS,
    ignoreImages: env.CONTENT_IGNORE_IMAGES,
    bodyWidth: env.CONTENT_BODY_WIDTH,
    unicodeSnob: env.CONTENT_UNICODE_SNOB,
    ignoreEmphasis: env.CONTENT_IGNORE_EMPHASIS,
    skipInternalLinks: env.CONTENT_SKIP_INTERNAL_LINKS,
  }),
  maxContentLength: env.CONTENT_MAX_LENGTH,
  minContentLength: env.CONTENT_MIN_LENGTH,
});
