import { env } from "../../config/env.js";
import { logger } from "../../lib/logger.js";
import { FirecrawlRenderer } from "./firecrawl-renderer.js";
import { PlaywrightRenderer } from "./playwright-renderer.js";
import type { PageRenderer } from "./types.js";

export function selectRenderer(): PageRenderer {
  const provider = env.RENDERER_PROVIDER;

  if (provider === "firecrawl") {
    if (!env.FIRECRAWL_API_KEY) {
      logger.error("RENDERER_PROVIDER=firecrawl but FIRECRAWL_API_KEY is not set");
      throw new Error("FIRECRAWL_API_KEY required when RENDERER_PROVIDER=firecrawl");
    }
    logger.info("Firecrawl renderer enabled");
    return new FirecrawlRenderer({ apiKey: env.FIRECRAWL_API_KEY, apiUrl: env.FIRECRAWL_API_URL });
  }

  logger.info({ executablePath: env.BROWSER_EXECUTABLE_PATH ?? "default" }, "Playwright renderer enabled");
  return new PlaywrightRenderer({ executablePath: env.BROWSER_EXECUTABLE_PATH });
}

export type { PageRenderer, RenderRequest, RenderedPage } from "./types.js";
