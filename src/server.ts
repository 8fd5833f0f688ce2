import express from "express";
import helmet from "helmet";
import cors from "cors";
import morgan from "morgan";
import type { Express } from "express";
import { contentProcessingConfig, env, scrapingConfig } from "./config/env.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./lib/service-info.js";
import { createApiRateLimiter, createBatchRateLimiter } from "./middleware/rate-limit.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { requestId } from "./middleware/request-id.js";
import { createHealthRouter } from "./routes/health.routes.js";
import { createScrapeRouter } from "./routes/scrape.routes.js";
import type { ContentProcessor } from "./services/content/content-processor.js";
import type { ContentProcessingConfig } from "./services/content/types.js";
import type { ScraperService } from "./services/scraper/scraper.service.js";
import type { ScrapingConfig } from "./services/scraper/types.js";

export interface ServerDeps {
  scraper: ScraperService;
  contentProcessor: ContentProcessor;
  scrapingConfig?: ScrapingConfig;
  contentConfig?: ContentProcessingConfig;
}

const allowsAnyOrigin = () =>
  env.CORS_ALLOWED_ORIGINS_LIST.length === 0 || env.CORS_ALLOWED_ORIGINS_LIST.includes("*");

const corsOptions = {
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    if (!origin || allowsAnyOrigin()) return callback(null, true);
    if (env.CORS_ALLOWED_ORIGINS_LIST.includes(origin)) return callback(null, true);
    return callback(new Error("Origin not allowed by CORS"));
  },
};

export const buildServer = (deps: ServerDeps): Express => {
  const app = express();

  app.set("trust proxy", 1);
  app.use(requestId);
  app.use(helmet());
  app.use(cors(corsOptions));
  app.use(express.json({ limit: "1mb" }));
  if (env.NODE_ENV !== "test") {
    app.use(morgan(env.NODE_ENV === "production" ? "combined" : "dev"));
  }

  app.get("/", (_req, res) => {
    res.json({ service: SERVICE_NAME, version: SERVICE_VERSION, status: "running" });
  });

  app.get("/healthz", (_req, res) =>
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    }),
  );

  app.use("/api", createApiRateLimiter());

  app.use("/api/v1", createHealthRouter({ scraper: deps.scraper, contentProcessor: deps.contentProcessor }));
  app.use(
    "/api/v1/scrape",
    createScrapeRouter({
      scraper: deps.scraper,
      scrapingConfig: deps.scrapingConfig ?? scrapingConfig,
      contentConfig: deps.contentConfig ?? contentProcessingConfig,
      batchLimiter: createBatchRateLimiter(),
    }),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};
