import { Router } from "express";
import { SERVICE_NAME, SERVICE_VERSION } from "../lib/service-info.js";
import { logger } from "../lib/logger.js";
import type { ContentProcessor } from "../services/content/content-processor.js";
import { errorMessage } from "../services/scraper/errors.js";
import type { ScraperService } from "../services/scraper/scraper.service.js";

export interface HealthRouterDeps {
  scraper: ScraperService;
  contentProcessor: ContentProcessor;
}

const READINESS_PROBE_HTML = "<html><body><h1>Ready</h1><p>Probe paragraph.</p></body></html>";

export const createHealthRouter = ({ scraper, contentProcessor }: HealthRouterDeps) => {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { api: "ok", renderer: scraper.rendererName },
    });
  });

  router.get("/liveness", (_req, res) => {
    res.json({ status: "alive", service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  router.get("/readiness", (_req, res) => {
    const checks: Record<string, string> = { renderer: scraper.rendererName };
    let ready = true;

    try {
      const processed = contentProcessor.process(READINESS_PROBE_HTML, undefined, "markdown");
      checks.content_processor = processed.content ? "ready" : "not ready: empty conversion";
      ready = Boolean(processed.content);
    } catch (error) {
      logger.error({ err: error }, "Readiness probe conversion failed");
      checks.content_processor = `not ready: ${errorMessage(error)}`;
      ready = false;
    }

    res.status(ready ? 200 : 503).json({
      status: ready ? "ready" : "not ready",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  return router;
};
