import { buildServer } from "./server.js";
import { env } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { createScraperService } from "./services/scraper/index.js";

try {
  logger.info("Initializing server...");
  const { scraperService, contentProcessor } = createScraperService();
  const app = buildServer({ scraper: scraperService, contentProcessor });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, renderer: scraperService.rendererName }, "Content extraction service listening");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close();
    scraperService
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "Failed to release renderer during shutdown");
        process.exit(1);
      });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
} catch (error) {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
}
