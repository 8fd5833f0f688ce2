import { chromium, type Browser } from "playwright-core";
import { logger } from "../../lib/logger.js";
import type { PageRenderer, RenderRequest, RenderedPage } from "./types.js";

const BLOCKED_RESOURCE_TYPES = new Set(["image", "media", "font"]);

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface PlaywrightRendererOptions {
  executablePath?: string;
}

/**
 * Headless Chromium through playwright-core. One browser process per headless
 * mode, started on first use; every render gets its own context.
 */
export class PlaywrightRenderer implements PageRenderer {
  readonly name = "playwright";

  private readonly browsers = new Map<boolean, Promise<Browser>>();

  constructor(private readonly options: PlaywrightRendererOptions = {}) {}

  async render(request: RenderRequest): Promise<RenderedPage> {
    const browser = await this.getBrowser(request.headless);
    request.signal?.throwIfAborted();
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      viewport: { width: 1920, height: 1080 },
    });

    const onAbort = () => {
      context.close().catch((error: unknown) => {
        logger.warn({ err: error, url: request.url }, "Failed to close browser context after abort");
      });
    };
    request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      // The deadline may have passed while the browser or context was starting.
      request.signal?.throwIfAborted();
      await context.route("**/*", (route) => {
        if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });

      const page = await context.newPage();
      request.signal?.throwIfAborted();
      await page.goto(request.url, { waitUntil: "domcontentloaded", timeout: request.timeoutMs });

      const html = await page.content();
      const title = request.includeTitle ? await page.title() : "";
      return { html, title };
    } finally {
      request.signal?.removeEventListener("abort", onAbort);
      await context.close();
    }
  }

  async close(): Promise<void> {
    const pending = Array.from(this.browsers.values());
    this.browsers.clear();

    const results = await Promise.allSettled(pending.map(async (launch) => (await launch).close()));
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn({ err: result.reason }, "Failed to close browser");
      }
    }
  }

  private getBrowser(headless: boolean): Promise<Browser> {
    const existing = this.browsers.get(headless);
    if (existing) return existing;

    logger.info({ headless }, "Launching Chromium");
    const launch = chromium.launch({
      headless,
      executablePath: this.options.executablePath,
      args: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"],
    });
    // A failed launch must not stay cached.
    void launch.catch(() => this.browsers.delete(headless));
    this.browsers.set(headless, launch);
    return launch;
  }
}
