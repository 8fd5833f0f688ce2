import { setTimeout as sleep } from "node:timers/promises";
import type { PageRenderer, RenderRequest, RenderedPage } from "../services/renderer/types.js";

/** What a fake page does when rendered: load, fail with an error, or never settle. */
export type FakePage = RenderedPage | Error | "hang";

/**
 * In-process renderer for tests. Unknown URLs fail the way a browser reports
 * an unresolvable host.
 */
export class FakeRenderer implements PageRenderer {
  readonly name = "fake";
  readonly calls: RenderRequest[] = [];
  active = 0;
  maxActive = 0;
  closed = false;

  constructor(
    private readonly pages: ReadonlyMap<string, FakePage>,
    private readonly latencyMs = 0,
  ) {}

  get lastSignal(): AbortSignal | undefined {
    return this.calls.at(-1)?.signal;
  }

  async render(request: RenderRequest): Promise<RenderedPage> {
    this.calls.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs);

      const page = this.pages.get(request.url);
      if (page === undefined) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${request.url}`);
      if (page instanceof Error) throw page;
      if (page === "hang") return await this.hang(request.signal);
      return page;
    } finally {
      this.active -= 1;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private hang(signal: AbortSignal | undefined): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("Target page has been closed")), { once: true });
    });
  }
}
