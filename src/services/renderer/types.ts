export interface RenderRequest {
  url: string;
  headless: boolean;
  includeTitle: boolean;
  /** Navigation timeout. */
  timeoutMs: number;
  /** Aborted when the caller's deadline passes; the renderer should release the page. */
  signal?: AbortSignal;
}

export interface RenderedPage {
  html: string;
  title: string;
}

/**
 * Loads a page and hands back its HTML after DOM content has loaded. Failures
 * are thrown as plain errors and classified by the caller.
 */
export interface PageRenderer {
  readonly name: string;
  render(request: RenderRequest): Promise<RenderedPage>;
  close(): Promise<void>;
}
