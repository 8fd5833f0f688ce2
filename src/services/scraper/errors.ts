export const ScrapeErrorKind = {
  Validation: "ValidationError",
  Network: "NetworkError",
  Timeout: "TimeoutError",
  Browser: "BrowserError",
  ContentProcessing: "ContentProcessingError",
} as const;

export type ScrapeErrorKind = (typeof ScrapeErrorKind)[keyof typeof ScrapeErrorKind];

const ERROR_CODES = {
  ValidationError: "VALIDATION_ERROR",
  NetworkError: "NETWORK_ERROR",
  TimeoutError: "TIMEOUT_ERROR",
  BrowserError: "BROWSER_ERROR",
  ContentProcessingError: "CONTENT_PROCESSING_ERROR",
} as const satisfies Record<ScrapeErrorKind, string>;

export type ScrapeErrorCode = (typeof ERROR_CODES)[ScrapeErrorKind];

export type ScrapeErrorDetails = Readonly<Record<string, unknown>>;

export type ProcessingStage =
  | "validation"
  | "element_removal"
  | "html_cleaning"
  | "html_to_markdown"
  | "markdown_cleaning"
  | "conversion";

/**
 * Failure of one step of a scrape. The kind is fixed by the factory used at the
 * point of failure and never derived from the class of some other error.
 */
export class ScrapeError extends Error {
  readonly code: ScrapeErrorCode;

  private constructor(
    readonly kind: ScrapeErrorKind,
    message: string,
    readonly details: ScrapeErrorDetails,
  ) {
    super(message);
    this.name = kind;
    this.code = ERROR_CODES[kind];
  }

  static validation(message: string, args: { field: string; value?: unknown; extra?: ScrapeErrorDetails }) {
    return new ScrapeError(ScrapeErrorKind.Validation, message, {
      field: args.field,
      ...(args.value !== undefined ? { value: String(args.value) } : {}),
      ...args.extra,
    });
  }

  static network(message: string, args: { url?: string; statusCode?: number } = {}) {
    return new ScrapeError(ScrapeErrorKind.Network, message, {
      ...(args.url ? { url: args.url } : {}),
      ...(args.statusCode !== undefined ? { status_code: args.statusCode } : {}),
    });
  }

  static timeout(message: string, args: { url?: string; timeoutSeconds?: number } = {}) {
    return new ScrapeError(ScrapeErrorKind.Timeout, message, {
      ...(args.url ? { url: args.url } : {}),
      ...(args.timeoutSeconds !== undefined ? { timeout_seconds: args.timeoutSeconds } : {}),
    });
  }

  static browser(message: string, args: { url?: string; browserError?: string } = {}) {
    return new ScrapeError(ScrapeErrorKind.Browser, message, {
      ...(args.url ? { url: args.url } : {}),
      ...(args.browserError ? { browser_error: args.browserError } : {}),
    });
  }

  static contentProcessing(message: string, args: { url?: string; stage?: ProcessingStage } = {}) {
    return new ScrapeError(ScrapeErrorKind.ContentProcessing, message, {
      ...(args.url ? { url: args.url } : {}),
      ...(args.stage ? { processing_stage: args.stage } : {}),
    });
  }

  withUrl(url: string): ScrapeError {
    if (this.details.url) return this;
    return new ScrapeError(this.kind, this.message, { ...this.details, url });
  }

  toJSON() {
    return {
      error: this.message,
      error_type: this.kind,
      error_code: this.code,
      details: this.details,
    };
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

interface RenderFailureContext {
  url: string;
  timeoutSeconds: number;
}

interface RenderFailureRule {
  matches(message: string): boolean;
  build(message: string, ctx: RenderFailureContext): ScrapeError;
}

// Renderers report failures as plain errors, so the kind is read from the message.
// Order matters: the first matching rule wins, anything unmatched is a browser failure.
const RENDER_FAILURE_RULES: readonly RenderFailureRule[] = [
  {
    matches: (message) => message.toLowerCase().includes("timeout"),
    build: (_message, ctx) =>
      ScrapeError.timeout(`Page load timeout for ${ctx.url}`, { url: ctx.url, timeoutSeconds: ctx.timeoutSeconds }),
  },
  {
    matches: (message) => message.includes("net::") || message.includes("DNS"),
    build: (message, ctx) => ScrapeError.network(`Network error accessing ${ctx.url}: ${message}`, { url: ctx.url }),
  },
];

export const classifyRenderFailure = (error: unknown, ctx: RenderFailureContext): ScrapeError => {
  if (error instanceof ScrapeError) return error.withUrl(ctx.url);

  const message = errorMessage(error);
  const rule = RENDER_FAILURE_RULES.find((candidate) => candidate.matches(message));
  if (rule) return rule.build(message, ctx);

  return ScrapeError.browser(`Browser error for ${ctx.url}: ${message}`, { url: ctx.url, browserError: message });
};

/**
 * Converts anything thrown during a scrape into a ScrapeError. Errors that are
 * not already classified become browser failures carrying the original message.
 */
export const toScrapeError = (error: unknown, url: string): ScrapeError => {
  if (error instanceof ScrapeError) return error.withUrl(url);
  const message = errorMessage(error);
  return ScrapeError.browser(`Unexpected error scraping ${url}: ${message}`, { url, browserError: message });
};
