import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { isProduction } from "../config/env.js";
import { logger } from "../lib/logger.js";
import { ScrapeError, ScrapeErrorKind } from "../services/scraper/errors.js";
import { HttpError, NotFoundError } from "../utils/errors.js";
import { getRequestId } from "./request-id.js";

interface ErrorBody {
  error: string;
  error_type: string;
  error_code: string;
  details: Record<string, unknown>;
}

// body-parser tags its failures with a `type` string.
const bodyParserType = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("type" in error)) return undefined;
  return typeof error.type === "string" ? error.type : undefined;
};

const describe = (error: unknown): { status: number; body: ErrorBody } => {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: "Invalid request data",
        error_type: ScrapeErrorKind.Validation,
        error_code: "INVALID_REQUEST",
        details: {
          validation_errors: error.issues.map((issue) => ({ field: issue.path.join("."), message: issue.message })),
        },
      },
    };
  }

  const parserType = bodyParserType(error);
  if (parserType === "entity.parse.failed") {
    return {
      status: 400,
      body: { error: "Invalid JSON payload", error_type: ScrapeErrorKind.Validation, error_code: "INVALID_JSON", details: {} },
    };
  }
  if (parserType === "entity.too.large") {
    return {
      status: 413,
      body: { error: "Request body too large", error_type: "PayloadTooLarge", error_code: "PAYLOAD_TOO_LARGE", details: {} },
    };
  }

  if (error instanceof ScrapeError) {
    return {
      status: error.kind === ScrapeErrorKind.Validation ? 400 : 500,
      body: { ...error.toJSON(), details: { ...error.details } },
    };
  }

  if (error instanceof HttpError) {
    return {
      status: error.status,
      body: { error: error.message, error_type: error.name, error_code: error.code, details: error.details ?? {} },
    };
  }

  const message = error instanceof Error ? error.message : "Unknown error";
  return {
    status: 500,
    body: {
      error: isProduction ? "An unexpected error occurred" : message,
      error_type: "InternalError",
      error_code: "INTERNAL_ERROR",
      details: {},
    },
  };
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const { status, body } = describe(error);
  const requestId = getRequestId(res);

  if (status >= 500) {
    logger.error({ err: error, requestId, path: req.path }, "Request failed");
  } else {
    logger.warn({ requestId, path: req.path, status, errorCode: body.error_code }, body.error);
  }

  res.status(status).json({
    ...body,
    timestamp: new Date().toISOString(),
    request_id: requestId ?? null,
  });
};
