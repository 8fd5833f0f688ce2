import rateLimit from "express-rate-limit";
import { env } from "../config/env.js";

// Built per app so every server instance keeps its own counters.
export const createApiRateLimiter = () =>
  rateLimit({
    windowMs: 60 * 1000,
    limit: env.RATE_LIMIT_PER_MINUTE,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later.", error_code: "RATE_LIMITED" },
  });

export const createBatchRateLimiter = () =>
  rateLimit({
    windowMs: 60 * 1000,
    limit: env.RATE_LIMIT_BATCH_PER_MINUTE, // batches launch many renders
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many batch requests, please wait a moment.", error_code: "RATE_LIMITED" },
  });
