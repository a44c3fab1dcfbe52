import rateLimit from "express-rate-limit";
import type { ApiErrorResponse } from "@chunkgraph/shared";
import type { AppConfig } from "../config.js";

const rateLimitedResponse: ApiErrorResponse = { error: "Too many requests", code: "RATE_LIMITED" };

export function createApiRateLimiter(
  config: Pick<AppConfig, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">
) {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: rateLimitedResponse
  });
}
