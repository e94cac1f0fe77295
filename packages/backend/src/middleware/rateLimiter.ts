import rateLimit from "express-rate-limit";
import { appConfig } from "../config.js";

export interface ApiRateLimitOptions {
  windowMs: number;
  limit: number;
}

export function createApiRateLimiter(
  options: ApiRateLimitOptions = { windowMs: appConfig.RATE_LIMIT_WINDOW_MS, limit: appConfig.RATE_LIMIT_MAX }
) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests", code: "RATE_LIMITED", stage: "request" }
  });
}
