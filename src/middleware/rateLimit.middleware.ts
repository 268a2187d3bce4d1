// src/middleware/rateLimit.middleware.ts
import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import httpStatus from "http-status";
import { env } from "@/config";
import logger from "@/utils/logger";
import ApiError from "@/utils/ApiError";

interface RateLimitSettings {
  windowMs: number;
  limit: number;
}

/** Rejections go through the error handler so the body carries `code: 'TOO_MANY_REQUESTS'`. */
export const createRateLimiter = ({ windowMs, limit }: RateLimitSettings): RateLimitRequestHandler =>
  rateLimit({
    windowMs,
    limit, // per IP per window
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, next) => {
      logger.warn(`Rate limit exceeded for IP: ${req.ip}, Path: ${req.path}`);
      next(new ApiError(httpStatus.TOO_MANY_REQUESTS, "Too many requests from this IP, please try again later."));
    },
  });

// Applied to the mutating ledger routes
export const generalRateLimiter = createRateLimiter({
  windowMs: (env.RATE_LIMIT_WINDOW_MINUTES || 15) * 60 * 1000,
  limit: env.RATE_LIMIT_MAX_REQUESTS || 100,
});
