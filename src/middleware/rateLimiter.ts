import rateLimit from 'express-rate-limit';
import { ErrorCode, messageFor } from '../utils/AppError.js';

/**
 * Per-IP limiter for routes that reach the ArcGIS services.
 * 30 requests per minute. Built per router so each app instance keeps
 * its own counters.
 */
export function createLookupRateLimiter() {
  return rateLimit({
    windowMs: 60_000,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      message: messageFor(ErrorCode.RATE_LIMITED),
      code: ErrorCode.RATE_LIMITED,
    },
  });
}
