/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates.
 * Counters live in express-rate-limit's built-in memory store, which matches
 * the single-process deployment of the JSON document store.
 *
 * Disabled entirely when ENABLE_RATE_LIMITING is false (the default under test).
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { errorResponse } from '../types/api.types';
import { ErrorCode } from '../types/error.types';

const skip = (): boolean => !config.security.enableRateLimiting;

/**
 * Default rate limiter for all API routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: errorResponse(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests. Please try again later.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip
});

/**
 * Strict rate limiter for register/login
 * 10 requests per 15 minutes per IP (allows retries)
 */
export const authRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 10,
  message: errorResponse(
    ErrorCode.RATE_LIMIT_EXCEEDED,
    'Too many authentication attempts. Please try again in 15 minutes.'
  ),
  standardHeaders: true,
  legacyHeaders: false,
  skip
});

/**
 * Message sending limiter, keyed by user rather than IP
 * 30 messages per minute
 */
export const messageRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 30,
  keyGenerator: (req) => `message:${req.user?.userId || req.ip || 'unknown'}`,
  message: errorResponse(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many messages. Please wait a moment.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip
});
