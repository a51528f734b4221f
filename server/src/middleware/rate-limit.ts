/**
 * Rate Limiting Middleware
 *
 * Every AnkiConnect request may cost Renshuu API calls; a runaway client
 * must not exhaust the key's quota. Only AnkiConnect POSTs count; the
 * health check, log view and cache routes are never limited.
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { RATE_LIMIT_CONSTANTS, errorEnvelope } from '../../../shared/src';

/**
 * AnkiConnect rate limiter
 * `limit` POST requests per minute per IP
 */
export function createAnkiRateLimiter(
  limit: number = RATE_LIMIT_CONSTANTS.DEFAULT_MAX_REQUESTS
): RateLimitRequestHandler {
  return rateLimit({
    windowMs: RATE_LIMIT_CONSTANTS.WINDOW_MS,
    limit,
    message: errorEnvelope('Too many requests. Please try again later.'),
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method !== 'POST',
  });
}
