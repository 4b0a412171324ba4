/**
 * Rate Limiter Middleware
 *
 * Implements rate limiting to protect API from abuse
 * - General API rate limiting, IP-based
 * - Stricter limit on freeze and rollback, which rewrite a whole schedule
 * - Health checks and test runs are never limited
 */

import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { logger } from '../config/logger';
import { config } from '../config/environment';

/**
 * Custom rate limit handler
 * Logs rate limit violations
 */
const rateLimitHandler = (req: Request, res: Response) => {
  logger.warn('Rate limit exceeded', {
    ip: req.ip,
    path: req.path,
    method: req.method
  });

  res.status(429).json({
    success: false,
    message: 'Too many requests. Please try again later.',
    retryAfter: res.getHeader('Retry-After')
  });
};

const isTestMode = config.server.env === 'test';

/**
 * General API rate limiter
 * Applies to all API endpoints
 */
export const apiRateLimiter = rateLimit({
  windowMs: config.security.rateLimitWindowMs,
  limit: config.security.rateLimitMaxRequests,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: rateLimitHandler,
  skip: (req) => isTestMode || req.path === '/health' || req.path === '/api/health'
});

/**
 * Freeze and rollback limiter
 * Same window as the API limiter, fewer requests
 */
export const versioningRateLimiter = rateLimit({
  windowMs: config.security.rateLimitWindowMs,
  limit: config.security.versioningRateLimitMaxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitHandler,
  skip: () => isTestMode
});
