/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates.
 *
 * - Single-process deployment: express-rate-limit's in-memory store
 * - Global limiter per IP, tighter per-courier limiter for location pings
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';

/**
 * Global rate limiter for all API routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Too many requests. Please try again later.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting,
  handler: (req, res, _next, options) => {
    logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
    res.status(options.statusCode).json(options.message);
  }
});

/**
 * Location update limiter
 * Couriers report position every few seconds; this caps runaway clients
 */
export const locationRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 120, // 2 per second
  keyGenerator: (req) => `location:${req.user?.userId ?? req.ip ?? 'unknown'}`,
  message: {
    success: false,
    error: {
      code: 'LOCATION_RATE_LIMIT_EXCEEDED',
      message: 'Too many location updates. Slow down.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting
});
