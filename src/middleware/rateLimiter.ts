/**
 * Rate Limiting Middleware
 * Keeps bot control and backtest endpoints from being hammered
 */

import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import logger from '../utils/logger';

/**
 * Create a rate limiter with custom options
 */
export const createRateLimiter = (options: {
  windowMs: number;
  max: number;
  message?: string;
  skipSuccessfulRequests?: boolean;
}) => {
  const message = options.message || 'Too many requests, please try again later.';

  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
    skipSuccessfulRequests: options.skipSuccessfulRequests || false,
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded:', {
        ip: req.ip,
        path: req.path,
      });
      res.status(429).json({
        success: false,
        error: message,
        retryAfter: res.getHeader('Retry-After'),
      });
    },
  });
};

/**
 * General API rate limiter
 * 100 requests per 15 minutes
 */
export const apiLimiter = createRateLimiter({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 100,
  message: 'API rate limit exceeded. Please wait before making more requests.',
});

/**
 * Bot start/stop rate limiter
 * 20 operations per minute
 */
export const botControlLimiter = createRateLimiter({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: 'Bot control rate limit exceeded. Please wait before making changes.',
});

/**
 * Backtest rate limiter
 * 10 runs per minute
 */
export const backtestLimiter = createRateLimiter({
  windowMs: 60 * 1000, // 1 minute
  max: 10,
  message: 'Backtest rate limit exceeded. Maximum 10 backtests per minute.',
});
