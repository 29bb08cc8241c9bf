/**
 * Rate Limiting Middleware
 */

import rateLimit from 'express-rate-limit';
import { config } from '../config';

/**
 * Per-IP ceiling across all routes
 */
export const globalRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.max,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (_req, res) => {
    res.status(429).json({
      error: 'RATE_LIMITED',
      message: 'Too many requests. Please try again later.',
      retry_after_seconds: Math.ceil(config.rateLimit.windowMs / 1000),
    });
  },
});

/**
 * Tighter ceiling for order placement, cancel and execute
 */
export const writeRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (_req, res) => {
    res.status(429).json({
      error: 'RATE_LIMITED',
      message: 'Write operation rate limit exceeded. Please reduce request frequency.',
      retry_after_seconds: 60,
    });
  },
  skip: (req) => req.method !== 'POST' && req.method !== 'PUT' && req.method !== 'DELETE',
});
