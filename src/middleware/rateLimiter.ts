import rateLimit from 'express-rate-limit';
import { ErrorCode } from '../utils/appError.js';

/**
 * Rate limiters:
 * - API: 100/min per client
 * - Meeting search: 10/min (each search fans out into many provider calls)
 */

export const apiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: 'Too many requests. Please slow down.',
    },
  },
});

export const searchLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: 'Too many meeting searches. Please try again in 1 minute.',
    },
  },
});
