import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;

/**
 * General API rate limiter
 * 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Limiter for analysis and OCR, which fan out to external services
 * 30 requests per 15 minutes per IP
 */
export const analysisLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES_MS,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded analysis rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many analysis requests, please try again later.',
    });
  },
});
