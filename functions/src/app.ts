import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import { prescriptionsRouter } from './routes/prescriptions';
import { rxnormRouter } from './routes/rxnorm';
import { apiLimiter } from './middlewares/rateLimit';
import { requireHttps } from './middlewares/httpsOnly';
import { errorHandler } from './middlewares/errorHandler';
import { appConfig, corsConfig } from './config';
import { getServiceContainer } from './services/domain/serviceContainer';
import { setupSentryErrorHandler } from './utils/sentry';

// Base64 inflates images by a third; leave room for the largest accepted image
const JSON_BODY_LIMIT = '15mb';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:19006', 'http://localhost:8081'];

export const resolveAllowedOrigins = (
  configured: string = corsConfig.allowedOrigins,
  isDevelopment: boolean = corsConfig.isDevelopment,
): string[] => {
  const allowedOrigins = configured
    ? configured.split(',').map(origin => origin.trim()).filter(Boolean)
    : [];
  return [...allowedOrigins, ...(isDevelopment ? DEV_ORIGINS : [])];
};

/**
 * GET /health
 * Liveness plus which optional capabilities came up
 */
export function healthCheck(req: Request, res: Response) {
  res.json({
    status: 'ok',
    version: appConfig.version,
    timestamp: new Date().toISOString(),
    services: getServiceContainer().capabilities,
  });
}

export function createApp() {
  const app = express();

  // Trust proxy - required for rate limiting behind Cloud Functions/Load Balancer
  app.set('trust proxy', true);

  const allAllowedOrigins = resolveAllowedOrigins();
  if (allAllowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers. ' +
      'Set ALLOWED_ORIGINS environment variable with comma-separated origins.'
    );
  }

  app.use(requireHttps);

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (mobile apps, curl, server-to-server)
      if (!origin || allAllowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
      callback(new Error(`Origin ${origin} not allowed by CORS policy`));
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000, // 1 year in seconds
      includeSubDomains: true,
      preload: true,
    },
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
    hidePoweredBy: true,
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin',
    },
  }));

  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(apiLimiter);

  app.use('/v1/prescriptions', prescriptionsRouter);
  app.use('/v1/rxnorm', rxnormRouter);

  app.get('/health', healthCheck);

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);

  app.use(errorHandler);

  return app;
}
