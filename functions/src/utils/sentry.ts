/**
 * Sentry Error Tracking
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';
import { appConfig } from '../config';

const SENTRY_DSN = process.env.SENTRY_DSN || '';

let isInitialized = false;

/**
 * Initialize Sentry once per process.
 */
export function initSentry(): void {
  if (isInitialized) {
    return;
  }

  if (!SENTRY_DSN) {
    functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
    isInitialized = true;
    return;
  }

  Sentry.init({
    dsn: SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    release: appConfig.version,
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
    enabled: process.env.NODE_ENV !== 'test',

    beforeSend(event) {
      if (event.breadcrumbs) {
        event.breadcrumbs = event.breadcrumbs.map((breadcrumb) => {
          if (breadcrumb.data?.headers?.authorization) {
            breadcrumb.data.headers.authorization = '[REDACTED]';
          }
          return breadcrumb;
        });
      }

      // Prescription text, patient attributes and images never leave the process.
      if (event.request?.data) {
        event.request.data = '[REDACTED]';
      }

      return event;
    },

    ignoreErrors: ['auth/invalid-id-token', 'auth/id-token-expired', 'ECONNRESET', 'ETIMEDOUT'],
  });

  functions.logger.info('[sentry] Sentry initialized successfully');
  isInitialized = true;
}

/**
 * Report a handled exception to Sentry when enabled. Callers log it themselves.
 */
export function captureException(
  error: unknown,
  context?: Record<string, unknown>
): string | undefined {
  if (!SENTRY_DSN) {
    return undefined;
  }

  if (context) {
    return Sentry.withScope((scope) => {
      Object.entries(context).forEach(([key, value]) => {
        scope.setExtra(key, value);
      });
      return Sentry.captureException(error);
    });
  }

  return Sentry.captureException(error);
}

/**
 * Tag subsequent events with the authenticated caller.
 */
export function setUser(userId: string): void {
  if (!SENTRY_DSN) return;
  Sentry.setUser({ id: userId });
}

/**
 * Register Sentry's Express error handler.
 * Call this AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
  if (!SENTRY_DSN) return;
  Sentry.setupExpressErrorHandler(app);
}
