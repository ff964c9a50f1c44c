import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

import type { Config } from './config/index.js';

/**
 * Initialize Sentry when a DSN is configured. Without one, captureException
 * calls in the error handler are no-ops.
 */
export function initSentry(sentry: Config['sentry'], logger: FastifyBaseLogger): boolean {
  if (!sentry) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return false;
  }

  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: sentry.environment }, 'Sentry initialized');
  return true;
}

// Re-export Sentry for use in error handler
export { Sentry };
