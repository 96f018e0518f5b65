import * as Sentry from '@sentry/node';
import { logger } from './logger';

let enabled = false;

/**
 * Initialize Sentry error monitoring
 */
export function initSentry(dsn: string | undefined, environment: string): void {
  if (!dsn) {
    logger.debug('SENTRY_DSN not set, error monitoring disabled');
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      tracesSampleRate: environment === 'production' ? 0.1 : 1.0,
    });
    enabled = true;

    logger.info('Sentry initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize Sentry');
  }
}

/**
 * Capture an error in Sentry
 */
export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!enabled) return;

  Sentry.withScope(scope => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Flush pending events before the process exits
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
