import * as Sentry from '@sentry/node';
// Loads .env before the DSN is read below
import './config.js';

// Only report when a DSN is configured
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || 'development',
    sampleRate: 1.0,
    serverName: 'rep-firm-scraper',
  });
}

export { sentryEnabled };

/**
 * Report a non-fatal failure (one page or one site) with its context
 */
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Flush pending events before the process exits
 */
export async function flushErrors(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}

