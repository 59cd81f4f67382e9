/**
 * Sentry Crash Reporting - Nearby Alerts
 *
 * Integrates with the logger for error-level reporting.
 * Privacy: masks GPS coordinates before sending.
 */

import * as Sentry from '@sentry/node';
import type { Environment } from './config';

export interface SentryOptions {
  dsn: string | null;
  environment: Environment;
  release?: string;
}

let initialized = false;

export function initSentry(options: SentryOptions): boolean {
  if (!options.dsn || options.environment === 'development') return false;
  if (initialized) return true;

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    release: options.release ?? '1.0.0',

    // Privacy: strip coordinates before sending
    beforeSend(event) {
      return sanitizeEvent(event);
    },

    tracesSampleRate: 0.1,

    // Breadcrumbs from console may carry coordinates
    beforeBreadcrumb(breadcrumb) {
      if (breadcrumb.category === 'console') return null;
      return breadcrumb;
    },
  });

  initialized = true;
  return true;
}

export function isSentryInitialized(): boolean {
  return initialized;
}

export function sanitizeEvent<T extends { extra?: Record<string, unknown> }>(event: T): T {
  if (event.extra) {
    for (const key of Object.keys(event.extra)) {
      const k = key.toLowerCase();
      if (k.includes('lat') || k.includes('lng') || k.includes('lon')) {
        event.extra[key] = '[redacted]';
      }
    }
  }
  return event;
}

export function captureException(error: Error, context?: Record<string, unknown>): void {
  if (!initialized) return;
  Sentry.captureException(error, { extra: context });
}
