/**
 * Configuration - Nearby Alerts
 *
 * Environment variables parsed once with zod. Anything invalid raises
 * ConfigError instead of falling back silently.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import {
  DEFAULT_DISTANCE_FILTER_METERS,
  DEFAULT_NOTIFICATION_RESPONSIVENESS_MS,
  DEFAULT_TARGETS_PATH,
} from './constants';

// ============================================
// SCHEMA
// ============================================

const booleanString = z.enum(['true', 'false']).transform(value => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  NEARBY_ALERTS_TARGETS_PATH: z.string().min(1).default(DEFAULT_TARGETS_PATH),
  NEARBY_ALERTS_SENTRY_DSN: z.string().url().optional(),
  NEARBY_ALERTS_RESPONSIVENESS_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_NOTIFICATION_RESPONSIVENESS_MS),
  NEARBY_ALERTS_DISTANCE_FILTER_M: z.coerce
    .number()
    .nonnegative()
    .default(DEFAULT_DISTANCE_FILTER_METERS),
  NEARBY_ALERTS_LOG_CONSOLE: booleanString.optional(),
});

// ============================================
// TYPES
// ============================================

export type Environment = 'development' | 'test' | 'production';

export interface AppConfig {
  environment: Environment;
  targetsPath: string;
  sentryDsn: string | null;
  notificationResponsivenessMs: number;
  distanceFilterMeters: number;
  logToConsole: boolean;
}

// ============================================
// LOADING
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    environment: values.NODE_ENV,
    targetsPath: values.NEARBY_ALERTS_TARGETS_PATH,
    sentryDsn: values.NEARBY_ALERTS_SENTRY_DSN ?? null,
    notificationResponsivenessMs: values.NEARBY_ALERTS_RESPONSIVENESS_MS,
    distanceFilterMeters: values.NEARBY_ALERTS_DISTANCE_FILTER_M,
    logToConsole: values.NEARBY_ALERTS_LOG_CONSOLE ?? values.NODE_ENV === 'development',
  };
}
