/**
 * Error Taxonomy - Nearby Alerts
 *
 * Every error raised by the reconciliation core extends NearbyAlertsError
 * and carries a discriminating `type`. Top-level operations catch at their
 * boundary and turn errors into status strings with describeError().
 *
 * Permission denials are not errors here: they are PermissionStatus values
 * that feed PermissionSnapshot.needsManualSettings.
 */

import { logger, type LogCategory } from './logger';
import { captureException } from './sentry';

// ============================================
// TYPES
// ============================================

export type ErrorType =
  | 'target_load_error'
  | 'precondition_error'
  | 'registration_error'
  | 'geofence_error'
  | 'permission_error'
  | 'notification_error'
  | 'location_error'
  | 'config_error'
  | 'unknown_error';

export type GeofenceErrorCode =
  | 'tooManyGeofences'
  | 'invalidArgument'
  | 'missingPermission'
  | 'serviceUnavailable'
  | 'unknown';

export type RegistrationRequirement = 'locationGranted' | 'alwaysGranted' | 'preciseLocation';

export interface ErrorContext {
  action?: string;
  geofenceKey?: string;
  additionalData?: Record<string, unknown>;
}

const ERROR_CATEGORY: Record<ErrorType, LogCategory> = {
  target_load_error: 'targets',
  precondition_error: 'geofence',
  registration_error: 'geofence',
  geofence_error: 'geofence',
  permission_error: 'permissions',
  notification_error: 'notification',
  location_error: 'gps',
  config_error: 'boot',
  unknown_error: 'boot',
};

// ============================================
// ERROR CLASSES
// ============================================

export abstract class NearbyAlertsError extends Error {
  abstract readonly type: ErrorType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed target source. Startup continues with zero targets. */
export class TargetLoadError extends NearbyAlertsError {
  readonly type = 'target_load_error';
}

/** Registration attempted without the permissions it needs. */
export class PreconditionError extends NearbyAlertsError {
  readonly type = 'precondition_error';

  constructor(readonly missing: RegistrationRequirement[]) {
    super(`Geofence registration requires: ${missing.join(', ')}`);
  }
}

/** The geofence service rejected one descriptor. */
export class RegistrationError extends NearbyAlertsError {
  readonly type = 'registration_error';

  constructor(readonly code: GeofenceErrorCode, readonly geofenceKey: string) {
    super(`Geofence ${geofenceKey} rejected: ${code}`);
  }
}

/** clearAll/listActive failed, so the pass could not complete. */
export class GeofenceSyncError extends NearbyAlertsError {
  readonly type = 'geofence_error';

  constructor(readonly code: GeofenceErrorCode, message: string) {
    super(message);
  }
}

export class ConfigError extends NearbyAlertsError {
  readonly type = 'config_error';
}

/**
 * Thrown by GeofenceService implementations. Mirrors the native service's
 * error codes.
 */
export class GeofenceServiceError extends Error {
  constructor(readonly code: GeofenceErrorCode, message?: string) {
    super(message ?? `Geofence service error: ${code}`);
    this.name = 'GeofenceServiceError';
  }
}

// ============================================
// HELPERS
// ============================================

export function isNearbyAlertsError(error: unknown): error is NearbyAlertsError {
  return error instanceof NearbyAlertsError;
}

export function geofenceErrorCode(error: unknown): GeofenceErrorCode {
  return error instanceof GeofenceServiceError ? error.code : 'unknown';
}

/**
 * Render any thrown value for a status string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Log an error and forward it to crash reporting
 */
export function captureError(error: unknown, type: ErrorType, context: ErrorContext = {}): void {
  const message = describeError(error);
  logger.error(ERROR_CATEGORY[type], `${type}: ${message}`, {
    action: context.action,
    geofenceKey: context.geofenceKey,
    ...context.additionalData,
  });

  captureException(error instanceof Error ? error : new Error(message), {
    type,
    ...context,
  });
}
