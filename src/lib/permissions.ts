/**
 * Permission Evaluator - Nearby Alerts
 *
 * Reduces the layered OS permissions to one actionable snapshot:
 * - Location service (OS switch, not requestable)
 * - Location (while in use) → short-circuits when refused
 * - Location "always" (background) → recorded, never short-circuits
 * - Precise vs reduced accuracy (only where the platform has it)
 * - Notifications → only suppresses the alert
 *
 * A failing platform call counts as "not granted" for that permission.
 */

import { logger } from './logger';
import { describeError } from './errors';

// ============================================
// TYPES
// ============================================

export type PermissionKind = 'location' | 'locationAlways' | 'notification';
export type PermissionStatus = 'granted' | 'denied' | 'permanentlyDenied';
export type LocationAccuracyStatus = 'precise' | 'reduced';

export interface PermissionSubsystem {
  isLocationServiceEnabled(): Promise<boolean>;
  status(permission: PermissionKind): Promise<PermissionStatus>;
  request(permission: PermissionKind): Promise<PermissionStatus>;
  /** Absent on platforms without a precise/reduced distinction */
  getLocationAccuracy?(): Promise<LocationAccuracyStatus>;
  openAppSettings(): Promise<boolean>;
}

export interface PermissionSnapshot {
  locationServiceEnabled: boolean;
  locationGranted: boolean;
  alwaysGranted: boolean;
  notificationsGranted: boolean;
  preciseLocation: boolean;
  needsManualSettings: boolean;
  accuracyStatus: LocationAccuracyStatus | null;
}

// ============================================
// CHECKS
// ============================================

async function safeCall(
  permission: PermissionKind,
  action: 'status' | 'request',
  call: () => Promise<PermissionStatus>
): Promise<PermissionStatus> {
  try {
    return await call();
  } catch (error) {
    logger.warn('permissions', `Error on ${permission} ${action}, treating as denied`, {
      error: describeError(error),
    });
    return 'denied';
  }
}

/**
 * Check a permission and request it once if not granted
 */
async function checkAndRequest(
  subsystem: PermissionSubsystem,
  permission: PermissionKind
): Promise<PermissionStatus> {
  let status = await safeCall(permission, 'status', () => subsystem.status(permission));
  if (status !== 'granted') {
    logger.info('permissions', `Requesting ${permission} permission`);
    status = await safeCall(permission, 'request', () => subsystem.request(permission));
  }
  logger.debug('permissions', `${permission}: ${status}`);
  return status;
}

async function isServiceEnabled(subsystem: PermissionSubsystem): Promise<boolean> {
  try {
    return await subsystem.isLocationServiceEnabled();
  } catch (error) {
    logger.warn('permissions', 'Error checking location service, treating as disabled', {
      error: describeError(error),
    });
    return false;
  }
}

async function readAccuracy(subsystem: PermissionSubsystem): Promise<LocationAccuracyStatus | null> {
  if (!subsystem.getLocationAccuracy) return null;
  try {
    return await subsystem.getLocationAccuracy();
  } catch (error) {
    logger.warn('permissions', 'Error reading location accuracy, treating as reduced', {
      error: describeError(error),
    });
    return 'reduced';
  }
}

// ============================================
// EVALUATE
// ============================================

export async function evaluatePermissions(subsystem: PermissionSubsystem): Promise<PermissionSnapshot> {
  if (!(await isServiceEnabled(subsystem))) {
    logger.warn('permissions', 'Location services are disabled');
    return {
      locationServiceEnabled: false,
      locationGranted: false,
      alwaysGranted: false,
      notificationsGranted: false,
      preciseLocation: false,
      needsManualSettings: false,
      accuracyStatus: null,
    };
  }

  const locationStatus = await checkAndRequest(subsystem, 'location');
  if (locationStatus !== 'granted') {
    logger.warn('permissions', 'Location permission denied', { status: locationStatus });
    return {
      locationServiceEnabled: true,
      locationGranted: false,
      alwaysGranted: false,
      notificationsGranted: false,
      preciseLocation: false,
      needsManualSettings: locationStatus === 'permanentlyDenied',
      accuracyStatus: null,
    };
  }

  // Foreground-only monitoring still works, so no short-circuit here
  const alwaysStatus = await checkAndRequest(subsystem, 'locationAlways');

  const accuracyStatus = await readAccuracy(subsystem);
  const preciseLocation = accuracyStatus === null || accuracyStatus === 'precise';

  const notificationStatus = await checkAndRequest(subsystem, 'notification');

  const snapshot: PermissionSnapshot = {
    locationServiceEnabled: true,
    locationGranted: true,
    alwaysGranted: alwaysStatus === 'granted',
    notificationsGranted: notificationStatus === 'granted',
    preciseLocation,
    needsManualSettings:
      alwaysStatus === 'permanentlyDenied' ||
      notificationStatus === 'permanentlyDenied' ||
      !preciseLocation,
    accuracyStatus,
  };

  logger.info('permissions', 'Permission evaluation completed', {
    alwaysGranted: snapshot.alwaysGranted,
    notificationsGranted: snapshot.notificationsGranted,
    preciseLocation: snapshot.preciseLocation,
    needsManualSettings: snapshot.needsManualSettings,
  });

  return snapshot;
}

/**
 * Status line for the permission section
 */
export function describePermissions(snapshot: PermissionSnapshot): string {
  if (!snapshot.locationServiceEnabled) return 'Location services disabled';
  if (!snapshot.locationGranted) return 'Location permission denied.';

  const locationText = snapshot.alwaysGranted ? 'Location: always' : 'Location: while in use';
  const notificationText = snapshot.notificationsGranted
    ? 'Notifications: granted'
    : 'Notifications: denied';
  return `${locationText} • ${notificationText}`;
}

/**
 * Settings escape hatch for permanently denied permissions
 */
export async function openAppSettings(subsystem: PermissionSubsystem): Promise<boolean> {
  try {
    const opened = await subsystem.openAppSettings();
    logger.info('permissions', `Open settings: ${opened ? 'opened' : 'not opened'}`);
    return opened;
  } catch (error) {
    logger.error('permissions', 'Error opening app settings', { error: describeError(error) });
    return false;
  }
}
