/**
 * Geofence Registrar - Nearby Alerts
 *
 * Makes the geofence service's registration table equal to the saved
 * places. Every pass is a full replace (clearAll, then register each
 * target); the active count is read back from the service afterwards.
 *
 * Passes are serialized: a synchronize() issued while another is running
 * waits for it, so two clear-and-register passes never interleave.
 */

import { logger } from './logger';
import {
  GeofenceSyncError,
  PreconditionError,
  RegistrationError,
  captureError,
  describeError,
  geofenceErrorCode,
  type RegistrationRequirement,
} from './errors';
import { DEFAULT_NOTIFICATION_RESPONSIVENESS_MS } from './constants';
import { effectiveRadius, geofenceKeyOf, type Target } from './targets';
import type { PermissionSnapshot } from './permissions';
import type { GeofenceDescriptor, GeofenceService, PlatformHints } from './geofenceService';
import type { TransitionCallback, TransitionKind } from './backgroundTypes';

// ============================================
// TYPES
// ============================================

export interface RegistrationResult {
  activeCount: number;
  submitted: number;
  failures: RegistrationError[];
}

export type SyncResult =
  | { ok: true; value: RegistrationResult }
  | { ok: false; error: PreconditionError | GeofenceSyncError };

export interface RegistrarOptions {
  notificationResponsivenessMs?: number;
}

const TRIGGERS: ReadonlySet<TransitionKind> = new Set<TransitionKind>(['enter', 'exit']);

// ============================================
// HELPERS
// ============================================

export function missingRequirements(snapshot: PermissionSnapshot): RegistrationRequirement[] {
  const missing: RegistrationRequirement[] = [];
  if (!snapshot.locationGranted) missing.push('locationGranted');
  if (!snapshot.alwaysGranted) missing.push('alwaysGranted');
  if (!snapshot.preciseLocation) missing.push('preciseLocation');
  return missing;
}

export function buildPlatformHints(notificationResponsivenessMs: number): PlatformHints {
  return {
    ios: { initialTrigger: true },
    android: {
      initialTriggers: ['enter'],
      notificationResponsivenessMs,
    },
  };
}

export function buildDescriptor(target: Target, hints: PlatformHints): GeofenceDescriptor {
  return {
    key: geofenceKeyOf(target),
    latitude: target.latitude,
    longitude: target.longitude,
    radiusMeters: effectiveRadius(target),
    triggers: TRIGGERS,
    platformHints: hints,
  };
}

// ============================================
// REGISTRAR
// ============================================

export class GeofenceRegistrar {
  private readonly hints: PlatformHints;
  private queue: Promise<unknown> = Promise.resolve();
  private inFlight = 0;

  constructor(
    private readonly service: GeofenceService,
    private readonly callback: TransitionCallback,
    options: RegistrarOptions = {}
  ) {
    this.hints = buildPlatformHints(
      options.notificationResponsivenessMs ?? DEFAULT_NOTIFICATION_RESPONSIVENESS_MS
    );
  }

  synchronize(targets: readonly Target[], snapshot: PermissionSnapshot): Promise<SyncResult> {
    if (this.inFlight > 0) {
      logger.debug('geofence', '⏳ Sync already running, queued behind it');
    }
    this.inFlight += 1;

    const run = this.queue.then(() => this.runPass(targets, snapshot));
    // Rejections reach the caller through `run`
    const settle = () => {
      this.inFlight -= 1;
    };
    this.queue = run.then(settle, settle);
    return run;
  }

  private async runPass(targets: readonly Target[], snapshot: PermissionSnapshot): Promise<SyncResult> {
    if (targets.length === 0) {
      logger.info('geofence', 'No saved places, nothing to register');
      return { ok: true, value: { activeCount: 0, submitted: 0, failures: [] } };
    }

    const missing = missingRequirements(snapshot);
    if (missing.length > 0) {
      const error = new PreconditionError(missing);
      logger.warn('geofence', error.message);
      return { ok: false, error };
    }

    logger.info('geofence', `🎯 Synchronizing ${targets.length} geofence(s)`);

    try {
      await this.service.clearAll();
    } catch (error) {
      const syncError = new GeofenceSyncError(
        geofenceErrorCode(error),
        `Could not clear geofences: ${describeError(error)}`
      );
      captureError(syncError, 'geofence_error', { action: 'clearAll' });
      return { ok: false, error: syncError };
    }

    const failures: RegistrationError[] = [];
    let submitted = 0;

    for (const target of targets) {
      const descriptor = buildDescriptor(target, this.hints);
      try {
        await this.service.register(descriptor, this.callback);
        submitted += 1;
        logger.debug('geofence', `Submitted ${descriptor.key} radius=${descriptor.radiusMeters}m`);
      } catch (error) {
        const failure = new RegistrationError(geofenceErrorCode(error), descriptor.key);
        failures.push(failure);
        logger.warn('geofence', failure.message, { error: describeError(error) });
      }
    }

    let active: string[];
    try {
      active = await this.service.listActive();
    } catch (error) {
      const syncError = new GeofenceSyncError(
        geofenceErrorCode(error),
        `Could not read active geofences: ${describeError(error)}`
      );
      captureError(syncError, 'geofence_error', { action: 'listActive' });
      return { ok: false, error: syncError };
    }

    logger.info('geofence', `✅ ${active.length} geofence(s) active`, {
      submitted,
      failed: failures.length,
    });

    return { ok: true, value: { activeCount: active.length, submitted, failures } };
  }
}
