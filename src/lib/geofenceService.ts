/**
 * Geofence Service Contract - Nearby Alerts
 *
 * The OS geofence monitor seen from the reconciliation core. Hosts provide
 * an implementation; the registrar only ever talks to this interface.
 *
 * - register() is fire-and-register: resolving means "accepted for
 *   persistence", not "active". listActive() is the source of truth.
 * - Rejections throw GeofenceServiceError with a code.
 */

import type { TransitionCallback, TransitionKind } from './backgroundTypes';

export interface IosGeofenceSettings {
  /** Fire immediately if already inside when registered */
  initialTrigger: boolean;
}

export interface AndroidGeofenceSettings {
  initialTriggers: readonly TransitionKind[];
  /** Battery vs latency trade-off; not correctness-critical */
  notificationResponsivenessMs: number;
}

export interface PlatformHints {
  ios: IosGeofenceSettings;
  android: AndroidGeofenceSettings;
}

export interface GeofenceDescriptor {
  key: string;
  latitude: number;
  longitude: number;
  radiusMeters: number;
  triggers: ReadonlySet<TransitionKind>;
  platformHints: PlatformHints;
}

export interface GeofenceService {
  initialize(): Promise<void>;
  clearAll(): Promise<void>;
  register(descriptor: GeofenceDescriptor, callback: TransitionCallback): Promise<void>;
  listActive(): Promise<string[]>;
}
