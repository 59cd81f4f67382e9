/**
 * Location Service - Nearby Alerts
 *
 * - Current position (single-flight)
 * - Real-time position watch (cancel + restart is idempotent)
 * - Great-circle distance for display
 *
 * Distances are informational: the inside/outside flag only ever comes
 * from geofence transitions.
 */

import { logger } from './logger';
import { describeError } from './errors';
import { DEFAULT_DISTANCE_FILTER_METERS } from './constants';

// ============================================
// TYPES
// ============================================

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Position extends Coordinates {
  accuracy: number | null;
  timestamp: number;
}

export type LocationAccuracy = 'high' | 'balanced' | 'low';

export interface LocationSettings {
  accuracy: LocationAccuracy;
  distanceFilterMeters: number;
}

export interface PositionSubscription {
  cancel(): void;
}

export interface PositionProvider {
  getCurrentPosition(settings: LocationSettings): Promise<Position>;
  watchPosition(
    settings: LocationSettings,
    onPosition: (position: Position) => void,
    onError: (error: unknown) => void
  ): PositionSubscription;
}

// ============================================
// DISTANCE
// ============================================

const EARTH_RADIUS_METERS = 6371e3;

/**
 * Haversine distance in meters
 */
export function calculateDistance(point1: Coordinates, point2: Coordinates): number {
  const φ1 = (point1.latitude * Math.PI) / 180;
  const φ2 = (point2.latitude * Math.PI) / 180;
  const Δφ = ((point2.latitude - point1.latitude) * Math.PI) / 180;
  const Δλ = ((point2.longitude - point1.longitude) * Math.PI) / 180;

  const a =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_METERS * c;
}

export function formatDistance(meters: number | null): string {
  if (meters === null || !Number.isFinite(meters)) return '--';
  if (meters < 1000) {
    return `${Math.round(meters)}m`;
  }
  return `${(meters / 1000).toFixed(1)}km`;
}

// ============================================
// POSITION WATCH
// ============================================

export interface PositionWatchHandlers {
  onPosition: (position: Position) => void;
  onError: (error: unknown) => void;
}

/**
 * Long-lived position stream. start() cancels any running subscription
 * first, so calling it twice leaves exactly one.
 */
export class PositionWatch {
  private subscription: PositionSubscription | null = null;
  private pendingFix: Promise<Position> | null = null;

  constructor(
    private readonly provider: PositionProvider,
    private readonly distanceFilterMeters: number = DEFAULT_DISTANCE_FILTER_METERS
  ) {}

  get settings(): LocationSettings {
    return { accuracy: 'high', distanceFilterMeters: this.distanceFilterMeters };
  }

  get isWatching(): boolean {
    return this.subscription !== null;
  }

  start(handlers: PositionWatchHandlers): boolean {
    this.stop();
    try {
      logger.info('gps', '👁️ Starting position watch');
      this.subscription = this.provider.watchPosition(
        this.settings,
        position => {
          logger.debug('gps', 'Position update', {
            lat: position.latitude,
            lng: position.longitude,
          });
          handlers.onPosition(position);
        },
        handlers.onError
      );
      return true;
    } catch (error) {
      logger.error('gps', 'Error starting position watch', { error: describeError(error) });
      handlers.onError(error);
      return false;
    }
  }

  stop(): void {
    if (this.subscription) {
      logger.info('gps', '⏹️ Stopping position watch');
      this.subscription.cancel();
      this.subscription = null;
    }
  }

  /**
   * Single-flight: concurrent callers share one pending fix
   */
  getCurrentPosition(): Promise<Position> {
    if (this.pendingFix) {
      logger.debug('gps', '♻️ Reusing pending location request');
      return this.pendingFix;
    }

    const fix = this.provider.getCurrentPosition(this.settings);
    this.pendingFix = fix;
    const clear = () => {
      this.pendingFix = null;
    };
    void fix.then(clear, clear);
    return fix;
  }
}
