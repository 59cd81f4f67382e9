/**
 * Background Types - Nearby Alerts
 *
 * Types that cross the boundary between the geofence service, the
 * background transition handler and the foreground relay listener.
 */

// ============================================
// EVENTS
// ============================================

export type TransitionKind = 'enter' | 'exit';

/** The service may report lifecycle signals besides enter/exit */
export type GeofenceEventKind = TransitionKind | 'dwell';

export interface TransitionBatchEntry {
  geofenceKey: string;
  eventKind: GeofenceEventKind;
}

export type TransitionBatch = readonly TransitionBatchEntry[];

/**
 * Relay payload. `timestamp` is ISO-8601 and is the only recency signal:
 * arrival order on the relay is not guaranteed.
 */
export interface TransitionEvent {
  geofenceKey: string;
  kind: TransitionKind;
  timestamp: string;
}

// ============================================
// CALLBACK TYPES
// ============================================

/** Entry point the geofence service invokes, possibly at cold start */
export type TransitionCallback = (batch: TransitionBatch) => Promise<void>;

export function isTransitionKind(kind: string): kind is TransitionKind {
  return kind === 'enter' || kind === 'exit';
}
