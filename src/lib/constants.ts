/**
 * Shared Constants - Nearby Alerts
 *
 * Constants shared between the foreground controller and the background
 * transition handler. Kept dependency-free so the background entry point
 * can import them without pulling in foreground state.
 */

// Radius used when a saved place has none
export const DEFAULT_RADIUS_METERS = 200;

export const DEFAULT_TARGET_NAME = 'Saved place';

// GeofenceKey = `${id}${GEOFENCE_ID_SEPARATOR}${name}`
export const GEOFENCE_ID_SEPARATOR = '::';

// Well-known relay endpoint (must match across foreground and background)
export const RELAY_PORT_NAME = 'nearby_alerts_geofence_port';

// Notification channel
export const NOTIFICATION_CHANNEL_ID = 'nearby_alerts';
export const NOTIFICATION_CHANNEL_NAME = 'Nearby Alerts';
export const NOTIFICATION_CHANNEL_DESCRIPTION = 'Alerts when you are close to a saved location.';

// Platform delivery hints (battery vs latency)
export const DEFAULT_NOTIFICATION_RESPONSIVENESS_MS = 60 * 1000; // 1 minute

// Live position stream
export const DEFAULT_DISTANCE_FILTER_METERS = 10;

export const DEFAULT_TARGETS_PATH = 'assets/coordinates.json';
