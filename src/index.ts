export { createNearbyAlerts } from './lib/bootstrap';
export type { NearbyAlerts, NearbyAlertsOptions, PlatformServices } from './lib/bootstrap';

export { loadConfig } from './lib/config';
export type { AppConfig, Environment } from './lib/config';

export {
  DEFAULT_RADIUS_METERS,
  DEFAULT_TARGET_NAME,
  GEOFENCE_ID_SEPARATOR,
  RELAY_PORT_NAME,
} from './lib/constants';

export {
  ConfigError,
  GeofenceServiceError,
  GeofenceSyncError,
  NearbyAlertsError,
  PreconditionError,
  RegistrationError,
  TargetLoadError,
  describeError,
} from './lib/errors';
export type { ErrorType, GeofenceErrorCode, RegistrationRequirement } from './lib/errors';

export { addLogListener, configureLogger, exportLogsAsText, getStoredLogs, logger } from './lib/logger';
export type { LogCategory, LogEntry, LogLevel } from './lib/logger';

export {
  createFileTargetSource,
  effectiveRadius,
  geofenceKeyOf,
  geofenceNameFromKey,
  loadTargets,
  makeGeofenceKey,
  parseTargets,
  parseTargetsJson,
} from './lib/targets';
export type { Target, TargetSource } from './lib/targets';

export { describePermissions, evaluatePermissions, openAppSettings } from './lib/permissions';
export type {
  LocationAccuracyStatus,
  PermissionKind,
  PermissionSnapshot,
  PermissionStatus,
  PermissionSubsystem,
} from './lib/permissions';

export { GeofenceRegistrar, buildDescriptor, buildPlatformHints } from './lib/registrar';
export type { RegistrationResult, SyncResult } from './lib/registrar';

export type {
  GeofenceDescriptor,
  GeofenceService,
  PlatformHints,
} from './lib/geofenceService';

export { createTransitionHandler } from './lib/backgroundTasks';
export type { BackgroundContext } from './lib/backgroundTasks';

export type {
  GeofenceEventKind,
  TransitionBatch,
  TransitionBatchEntry,
  TransitionCallback,
  TransitionEvent,
  TransitionKind,
} from './lib/backgroundTypes';

export {
  TRANSITION_NOTIFICATION_DETAILS,
  composeTransitionNotification,
  notificationIdFor,
} from './lib/notifications';
export type { NotificationChannel, NotificationDetails } from './lib/notifications';

export { PortRegistry, RelayReceiver, portRegistry, sendTransition } from './lib/relay';
export type { RelayPort } from './lib/relay';

export { PositionWatch, calculateDistance, formatDistance } from './lib/location';
export type {
  Coordinates,
  LocationSettings,
  Position,
  PositionProvider,
  PositionSubscription,
} from './lib/location';

export {
  createMonitorStore,
  distanceTo,
  selectIsInside,
  selectTargetRows,
} from './stores/monitorStore';
export type { InsideEntry, MonitorState, MonitorStore, TargetRow } from './stores/monitorStore';
