/**
 * Bootstrap - Nearby Alerts
 *
 * Foreground controller. Owns the monitor store, the relay receiver, the
 * registrar and the position watch, and runs the startup flow:
 *
 *   relay port → notifications → saved places → geofence service →
 *   permissions → registration → live position
 *
 * Every operation catches at its own boundary and ends in a status line;
 * nothing thrown here reaches the host.
 */

import { configureLogger, logger } from './logger';
import { loadConfig, type AppConfig } from './config';
import { initSentry } from './sentry';
import {
  PreconditionError,
  captureError,
  describeError,
  geofenceErrorCode,
} from './errors';
import { RELAY_PORT_NAME } from './constants';
import { createFileTargetSource, loadTargets, type TargetSource } from './targets';
import {
  evaluatePermissions,
  openAppSettings,
  type PermissionSnapshot,
  type PermissionSubsystem,
} from './permissions';
import { GeofenceRegistrar, missingRequirements } from './registrar';
import { createTransitionHandler } from './backgroundTasks';
import { initializeNotifications, type NotificationChannel } from './notifications';
import { PortRegistry, RelayReceiver, portRegistry as defaultPortRegistry } from './relay';
import { PositionWatch, type PositionProvider } from './location';
import type { GeofenceService } from './geofenceService';
import type { TransitionCallback } from './backgroundTypes';
import { createMonitorStore, type MonitorStore } from '../stores/monitorStore';

// ============================================
// TYPES
// ============================================

export interface PlatformServices {
  permissions: PermissionSubsystem;
  geofences: GeofenceService;
  positions: PositionProvider;
  createNotificationChannel: () => NotificationChannel;
  /** Defaults to the file named by NEARBY_ALERTS_TARGETS_PATH */
  targetSource?: TargetSource;
}

export interface NearbyAlertsOptions {
  config?: AppConfig;
  portRegistry?: PortRegistry;
  store?: MonitorStore;
  now?: () => Date;
}

export interface NearbyAlerts {
  store: MonitorStore;
  /** Callback handed to the geofence service; safe to run at cold start */
  transitionHandler: TransitionCallback;
  initialize: () => Promise<void>;
  registerGeofences: () => Promise<void>;
  refreshOnce: () => Promise<void>;
  openSettings: () => Promise<boolean>;
  dispose: () => void;
}

// ============================================
// HELPERS
// ============================================

function resolveConfig(config: AppConfig | undefined): AppConfig {
  if (config) return config;
  try {
    return loadConfig();
  } catch (error) {
    captureError(error, 'config_error', { action: 'loadConfig' });
    return loadConfig({});
  }
}

function preconditionStatus(snapshot: PermissionSnapshot): string {
  if (!snapshot.locationGranted || !snapshot.alwaysGranted) {
    return 'Location permissions are required before registering geofences.';
  }
  return 'Enable precise location to register geofences.';
}

// ============================================
// CONTROLLER
// ============================================

export function createNearbyAlerts(
  platform: PlatformServices,
  options: NearbyAlertsOptions = {}
): NearbyAlerts {
  const config = resolveConfig(options.config);
  const registry = options.portRegistry ?? defaultPortRegistry;
  const store = options.store ?? createMonitorStore();
  const targetSource = platform.targetSource ?? createFileTargetSource(config.targetsPath);

  // Only factories cross into the background handler, never foreground state
  const transitionHandler = createTransitionHandler({
    createNotificationChannel: platform.createNotificationChannel,
    portRegistry: registry,
    now: options.now,
  });

  const registrar = new GeofenceRegistrar(platform.geofences, transitionHandler, {
    notificationResponsivenessMs: config.notificationResponsivenessMs,
  });
  const positionWatch = new PositionWatch(platform.positions, config.distanceFilterMeters);

  let receiver: RelayReceiver | null = null;
  let initialized = false;
  // Bumped by dispose(); an initialize() from an older generation stops at its next step
  let generation = 0;

  // ============================================
  // RELAY
  // ============================================

  function attachRelay(): void {
    registry.remove(RELAY_PORT_NAME);
    const next = new RelayReceiver();
    next.listen(message => {
      store.getState().handleRelayMessage(message);
    });
    registry.register(RELAY_PORT_NAME, next);
    receiver = next;
  }

  function detachRelay(): void {
    if (!receiver) return;
    // A newer foreground may have replaced our port already
    if (registry.lookup(RELAY_PORT_NAME) === receiver) {
      registry.remove(RELAY_PORT_NAME);
    }
    receiver.close();
    receiver = null;
  }

  // ============================================
  // STEPS
  // ============================================

  async function loadSavedPlaces(): Promise<void> {
    try {
      const targets = await loadTargets(targetSource);
      store.getState().setTargets(targets);
      store.getState().setStatus(`Loaded ${targets.length} saved locations.`);
    } catch (error) {
      captureError(error, 'target_load_error', { action: 'loadTargets' });
      store.getState().setTargets([]);
      store.getState().setStatus(`Failed to load saved locations: ${describeError(error)}`);
    }
  }

  async function evaluateAndPublish(): Promise<PermissionSnapshot> {
    const snapshot = await evaluatePermissions(platform.permissions);
    store.getState().setPermissions(snapshot);
    if (!snapshot.locationServiceEnabled) {
      store.getState().setStatus('Location services are disabled.');
    }
    return snapshot;
  }

  async function synchronize(snapshot: PermissionSnapshot): Promise<void> {
    const { targets } = store.getState();

    if (missingRequirements(snapshot).length > 0) {
      store.getState().setRegistration(false, preconditionStatus(snapshot));
      return;
    }

    try {
      const result = await registrar.synchronize(targets, snapshot);

      if (!result.ok) {
        const status =
          result.error instanceof PreconditionError
            ? preconditionStatus(snapshot)
            : `Geofence error: ${result.error.code}`;
        store.getState().setRegistration(false, status);
        return;
      }

      if (targets.length === 0) {
        store.getState().setStatus('No saved locations to monitor.');
        return;
      }

      const { activeCount, failures } = result.value;
      const failed = failures.length > 0 ? ` (${failures.length} failed)` : '';
      store.getState().setRegistration(true, `Registered ${activeCount} geofences${failed}.`);
    } catch (error) {
      captureError(error, 'geofence_error', { action: 'synchronize' });
      store.getState().setRegistration(false, `Geofence error: ${describeError(error)}`);
    }
  }

  async function refreshOnce(): Promise<void> {
    try {
      const position = await positionWatch.getCurrentPosition();
      store.getState().setPosition(position);
    } catch (error) {
      logger.warn('gps', 'Unable to get current position', { error: describeError(error) });
      store.getState().setStatus(`Unable to get current position: ${describeError(error)}`);
    }
  }

  async function startLocationStream(run: number): Promise<void> {
    if (run !== generation) return;
    positionWatch.start({
      onPosition: position => store.getState().setPosition(position),
      onError: error => {
        logger.error('gps', 'Position stream error', { error: describeError(error) });
        store.getState().setStatus(`Location error: ${describeError(error)}`);
      },
    });
    await refreshOnce();
  }

  // ============================================
  // PUBLIC OPERATIONS
  // ============================================

  async function initialize(): Promise<void> {
    if (initialized) {
      logger.debug('boot', '⚠️ Already initialized - skipping');
      return;
    }
    initialized = true;
    const run = generation;
    const disposed = () => run !== generation;

    configureLogger({ enableConsole: config.logToConsole });
    initSentry({ dsn: config.sentryDsn, environment: config.environment });
    logger.info('boot', '🎧 Initializing foreground...');

    try {
      attachRelay();

      const foregroundChannel = platform.createNotificationChannel();
      await initializeNotifications(foregroundChannel);
      if (disposed()) return;

      await loadSavedPlaces();
      if (disposed()) return;

      let serviceReady = true;
      try {
        await platform.geofences.initialize();
      } catch (error) {
        serviceReady = false;
        captureError(error, 'geofence_error', { action: 'initialize' });
        store.getState().setRegistration(false, `Geofence error: ${geofenceErrorCode(error)}`);
      }
      if (disposed()) return;

      const snapshot = await evaluateAndPublish();
      if (disposed()) return;
      if (!snapshot.locationGranted) {
        logger.warn('boot', 'Location not granted, monitoring stays off');
        return;
      }

      if (!serviceReady) {
        logger.warn('boot', 'Geofence service unavailable, skipping registration');
      } else if (snapshot.alwaysGranted && snapshot.preciseLocation) {
        await synchronize(snapshot);
        if (disposed()) return;
      } else {
        store.getState().setRegistration(
          false,
          snapshot.alwaysGranted
            ? 'Precise location is required for geofences.'
            : 'Background geofences need "Allow all the time" location permission.'
        );
      }

      await startLocationStream(run);
      if (disposed()) return;
      logger.info('boot', '✅ Foreground ready');
    } catch (error) {
      if (disposed()) return;
      captureError(error, 'unknown_error', { action: 'initialize' });
      store.getState().setStatus(`Initialization failed: ${describeError(error)}`);
    }
  }

  async function registerGeofences(): Promise<void> {
    try {
      const snapshot = await evaluateAndPublish();
      await synchronize(snapshot);
    } catch (error) {
      captureError(error, 'geofence_error', { action: 'registerGeofences' });
      store.getState().setRegistration(false, `Geofence error: ${describeError(error)}`);
    }
  }

  async function openSettings(): Promise<boolean> {
    return openAppSettings(platform.permissions);
  }

  function dispose(): void {
    generation += 1;
    positionWatch.stop();
    detachRelay();
    initialized = false;
    logger.info('boot', '🧹 Foreground disposed');
  }

  return {
    store,
    transitionHandler,
    initialize,
    registerGeofences,
    refreshOnce,
    openSettings,
    dispose,
  };
}
