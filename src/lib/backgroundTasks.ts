/**
 * Background Tasks - Nearby Alerts
 *
 * The transition handler the geofence service invokes when a fence is
 * crossed. It can run at cold start, with nothing else initialized, so it
 * bootstraps only a notification channel and never reads foreground state.
 *
 * Per entry: notification (id from key + kind, so redelivery overwrites),
 * then a TransitionEvent on the relay (dropped when nobody listens).
 */

import { logger } from './logger';
import { captureError } from './errors';
import { geofenceNameFromKey } from './targets';
import {
  composeTransitionNotification,
  initializeNotifications,
  showTransitionNotification,
  type NotificationChannel,
} from './notifications';
import { sendTransition, type PortRegistry } from './relay';
import {
  isTransitionKind,
  type TransitionBatch,
  type TransitionCallback,
  type TransitionEvent,
  type TransitionKind,
} from './backgroundTypes';

// ============================================
// TYPES
// ============================================

export interface BackgroundContext {
  /** Called once per invocation; the handler owns the channel it gets */
  createNotificationChannel: () => NotificationChannel;
  portRegistry: PortRegistry;
  now?: () => Date;
}

// ============================================
// TRANSITION HANDLER
// ============================================

export function createTransitionHandler(context: BackgroundContext): TransitionCallback {
  const now = context.now ?? (() => new Date());

  return async (batch: TransitionBatch): Promise<void> => {
    const transitions: { geofenceKey: string; kind: TransitionKind }[] = [];
    for (const { geofenceKey, eventKind } of batch) {
      if (isTransitionKind(eventKind)) {
        transitions.push({ geofenceKey, kind: eventKind });
      } else {
        logger.debug('geofence', `Ignoring ${eventKind} @ ${geofenceKey}`);
      }
    }
    if (transitions.length === 0) return;

    let channel: NotificationChannel | null = null;
    try {
      channel = context.createNotificationChannel();
    } catch (error) {
      captureError(error, 'notification_error', { action: 'createNotificationChannel' });
    }
    const notificationsReady = channel !== null && (await initializeNotifications(channel));

    for (const { geofenceKey, kind } of transitions) {
      logger.info('geofence', `📍 Geofence ${kind}: ${geofenceNameFromKey(geofenceKey)}`);

      if (channel && notificationsReady) {
        await showTransitionNotification(channel, composeTransitionNotification(geofenceKey, kind));
      }

      const event: TransitionEvent = {
        geofenceKey,
        kind,
        timestamp: now().toISOString(),
      };
      sendTransition(context.portRegistry, event);
    }
  };
}
