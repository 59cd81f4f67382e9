/**
 * Notification System - Nearby Alerts
 *
 * Transition alerts are informative only (no action buttons).
 *
 * DEDUPE: the notification id is derived from (geofenceKey, kind), so a
 * repeated delivery of the same transition replaces the visible alert
 * instead of stacking a second one.
 */

import { createHash } from 'node:crypto';
import { logger } from './logger';
import { describeError } from './errors';
import { geofenceNameFromKey } from './targets';
import type { GeofenceEventKind, TransitionKind } from './backgroundTypes';
import {
  NOTIFICATION_CHANNEL_DESCRIPTION,
  NOTIFICATION_CHANNEL_ID,
  NOTIFICATION_CHANNEL_NAME,
} from './constants';

// ============================================
// TYPES
// ============================================

export type NotificationImportance = 'default' | 'high';

export interface NotificationDetails {
  android: {
    channelId: string;
    channelName: string;
    channelDescription: string;
    importance: NotificationImportance;
    priority: NotificationImportance;
  };
  ios: {
    presentAlert: boolean;
    presentSound: boolean;
  };
}

export interface NotificationChannel {
  initialize(): Promise<void>;
  show(id: number, title: string, body: string, details: NotificationDetails): Promise<void>;
}

export interface TransitionNotification {
  id: number;
  title: string;
  body: string;
}

// ============================================
// CONSTANTS
// ============================================

export const TRANSITION_NOTIFICATION_DETAILS: NotificationDetails = {
  android: {
    channelId: NOTIFICATION_CHANNEL_ID,
    channelName: NOTIFICATION_CHANNEL_NAME,
    channelDescription: NOTIFICATION_CHANNEL_DESCRIPTION,
    importance: 'high',
    priority: 'high',
  },
  ios: { presentAlert: true, presentSound: true },
};

// Matches the service's event ordering: enter, exit, dwell
const KIND_INDEX: Record<GeofenceEventKind, number> = {
  enter: 0,
  exit: 1,
  dwell: 2,
};

// ============================================
// IDS & CONTENT
// ============================================

/**
 * Deterministic across processes (a cold-started background handler must
 * produce the same id as the previous delivery).
 */
export function notificationIdFor(geofenceKey: string, kind: GeofenceEventKind): number {
  const digest = createHash('sha256').update(geofenceKey, 'utf8').digest();
  const base = digest.readUInt32BE(0) & 0x7fffffff;
  return base ^ KIND_INDEX[kind];
}

export function composeTransitionNotification(
  geofenceKey: string,
  kind: TransitionKind
): TransitionNotification {
  const name = geofenceNameFromKey(geofenceKey);
  return {
    id: notificationIdFor(geofenceKey, kind),
    title: kind === 'enter' ? `Entered: ${name}` : `Exited: ${name}`,
    body: `Geofence ${kind} detected.`,
  };
}

// ============================================
// PRESENTATION
// ============================================

export async function initializeNotifications(channel: NotificationChannel): Promise<boolean> {
  try {
    await channel.initialize();
    logger.debug('notification', 'Notification channel ready');
    return true;
  } catch (error) {
    logger.error('notification', 'Error initializing notification channel', {
      error: describeError(error),
    });
    return false;
  }
}

export async function showTransitionNotification(
  channel: NotificationChannel,
  notification: TransitionNotification
): Promise<boolean> {
  try {
    await channel.show(
      notification.id,
      notification.title,
      notification.body,
      TRANSITION_NOTIFICATION_DETAILS
    );
    logger.info('notification', `📬 ${notification.title}`, { notificationId: notification.id });
    return true;
  } catch (error) {
    logger.error('notification', '❌ Error showing transition notification', {
      error: describeError(error),
      title: notification.title,
    });
    return false;
  }
}
