/**
 * Monitor Store - Nearby Alerts
 *
 * Foreground reconciliation state: which saved places we are inside, the
 * last transition, and the status lines for the UI.
 *
 * The inside/outside flag is written ONLY by applyTransition(). Live
 * position feeds display distances and nothing else.
 *
 * Single foreground event loop, so relay delivery and reads are serialized
 * without locking. Transitions overwrite in arrival order; the timestamp is
 * carried along for display, not used to reorder.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { calculateDistance, type Coordinates, type Position } from '../lib/location';
import {
  effectiveRadius,
  geofenceKeyOf,
  geofenceNameFromKey,
  type Target,
} from '../lib/targets';
import {
  describePermissions,
  type LocationAccuracyStatus,
  type PermissionSnapshot,
} from '../lib/permissions';
import type { TransitionEvent, TransitionKind } from '../lib/backgroundTypes';

// ============================================
// TYPES
// ============================================

export interface InsideEntry {
  inside: boolean;
  lastEvent: { kind: TransitionKind; timestamp: string };
}

export interface TargetRow {
  geofenceKey: string;
  name: string;
  latitude: number;
  longitude: number;
  radiusMeters: number;
  distanceMeters: number | null;
  inside: boolean;
}

export interface MonitorState {
  // State
  targets: Target[];
  insideState: Record<string, InsideEntry>;
  lastEvent: TransitionEvent | null;
  lastEventSummary: string;
  status: string;
  permissionStatus: string;
  needsSettings: boolean;
  accuracyStatus: LocationAccuracyStatus | null;
  geofencesRegistered: boolean;
  position: Position | null;

  // Actions
  setTargets: (targets: Target[]) => void;
  setStatus: (status: string) => void;
  setPermissions: (snapshot: PermissionSnapshot) => void;
  setRegistration: (registered: boolean, status: string) => void;
  setPosition: (position: Position) => void;
  applyTransition: (event: TransitionEvent) => void;
  handleRelayMessage: (message: unknown) => boolean;
}

export type MonitorStore = StoreApi<MonitorState>;

// ============================================
// RELAY PAYLOAD
// ============================================

const transitionMessageSchema = z.object({
  geofenceKey: z.string().min(1),
  kind: z.enum(['enter', 'exit']),
  timestamp: z.string().min(1),
});

export function parseTransitionMessage(message: unknown): TransitionEvent | null {
  const parsed = transitionMessageSchema.safeParse(message);
  return parsed.success ? parsed.data : null;
}

export function summarizeTransition(event: TransitionEvent): string {
  return `${event.kind}: ${geofenceNameFromKey(event.geofenceKey)} @ ${event.timestamp}`;
}

// ============================================
// DISTANCE (display only)
// ============================================

export function distanceTo(target: Target, position: Coordinates): number {
  return calculateDistance(position, { latitude: target.latitude, longitude: target.longitude });
}

// ============================================
// STORE
// ============================================

export function createMonitorStore(): MonitorStore {
  return createStore<MonitorState>()((set, get) => ({
    // Initial state
    targets: [],
    insideState: {},
    lastEvent: null,
    lastEventSummary: 'None',
    status: 'Initializing...',
    permissionStatus: 'Unknown',
    needsSettings: false,
    accuracyStatus: null,
    geofencesRegistered: false,
    position: null,

    setTargets: (targets) => set({ targets }),

    setStatus: (status) => set({ status }),

    setPermissions: (snapshot) =>
      set({
        permissionStatus: describePermissions(snapshot),
        needsSettings: snapshot.needsManualSettings,
        accuracyStatus: snapshot.accuracyStatus,
      }),

    setRegistration: (registered, status) => set({ geofencesRegistered: registered, status }),

    setPosition: (position) => set({ position }),

    applyTransition: (event) => {
      const entry: InsideEntry = {
        inside: event.kind === 'enter',
        lastEvent: { kind: event.kind, timestamp: event.timestamp },
      };
      set({
        insideState: { ...get().insideState, [event.geofenceKey]: entry },
        lastEvent: event,
        lastEventSummary: summarizeTransition(event),
      });
      logger.debug('state', `${event.geofenceKey} → ${entry.inside ? 'inside' : 'outside'}`);
    },

    handleRelayMessage: (message) => {
      const event = parseTransitionMessage(message);
      if (!event) {
        logger.warn('relay', 'Ignoring malformed relay message');
        return false;
      }
      get().applyTransition(event);
      return true;
    },
  }));
}

// ============================================
// SELECTORS
// ============================================

export const selectIsInside = (state: MonitorState, geofenceKey: string): boolean =>
  state.insideState[geofenceKey]?.inside ?? false;

export const selectTargetRows = (state: MonitorState): TargetRow[] =>
  state.targets.map(target => {
    const geofenceKey = geofenceKeyOf(target);
    return {
      geofenceKey,
      name: target.name,
      latitude: target.latitude,
      longitude: target.longitude,
      radiusMeters: effectiveRadius(target),
      distanceMeters: state.position ? distanceTo(target, state.position) : null,
      inside: selectIsInside(state, geofenceKey),
    };
  });
