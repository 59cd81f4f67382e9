/**
 * Event Relay - Nearby Alerts
 *
 * Background → foreground, best effort. The foreground registers a
 * RelayReceiver under RELAY_PORT_NAME; the background handler looks the
 * name up and sends. No listener means the message is dropped: the
 * notification is the durable record, the relay only drives live state.
 *
 * Delivery never blocks the sender and arrival order is not guaranteed.
 */

import { logger } from './logger';
import { describeError } from './errors';
import { RELAY_PORT_NAME } from './constants';
import type { TransitionEvent } from './backgroundTypes';

// ============================================
// TYPES
// ============================================

export interface RelayPort {
  send(message: unknown): void;
}

export type RelayListener = (message: unknown) => void;

// ============================================
// PORT REGISTRY
// ============================================

/**
 * Name → port handles. register() replaces any previous port under the
 * same name (a restarted foreground wins over a stale one).
 */
export class PortRegistry {
  private readonly ports = new Map<string, RelayPort>();

  register(name: string, port: RelayPort): void {
    const replaced = this.ports.has(name);
    this.ports.set(name, port);
    logger.debug('relay', `Port ${replaced ? 're-registered' : 'registered'}: ${name}`);
  }

  remove(name: string): boolean {
    const removed = this.ports.delete(name);
    if (removed) {
      logger.debug('relay', `Port removed: ${name}`);
    }
    return removed;
  }

  lookup(name: string): RelayPort | undefined {
    return this.ports.get(name);
  }
}

/** Process-wide registry; pass it explicitly to whoever needs it */
export const portRegistry = new PortRegistry();

// ============================================
// RECEIVER (foreground end)
// ============================================

export class RelayReceiver implements RelayPort {
  private listener: RelayListener | null = null;
  private closed = false;

  listen(listener: RelayListener): void {
    this.listener = listener;
  }

  send(message: unknown): void {
    if (this.closed) {
      logger.debug('relay', 'Receiver closed, message dropped');
      return;
    }
    setImmediate(() => this.deliver(message));
  }

  close(): void {
    this.closed = true;
    this.listener = null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private deliver(message: unknown): void {
    const listener = this.listener;
    if (!listener) {
      logger.debug('relay', 'No listener attached, message dropped');
      return;
    }
    try {
      listener(message);
    } catch (error) {
      logger.error('relay', 'Error in relay listener', { error: describeError(error) });
    }
  }
}

// ============================================
// SEND (background end)
// ============================================

/**
 * Returns false when nobody is listening or the port throws (dropped,
 * not an error)
 */
export function sendTransition(registry: PortRegistry, event: TransitionEvent): boolean {
  const port = registry.lookup(RELAY_PORT_NAME);
  if (!port) {
    logger.debug('relay', `No foreground listener, dropped ${event.kind} @ ${event.geofenceKey}`);
    return false;
  }
  try {
    port.send({ ...event });
    return true;
  } catch (error) {
    logger.warn('relay', `Send failed, dropped ${event.kind} @ ${event.geofenceKey}`, {
      error: describeError(error),
    });
    return false;
  }
}
