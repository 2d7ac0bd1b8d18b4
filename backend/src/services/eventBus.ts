/**
 * EventBus — typed pub/sub bridge between the alerting core and WebSocket clients.
 *
 * The core emits alert lifecycle events and in-app notifications; the WebSocket
 * server forwards them to subscribed clients.
 */

import { EventEmitter } from 'node:events';
import type { AlertStatus, Severity } from '../../../src/core/types.js';

// ── Channel payload types ────────────────────────────────────────────────────

export interface AlertLifecycleEvent {
  type: 'created' | 'updated' | 'archived';
  alertId: string;
  title: string;
  severity: Severity;
  status: AlertStatus;
  timestamp: number;
}

export interface NotificationEvent {
  entryId: number;
  userId: string;
  alertId: string;
  title: string;
  message: string;
  severity: Severity;
  deliveredAt: number;
}

// ── Channel map ──────────────────────────────────────────────────────────────

export interface ChannelPayloads {
  alerts: AlertLifecycleEvent;
  notifications: NotificationEvent;
}

export type Channel = keyof ChannelPayloads;
export const ALL_CHANNELS: Channel[] = ['alerts', 'notifications'];

// ── EventBus class ───────────────────────────────────────────────────────────

export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Many WebSocket clients may subscribe concurrently.
    this.emitter.setMaxListeners(200);
  }

  /** Publish an event on a channel. */
  emit<C extends Channel>(channel: C, payload: ChannelPayloads[C]): void {
    this.emitter.emit(channel, payload);
  }

  /** Subscribe to a channel. Returns an unsubscribe function. */
  on<C extends Channel>(channel: C, handler: (payload: ChannelPayloads[C]) => void): () => void {
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  listenerCount(channel: Channel): number {
    return this.emitter.listenerCount(channel);
  }
}
