/**
 * In-app channel — keeps a per-user inbox that the user-facing API reads, and
 * pushes each entry on the EventBus for live WebSocket delivery.
 */

import type { Alert, Severity } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import type { EventBus } from '../../backend/src/services/eventBus.js';
import type { NotificationChannel } from './interface.js';

export interface InboxEntry {
  id: number;
  userId: string;
  alertId: string;
  title: string;
  message: string;
  severity: Severity;
  deliveredAt: number;
}

export class InAppChannel implements NotificationChannel {
  readonly name = 'in_app' as const;
  private readonly inboxes = new Map<string, InboxEntry[]>();
  private nextId = 1;

  constructor(
    private readonly clock: Clock,
    private readonly eventBus?: EventBus,
    private readonly maxPerUser = 200,
  ) {}

  async deliver(alert: Alert, userId: string): Promise<boolean> {
    const entry: InboxEntry = {
      id: this.nextId++,
      userId,
      alertId: alert.id,
      title: alert.title,
      message: alert.message,
      severity: alert.severity,
      deliveredAt: this.clock.now(),
    };

    const inbox = this.inboxes.get(userId) ?? [];
    inbox.push(entry);
    if (inbox.length > this.maxPerUser) inbox.shift();
    this.inboxes.set(userId, inbox);

    const { id: entryId, ...payload } = entry;
    this.eventBus?.emit('notifications', { entryId, ...payload });
    return true;
  }

  /** Newest first. */
  inbox(userId: string, limit = 50): InboxEntry[] {
    const entries = this.inboxes.get(userId) ?? [];
    return entries.slice(Math.max(0, entries.length - limit)).reverse();
  }
}
