/**
 * AlertingService — the operations exposed to the HTTP shell.
 *
 * Owns the data flow between the stores: visibility is resolved before any
 * mutation, creation fans out per-user state rows and the initial send, and
 * per-user actions are checked against the alert's target snapshot.
 */

import type { Alert, AlertFilter, DeliveryAttempt, UserAlertState } from '../core/types.js';
import { startOfNextDay, type Clock } from '../core/clock.js';
import { NotFoundError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { isAlertActive, type AlertStore } from '../data/alertStore.js';
import type { UserAlertStateStore } from '../data/userAlertStateStore.js';
import type { UserDirectory } from '../data/userDirectory.js';
import type { DeliveryLog } from '../data/deliveryLog.js';
import type { AnalyticsAggregator, AnalyticsReport } from '../analytics/aggregator.js';
import type { ReminderScheduler, TickReport } from '../jobs/reminderScheduler.js';
import type { EventBus } from '../../backend/src/services/eventBus.js';
import type { VisibilityResolver } from './visibility.js';
import type { NotificationDispatcher } from './notificationDispatcher.js';
import type { InAppChannel, InboxEntry } from './inApp.js';
import {
  alertFilterSchema,
  alertPatchSchema,
  createAlertSchema,
  parseOrThrow,
  type AlertPatch,
  type CreateAlertInput,
} from './schemas.js';

export interface UserAlertView {
  alert: Alert;
  state: UserAlertState;
}

export interface AlertingServiceDeps {
  alerts: AlertStore;
  states: UserAlertStateStore;
  resolver: VisibilityResolver;
  directory: UserDirectory;
  dispatcher: NotificationDispatcher;
  scheduler: ReminderScheduler;
  analytics: AnalyticsAggregator;
  deliveryLog: DeliveryLog;
  inApp?: InAppChannel;
  clock: Clock;
  logger: Logger;
  metrics: Metrics;
  eventBus?: EventBus;
  defaultTimeZone: string;
}

export class AlertingService {
  constructor(private readonly deps: AlertingServiceDeps) {}

  // ── Admin operations ────────────────────────────────────────────────

  async createAlert(input: CreateAlertInput): Promise<Alert> {
    const { alerts, states, resolver, clock, logger, metrics } = this.deps;
    const parsed = parseOrThrow(createAlertSchema, input, 'alert');
    const targets = await resolver.resolve(parsed.visibility);

    const now = clock.now();
    const alert = alerts.create(parsed, targets, now);
    for (const userId of targets) states.getOrCreate(userId, alert.id, now);

    metrics.increment('alerts_created');
    logger.info('alert created', {
      alertId: alert.id,
      severity: alert.severity,
      visibility: alert.visibility.kind,
      targets: targets.size,
    });
    this.publish('created', alert, now);

    if (alert.startAt <= now) await this.sendInitial(alert, targets, now);
    return alert;
  }

  async updateAlert(id: string, patch: AlertPatch): Promise<Alert> {
    const { alerts, states, resolver, clock, logger } = this.deps;
    const parsed = parseOrThrow(alertPatchSchema, patch, 'alert patch');
    const targets = parsed.visibility ? await resolver.resolve(parsed.visibility) : undefined;

    const now = clock.now();
    const previous = alerts.targetsOf(id);
    const alert = alerts.update(id, parsed, now, targets);
    if (targets) {
      // Newly targeted users start unread; the next tick sends their first notification.
      for (const userId of targets) {
        if (!previous?.has(userId)) states.getOrCreate(userId, id, now);
      }
    }

    logger.info('alert updated', { alertId: id, fields: Object.keys(parsed) });
    this.publish('updated', alert, now);
    return alert;
  }

  archiveAlert(id: string): Alert {
    const { alerts, clock, logger, metrics } = this.deps;
    const now = clock.now();
    const wasActive = alerts.require(id).status === 'active';
    const alert = alerts.archive(id, now);
    if (wasActive) {
      metrics.increment('alerts_archived');
      logger.info('alert archived', { alertId: id });
      this.publish('archived', alert, now);
    }
    return alert;
  }

  listAlerts(filter: AlertFilter = {}): Alert[] {
    return this.deps.alerts.list(parseOrThrow(alertFilterSchema, filter, 'alert filter'));
  }

  getAlert(id: string): Alert {
    return this.deps.alerts.require(id);
  }

  recentDeliveries(limit = 100): DeliveryAttempt[] {
    return this.deps.deliveryLog.getRecent(limit);
  }

  // ── User operations ─────────────────────────────────────────────────

  /** Alerts currently live for the user (started, active, targeted) with the user's state. */
  async alertsForUser(userId: string): Promise<UserAlertView[]> {
    const { alerts, states, clock } = this.deps;
    const now = clock.now();
    const views: UserAlertView[] = [];
    for (const alert of alerts.list({ status: 'active' })) {
      if (alert.startAt > now || !isAlertActive(alert, now)) continue;
      const targets = await this.ensureTargets(alert.id);
      if (!targets.has(userId)) continue;
      views.push({ alert, state: states.getOrCreate(userId, alert.id, now) });
    }
    return views;
  }

  inbox(userId: string, limit?: number): InboxEntry[] {
    return this.deps.inApp?.inbox(userId, limit) ?? [];
  }

  async markRead(userId: string, alertId: string): Promise<UserAlertState> {
    await this.requireTargeted(userId, alertId);
    return this.deps.states.markRead(userId, alertId, this.deps.clock.now());
  }

  async markUnread(userId: string, alertId: string): Promise<UserAlertState> {
    await this.requireTargeted(userId, alertId);
    return this.deps.states.markUnread(userId, alertId, this.deps.clock.now());
  }

  /** Snoozes reminders through the end of the user's current calendar day. */
  async snooze(userId: string, alertId: string): Promise<UserAlertState> {
    const { directory, states, clock, logger, defaultTimeZone } = this.deps;
    await this.requireTargeted(userId, alertId);
    const timeZone = (await directory.timeZoneOf?.(userId)) ?? defaultTimeZone;

    const now = clock.now();
    const state = states.snooze(userId, alertId, startOfNextDay(now, timeZone), now);
    logger.info('alert snoozed', { userId, alertId, snoozedUntil: state.snoozedUntil, timeZone });
    return state;
  }

  // ── System operations ───────────────────────────────────────────────

  runTick(at?: number): Promise<TickReport> {
    return this.deps.scheduler.runTick(at);
  }

  analytics(): AnalyticsReport {
    return this.deps.analytics.report(this.deps.clock.now());
  }

  /** Resolves and stores target snapshots for alerts loaded without one. */
  async hydrateTargets(): Promise<number> {
    let resolved = 0;
    for (const alert of this.deps.alerts.list()) {
      if (this.deps.alerts.targetsOf(alert.id)) continue;
      await this.ensureTargets(alert.id);
      resolved += 1;
    }
    return resolved;
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async sendInitial(alert: Alert, targets: ReadonlySet<string>, now: number): Promise<void> {
    const { states, dispatcher, logger } = this.deps;
    const sends = [...targets].map((userId) => {
      states.recordNotified(userId, alert.id, now);
      return dispatcher.dispatch(alert, userId, 'initial');
    });

    const settled = await Promise.allSettled(sends);
    const failed = settled.filter((s) => s.status === 'rejected' || s.value.failed > 0).length;
    if (failed > 0) {
      logger.warn('initial fan-out had failed deliveries', { alertId: alert.id, failedUsers: failed });
    }
  }

  private async ensureTargets(alertId: string): Promise<ReadonlySet<string>> {
    const { alerts, resolver } = this.deps;
    const cached = alerts.targetsOf(alertId);
    if (cached) return cached;
    const alert = alerts.require(alertId);
    const resolved = await resolver.resolve(alert.visibility);
    alerts.cacheTargets(alertId, resolved);
    return resolved;
  }

  private async requireTargeted(userId: string, alertId: string): Promise<void> {
    const targets = await this.ensureTargets(alertId);
    if (!targets.has(userId)) {
      throw new NotFoundError(`alert ${alertId} not found for user ${userId}`, { alertId, userId });
    }
  }

  private publish(type: 'created' | 'updated' | 'archived', alert: Alert, timestamp: number): void {
    this.deps.eventBus?.emit('alerts', {
      type,
      alertId: alert.id,
      title: alert.title,
      severity: alert.severity,
      status: alert.status,
      timestamp,
    });
  }
}
