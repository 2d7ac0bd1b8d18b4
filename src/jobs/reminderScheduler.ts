/**
 * ReminderScheduler — one tick of the reminder eligibility-and-dispatch pass.
 *
 * Holds no timer: the interval runner (or an API call) invokes `runTick`.
 * Eligibility is claimed per (user, alert) pair at the moment of dispatch, so
 * a repeated or overlapping tick at the same instant sends nothing twice.
 * A pair never notified gets its first send here even when reminders are off:
 * alerts scheduled for later, and users added by a visibility change, rely on it.
 */

import type { Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { isAlertActive, type AlertStore } from '../data/alertStore.js';
import type { UserAlertStateStore } from '../data/userAlertStateStore.js';
import type { DispatchResult, NotificationDispatcher } from '../alerts/notificationDispatcher.js';

export interface TickReport {
  at: number;
  alertsScanned: number;
  pairsChecked: number;
  dispatched: number;
  skipped: number;
  failedDeliveries: number;
}

export class ReminderScheduler {
  constructor(
    private readonly alerts: AlertStore,
    private readonly states: UserAlertStateStore,
    private readonly dispatcher: NotificationDispatcher,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
  ) {}

  async runTick(at: number = this.clock.now()): Promise<TickReport> {
    const snapshot = this.alerts
      .list({ status: 'active' })
      .filter((alert) => alert.startAt <= at && isAlertActive(alert, at));

    const report: TickReport = {
      at,
      alertsScanned: snapshot.length,
      pairsChecked: 0,
      dispatched: 0,
      skipped: 0,
      failedDeliveries: 0,
    };
    const sends: Promise<DispatchResult>[] = [];

    for (const { id } of snapshot) {
      const targets = this.alerts.targetsOf(id);
      if (!targets) {
        this.logger.warn('alert has no target snapshot, skipping', { alertId: id });
        continue;
      }
      for (const userId of targets) {
        report.pairsChecked += 1;
        // Re-read per pair: an update may have changed the interval or disabled reminders.
        const alert = this.alerts.get(id);
        const firstSend = (this.states.get(userId, id)?.lastNotifiedAt ?? null) === null;
        if (!alert || (!alert.remindersEnabled && !firstSend)) {
          report.skipped += 1;
          continue;
        }
        if (!this.states.claimReminder(userId, id, at, alert.reminderIntervalMs)) {
          report.skipped += 1;
          continue;
        }
        report.dispatched += 1;
        sends.push(this.dispatcher.dispatch(alert, userId, firstSend ? 'initial' : 'reminder'));
      }
    }

    const settled = await Promise.allSettled(sends);
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        report.failedDeliveries += outcome.value.failed;
      } else {
        report.failedDeliveries += 1;
        this.logger.error('reminder dispatch threw', { error: String(outcome.reason) });
      }
    }

    this.metrics.gauge('live_alerts', report.alertsScanned);
    this.metrics.increment('reminder_ticks');
    this.metrics.increment('reminders_dispatched', report.dispatched);
    this.logger.info('reminder tick complete', { ...report });
    return report;
  }
}
