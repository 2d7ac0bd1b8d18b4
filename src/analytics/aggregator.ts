import type { AlertStatus, Severity } from '../core/types.js';
import { isAlertActive, type AlertStore } from '../data/alertStore.js';
import type { UserAlertStateStore } from '../data/userAlertStateStore.js';
import type { DeliveryLog, DeliveryTotals } from '../data/deliveryLog.js';

export interface AnalyticsReport {
  generatedAt: number;
  alerts: {
    total: number;
    bySeverity: Record<Severity, number>;
    byStatus: Record<AlertStatus, number>;
    /** Active status and inside the expiry window. */
    activeNow: number;
    /** Active status but past expiresAt. */
    expired: number;
  };
  states: {
    total: number;
    read: number;
    unread: number;
    snoozed: number;
    notSnoozed: number;
  };
  deliveries: DeliveryTotals;
}

/** Read-only counts over alerts, per-user state and delivery attempts. */
export class AnalyticsAggregator {
  constructor(
    private readonly alerts: AlertStore,
    private readonly states: UserAlertStateStore,
    private readonly deliveryLog?: DeliveryLog,
  ) {}

  report(now: number): AnalyticsReport {
    const bySeverity: Record<Severity, number> = { info: 0, warning: 0, critical: 0 };
    const byStatus: Record<AlertStatus, number> = { active: 0, archived: 0 };
    let activeNow = 0;
    let expired = 0;

    const alerts = this.alerts.list();
    for (const alert of alerts) {
      bySeverity[alert.severity] += 1;
      byStatus[alert.status] += 1;
      if (isAlertActive(alert, now)) activeNow += 1;
      else if (alert.status === 'active') expired += 1;
    }

    const states = this.states.all();
    let read = 0;
    let snoozed = 0;
    for (const state of states) {
      if (state.read === 'read') read += 1;
      if (this.states.isSnoozed(state, now)) snoozed += 1;
    }

    return {
      generatedAt: now,
      alerts: { total: alerts.length, bySeverity, byStatus, activeNow, expired },
      states: {
        total: states.length,
        read,
        unread: states.length - read,
        snoozed,
        notSnoozed: states.length - snoozed,
      },
      deliveries: this.deliveryLog?.totals() ?? { attempts: 0, succeeded: 0, failed: 0, byChannel: {} },
    };
  }
}
