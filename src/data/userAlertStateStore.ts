/**
 * Per-(user, alert) delivery state: read flag, snooze horizon and last notification.
 *
 * Rows are created on demand and never removed; they go inert once their alert is
 * archived or expired. Each public mutation is a single synchronous step.
 */

import { InvalidStateError, NotFoundError } from '../core/errors.js';
import type { UserAlertState } from '../core/types.js';
import type { AlertStore } from './alertStore.js';
import type { UserAlertStateRepository } from './repository.js';

export class UserAlertStateStore {
  /** alertId → userId → state */
  private readonly byAlert = new Map<string, Map<string, UserAlertState>>();

  constructor(
    private readonly alerts: AlertStore,
    private readonly repository?: UserAlertStateRepository,
  ) {
    if (repository) {
      for (const state of repository.loadStates()) this.put(state);
    }
  }

  getOrCreate(userId: string, alertId: string, now: number): UserAlertState {
    return { ...this.row(userId, alertId, now) };
  }

  get(userId: string, alertId: string): UserAlertState | undefined {
    const state = this.byAlert.get(alertId)?.get(userId);
    return state ? { ...state } : undefined;
  }

  markRead(userId: string, alertId: string, now: number): UserAlertState {
    const state = this.row(userId, alertId, now);
    return this.save({ ...state, read: 'read', readAt: now, updatedAt: now });
  }

  markUnread(userId: string, alertId: string, now: number): UserAlertState {
    const state = this.row(userId, alertId, now);
    return this.save({ ...state, read: 'unread', readAt: null, updatedAt: now });
  }

  /** Suppresses reminders until `snoozedUntil`; the alert must be active. */
  snooze(userId: string, alertId: string, snoozedUntil: number, now: number): UserAlertState {
    if (!this.alerts.isActive(alertId, now)) {
      this.requireAlert(alertId);
      throw new InvalidStateError(`alert ${alertId} is archived or expired`, { alertId, userId });
    }
    const state = this.row(userId, alertId, now);
    return this.save({ ...state, snoozedUntil, updatedAt: now });
  }

  isSnoozed(state: UserAlertState, now: number): boolean {
    return state.snoozedUntil !== null && now < state.snoozedUntil;
  }

  /**
   * True iff the alert is active, the user is not snoozed at `now`, and at least
   * `intervalMs` has passed since the last notification. Read state is not consulted.
   */
  isEligibleForReminder(userId: string, alertId: string, now: number, intervalMs: number): boolean {
    if (!this.alerts.isActive(alertId, now)) return false;
    const state = this.byAlert.get(alertId)?.get(userId);
    if (!state) return true;
    if (this.isSnoozed(state, now)) return false;
    return state.lastNotifiedAt === null || now - state.lastNotifiedAt >= intervalMs;
  }

  /**
   * Eligibility check and `lastNotifiedAt` write as one step. Returns false when
   * the pair is not due; a second claim at the same instant always returns false.
   */
  claimReminder(userId: string, alertId: string, now: number, intervalMs: number): boolean {
    if (!this.isEligibleForReminder(userId, alertId, now, intervalMs)) return false;
    const state = this.row(userId, alertId, now);
    this.save({ ...state, lastNotifiedAt: now, updatedAt: now });
    return true;
  }

  recordNotified(userId: string, alertId: string, now: number): UserAlertState {
    const state = this.row(userId, alertId, now);
    return this.save({ ...state, lastNotifiedAt: now, updatedAt: now });
  }

  listForAlert(alertId: string): UserAlertState[] {
    return Array.from(this.byAlert.get(alertId)?.values() ?? [], (s) => ({ ...s }));
  }

  listForUser(userId: string): UserAlertState[] {
    const result: UserAlertState[] = [];
    for (const rows of this.byAlert.values()) {
      const state = rows.get(userId);
      if (state) result.push({ ...state });
    }
    return result;
  }

  all(): UserAlertState[] {
    const result: UserAlertState[] = [];
    for (const rows of this.byAlert.values()) {
      for (const state of rows.values()) result.push({ ...state });
    }
    return result;
  }

  get size(): number {
    let count = 0;
    for (const rows of this.byAlert.values()) count += rows.size;
    return count;
  }

  private row(userId: string, alertId: string, now: number): UserAlertState {
    this.requireAlert(alertId);
    const existing = this.byAlert.get(alertId)?.get(userId);
    if (existing) return existing;
    return this.save({
      userId,
      alertId,
      read: 'unread',
      readAt: null,
      snoozedUntil: null,
      lastNotifiedAt: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  private save(state: UserAlertState): UserAlertState {
    this.put(state);
    this.repository?.saveState(state);
    return { ...state };
  }

  private put(state: UserAlertState): void {
    let rows = this.byAlert.get(state.alertId);
    if (!rows) {
      rows = new Map();
      this.byAlert.set(state.alertId, rows);
    }
    rows.set(state.userId, state);
  }

  private requireAlert(alertId: string): void {
    if (!this.alerts.has(alertId)) throw new NotFoundError(`alert ${alertId} not found`, { alertId });
  }
}
