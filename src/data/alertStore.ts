/**
 * Alert Store — owner of alert entities and their target snapshots.
 *
 * Alerts are never deleted; archiving is the only lifecycle transition. Every
 * mutation runs synchronously from validation to write-through, so concurrent
 * callers never see a half-applied update.
 */

import { InvalidStateError, NotFoundError, ValidationError } from '../core/errors.js';
import type { Alert, AlertFilter, AlertStatus } from '../core/types.js';
import type { AlertRepository } from './repository.js';
import {
  alertPatchSchema,
  createAlertSchema,
  parseOrThrow,
  type AlertPatch,
  type CreateAlertInput,
} from '../alerts/schemas.js';

export const DEFAULT_REMINDER_INTERVAL_MS = 2 * 60 * 60 * 1000;

const ALERT_TRANSITIONS: Record<AlertStatus, AlertStatus[]> = {
  active: ['archived'],
  archived: [],
};

/** Active status and not yet expired. */
export function isAlertActive(alert: Alert, now: number): boolean {
  return alert.status === 'active' && (alert.expiresAt === null || now < alert.expiresAt);
}

function assertWindow(startAt: number, expiresAt: number | null): void {
  if (expiresAt !== null && expiresAt <= startAt) {
    throw new ValidationError('expiresAt must be after startAt', { startAt, expiresAt });
  }
}

export interface AlertStoreOptions {
  defaultReminderIntervalMs?: number;
  repository?: AlertRepository;
}

export class AlertStore {
  private readonly alerts = new Map<string, Alert>();
  private readonly targets = new Map<string, Set<string>>();
  private readonly defaultReminderIntervalMs: number;
  private readonly repository?: AlertRepository;
  private nextId = 1;

  constructor(opts: AlertStoreOptions = {}) {
    this.defaultReminderIntervalMs = opts.defaultReminderIntervalMs ?? DEFAULT_REMINDER_INTERVAL_MS;
    this.repository = opts.repository;
    if (this.repository) this.hydrate(this.repository);
  }

  private hydrate(repository: AlertRepository): void {
    for (const { alert, targets } of repository.loadAlerts()) {
      this.alerts.set(alert.id, alert);
      if (targets) this.targets.set(alert.id, new Set(targets));
      const numericId = Number(alert.id);
      if (Number.isInteger(numericId) && numericId >= this.nextId) this.nextId = numericId + 1;
    }
  }

  create(input: CreateAlertInput, targets: Iterable<string>, now: number): Alert {
    const parsed = parseOrThrow(createAlertSchema, input, 'alert');
    const startAt = parsed.startAt ?? now;
    const expiresAt = parsed.expiresAt ?? null;
    assertWindow(startAt, expiresAt);

    const alert: Alert = {
      id: String(this.nextId++),
      title: parsed.title,
      message: parsed.message,
      severity: parsed.severity,
      createdBy: parsed.createdBy,
      visibility: parsed.visibility,
      deliveryChannels: parsed.deliveryChannels ?? ['in_app'],
      startAt,
      expiresAt,
      remindersEnabled: parsed.remindersEnabled ?? true,
      reminderIntervalMs: parsed.reminderIntervalMs ?? this.defaultReminderIntervalMs,
      status: 'active',
      createdAt: now,
      updatedAt: now,
    };

    const targetSet = new Set(targets);
    this.alerts.set(alert.id, alert);
    this.targets.set(alert.id, targetSet);
    this.repository?.saveAlert(alert, targetSet);
    return structuredClone(alert);
  }

  /**
   * Partial update of the mutable fields. `targets` must accompany a visibility
   * change and replaces the stored snapshot.
   */
  update(id: string, patch: AlertPatch, now: number, targets?: Iterable<string>): Alert {
    const current = this.requireLive(id);
    if (current.status === 'archived') {
      throw new InvalidStateError(`alert ${id} is archived`, { id });
    }
    const parsed = parseOrThrow(alertPatchSchema, patch, 'alert patch');
    if (parsed.visibility && !targets) {
      throw new ValidationError('a visibility change needs its resolved targets', { id });
    }

    const next: Alert = {
      ...current,
      title: parsed.title ?? current.title,
      message: parsed.message ?? current.message,
      severity: parsed.severity ?? current.severity,
      visibility: parsed.visibility ?? current.visibility,
      deliveryChannels: parsed.deliveryChannels ?? current.deliveryChannels,
      startAt: parsed.startAt ?? current.startAt,
      expiresAt: parsed.expiresAt === undefined ? current.expiresAt : parsed.expiresAt,
      remindersEnabled: parsed.remindersEnabled ?? current.remindersEnabled,
      reminderIntervalMs: parsed.reminderIntervalMs ?? current.reminderIntervalMs,
      updatedAt: now,
    };
    assertWindow(next.startAt, next.expiresAt);

    this.alerts.set(id, next);
    if (parsed.visibility && targets) this.targets.set(id, new Set(targets));
    this.repository?.saveAlert(next, this.targets.get(id) ?? null);
    return structuredClone(next);
  }

  /** Idempotent: archiving an archived alert returns it unchanged. */
  archive(id: string, now: number): Alert {
    const current = this.requireLive(id);
    if (current.status === 'archived') return structuredClone(current);
    if (!ALERT_TRANSITIONS[current.status].includes('archived')) {
      throw new InvalidStateError(`alert ${id} cannot be archived from ${current.status}`, { id });
    }

    const next: Alert = { ...current, status: 'archived', updatedAt: now };
    this.alerts.set(id, next);
    this.repository?.saveAlert(next, this.targets.get(id) ?? null);
    return structuredClone(next);
  }

  /** Matching alerts in creation order. */
  list(filter: AlertFilter = {}): Alert[] {
    const result: Alert[] = [];
    for (const alert of this.alerts.values()) {
      if (filter.severity && alert.severity !== filter.severity) continue;
      if (filter.status && alert.status !== filter.status) continue;
      if (filter.visibilityKind && alert.visibility.kind !== filter.visibilityKind) continue;
      result.push(structuredClone(alert));
    }
    return result;
  }

  get(id: string): Alert | undefined {
    const alert = this.alerts.get(id);
    return alert ? structuredClone(alert) : undefined;
  }

  require(id: string): Alert {
    return structuredClone(this.requireLive(id));
  }

  has(id: string): boolean {
    return this.alerts.has(id);
  }

  /** False for unknown ids. */
  isActive(id: string, now: number): boolean {
    const alert = this.alerts.get(id);
    return alert !== undefined && isAlertActive(alert, now);
  }

  targetsOf(id: string): ReadonlySet<string> | undefined {
    return this.targets.get(id);
  }

  /** Stores a freshly resolved snapshot for an alert that had none. */
  cacheTargets(id: string, targets: Iterable<string>): void {
    const alert = this.requireLive(id);
    const targetSet = new Set(targets);
    this.targets.set(id, targetSet);
    this.repository?.saveAlert(alert, targetSet);
  }

  get size(): number {
    return this.alerts.size;
  }

  private requireLive(id: string): Alert {
    const alert = this.alerts.get(id);
    if (!alert) throw new NotFoundError(`alert ${id} not found`, { id });
    return alert;
  }
}
