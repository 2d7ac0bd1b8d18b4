import { describe, it, expect, beforeEach } from 'vitest';
import { AlertStore, isAlertActive } from '../../src/data/alertStore.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../../src/core/errors.js';
import type { CreateAlertInput } from '../../src/alerts/schemas.js';
import { HOUR, T0, makeAlert } from '../helpers.js';

const input = (overrides: Partial<CreateAlertInput> = {}): CreateAlertInput => ({
  title: 'Office closed',
  message: 'The office is closed for the holiday.',
  severity: 'info',
  createdBy: 'admin',
  visibility: { kind: 'organization' },
  ...overrides,
});

describe('AlertStore', () => {
  let store: AlertStore;

  beforeEach(() => {
    store = new AlertStore();
  });

  describe('create', () => {
    it('assigns sequential ids and fills defaults', () => {
      const first = store.create(input(), ['u1'], T0);
      const second = store.create(input(), [], T0);

      expect(first.id).toBe('1');
      expect(second.id).toBe('2');
      expect(first).toMatchObject({
        status: 'active',
        deliveryChannels: ['in_app'],
        startAt: T0,
        expiresAt: null,
        remindersEnabled: true,
        reminderIntervalMs: 2 * HOUR,
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('uses the configured default reminder interval', () => {
      const custom = new AlertStore({ defaultReminderIntervalMs: HOUR });
      expect(custom.create(input(), [], T0).reminderIntervalMs).toBe(HOUR);
    });

    it('stores the target snapshot', () => {
      const alert = store.create(input(), ['u1', 'u2', 'u1'], T0);
      expect([...(store.targetsOf(alert.id) ?? [])]).toEqual(['u1', 'u2']);
    });

    it('rejects an expiry that is not after the start, storing nothing', () => {
      expect(() => store.create(input({ startAt: T0, expiresAt: T0 }), [], T0)).toThrow(ValidationError);
      expect(() => store.create(input({ startAt: T0, expiresAt: T0 - 1 }), [], T0)).toThrow('expiresAt must be after startAt');
      expect(store.size).toBe(0);
    });

    it('rejects an empty title', () => {
      expect(() => store.create(input({ title: '   ' }), [], T0)).toThrow(ValidationError);
      expect(store.size).toBe(0);
    });
  });

  describe('update', () => {
    it('changes only the patched fields', () => {
      const alert = store.create(input(), [], T0);
      const updated = store.update(alert.id, { severity: 'critical', reminderIntervalMs: HOUR }, T0 + HOUR);

      expect(updated).toEqual({
        ...alert,
        severity: 'critical',
        reminderIntervalMs: HOUR,
        updatedAt: T0 + HOUR,
      });
    });

    it('clears the expiry with null', () => {
      const alert = store.create(input({ expiresAt: T0 + HOUR }), [], T0);
      expect(store.update(alert.id, { expiresAt: null }, T0).expiresAt).toBeNull();
    });

    it('validates the merged window and leaves the alert untouched on failure', () => {
      const alert = store.create(input({ expiresAt: T0 + 2 * HOUR }), [], T0);
      expect(() => store.update(alert.id, { startAt: T0 + 3 * HOUR }, T0)).toThrow(ValidationError);
      expect(store.get(alert.id)).toEqual(alert);
    });

    it('requires resolved targets alongside a visibility change', () => {
      const alert = store.create(input(), ['u1'], T0);
      expect(() => store.update(alert.id, { visibility: { kind: 'user', userIds: ['u2'] } }, T0)).toThrow(ValidationError);

      store.update(alert.id, { visibility: { kind: 'user', userIds: ['u2'] } }, T0, ['u2']);
      expect([...(store.targetsOf(alert.id) ?? [])]).toEqual(['u2']);
    });

    it('fails with NotFoundError for an unknown id', () => {
      expect(() => store.update('42', { title: 'x' }, T0)).toThrow(NotFoundError);
    });

    it('fails with InvalidStateError once archived', () => {
      const alert = store.create(input(), [], T0);
      store.archive(alert.id, T0);
      expect(() => store.update(alert.id, { title: 'reopened' }, T0)).toThrow(InvalidStateError);
    });
  });

  describe('archive', () => {
    it('is idempotent', () => {
      const alert = store.create(input(), [], T0);
      const archived = store.archive(alert.id, T0 + HOUR);
      const again = store.archive(alert.id, T0 + 2 * HOUR);

      expect(archived.status).toBe('archived');
      expect(again).toEqual(archived);
      expect(again.updatedAt).toBe(T0 + HOUR);
    });

    it('fails with NotFoundError for an unknown id', () => {
      expect(() => store.archive('42', T0)).toThrow(NotFoundError);
    });
  });

  describe('list and lookups', () => {
    it('filters by severity, status and visibility kind in creation order', () => {
      store.create(input({ severity: 'critical' }), [], T0);
      store.create(input({ visibility: { kind: 'team', teamIds: ['team1'] } }), [], T0);
      store.create(input({ severity: 'critical', visibility: { kind: 'user', userIds: [] } }), [], T0);
      store.archive('3', T0);

      expect(store.list().map((a) => a.id)).toEqual(['1', '2', '3']);
      expect(store.list({ severity: 'critical' }).map((a) => a.id)).toEqual(['1', '3']);
      expect(store.list({ status: 'active' }).map((a) => a.id)).toEqual(['1', '2']);
      expect(store.list({ visibilityKind: 'team' }).map((a) => a.id)).toEqual(['2']);
      expect(store.list({ severity: 'warning' })).toEqual([]);
    });

    it('returns copies', () => {
      const alert = store.create(input(), [], T0);
      alert.title = 'mutated';
      expect(store.require(alert.id).title).toBe('Office closed');
    });

    it('isActive is false for unknown, expired and archived alerts', () => {
      const alert = store.create(input({ expiresAt: T0 + HOUR }), [], T0);
      expect(store.isActive(alert.id, T0 + HOUR - 1)).toBe(true);
      expect(store.isActive(alert.id, T0 + HOUR)).toBe(false);
      expect(store.isActive('42', T0)).toBe(false);

      store.archive(alert.id, T0);
      expect(store.isActive(alert.id, T0)).toBe(false);
    });
  });
});

describe('isAlertActive', () => {
  it('treats a null expiry as never expiring', () => {
    expect(isAlertActive(makeAlert({ expiresAt: null }), T0 + 1_000 * HOUR)).toBe(true);
  });
});
