import { describe, it, expect, beforeEach } from 'vitest';
import type { CreateAlertInput } from '../../src/alerts/schemas.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../../src/core/errors.js';
import { EventBus, type AlertLifecycleEvent } from '../../backend/src/services/eventBus.js';
import { HOUR, T0, makeSystem, type TestSystem } from '../helpers.js';

const alertInput = (overrides: Partial<CreateAlertInput> = {}): CreateAlertInput => ({
  title: 'Scheduled downtime',
  message: 'The CRM is offline Saturday 02:00 to 04:00.',
  severity: 'warning',
  createdBy: 'admin',
  visibility: { kind: 'team', teamIds: ['team1'] },
  ...overrides,
});

describe('AlertingService', () => {
  let sys: TestSystem;

  beforeEach(() => {
    sys = makeSystem();
  });

  describe('createAlert', () => {
    it('creates unread state for every target and sends the initial notification', async () => {
      const alert = await sys.service.createAlert(alertInput());

      expect(alert.id).toBe('1');
      expect(sys.states.listForAlert('1').map((s) => [s.userId, s.read, s.lastNotifiedAt])).toEqual([
        ['u1', 'unread', T0],
        ['u2', 'unread', T0],
      ]);
      expect(sys.inApp.inbox('u1').map((e) => e.alertId)).toEqual(['1']);
      expect(sys.inApp.inbox('u3')).toEqual([]);
      expect(sys.metrics.counter('alerts_created')).toBe(1);
    });

    it('drops unknown team ids', async () => {
      await sys.service.createAlert(alertInput({ visibility: { kind: 'team', teamIds: ['team1', 'ghost-team'] } }));
      expect([...(sys.alerts.targetsOf('1') ?? [])].sort()).toEqual(['u1', 'u2']);
    });

    it('accepts an alert that targets nobody', async () => {
      const alert = await sys.service.createAlert(alertInput({ visibility: { kind: 'user', userIds: ['nobody'] } }));
      expect(alert.status).toBe('active');
      expect(sys.states.size).toBe(0);
      expect(sys.deliveryLog.size).toBe(0);
    });

    it('stores nothing when validation fails', async () => {
      await expect(sys.service.createAlert(alertInput({ startAt: T0 + HOUR, expiresAt: T0 }))).rejects.toThrow(
        ValidationError,
      );
      expect(sys.service.listAlerts()).toEqual([]);
      expect(sys.states.size).toBe(0);
    });

    it('snapshots organization targets at creation', async () => {
      await sys.service.createAlert(alertInput({ visibility: { kind: 'organization' } }));
      sys.directory.addUser('u5');

      expect(await sys.service.alertsForUser('u5')).toEqual([]);
      await expect(sys.service.markRead('u5', '1')).rejects.toThrow(NotFoundError);
      expect((await sys.service.runTick(T0 + 2 * HOUR)).pairsChecked).toBe(4);
    });

    it('publishes lifecycle events', async () => {
      const bus = new EventBus();
      const events: AlertLifecycleEvent[] = [];
      bus.on('alerts', (event) => { events.push(event); });
      sys = makeSystem({ eventBus: bus });

      await sys.service.createAlert(alertInput());
      await sys.service.updateAlert('1', { severity: 'critical' });
      sys.service.archiveAlert('1');
      sys.service.archiveAlert('1');

      expect(events.map((e) => [e.type, e.severity, e.status])).toEqual([
        ['created', 'warning', 'active'],
        ['updated', 'critical', 'active'],
        ['archived', 'critical', 'archived'],
      ]);
    });
  });

  describe('updateAlert', () => {
    it('gives newly targeted users an unread row that the next tick notifies', async () => {
      await sys.service.createAlert(alertInput());
      await sys.service.updateAlert('1', { visibility: { kind: 'team', teamIds: ['team1', 'team2'] } });

      expect(sys.states.get('u3', '1')).toMatchObject({ read: 'unread', lastNotifiedAt: null });

      const report = await sys.service.runTick(T0 + 60_000);
      expect(report.dispatched).toBe(1);
      expect(sys.inApp.inbox('u3').map((e) => e.alertId)).toEqual(['1']);
    });

    it('fails with NotFoundError for an unknown alert', async () => {
      await expect(sys.service.updateAlert('9', { title: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('per-user operations', () => {
    it('reject users outside the target set and unknown alerts', async () => {
      await sys.service.createAlert(alertInput());
      await expect(sys.service.markRead('u3', '1')).rejects.toThrow('alert 1 not found for user u3');
      await expect(sys.service.snooze('u3', '1')).rejects.toThrow(NotFoundError);
      await expect(sys.service.markUnread('u1', '9')).rejects.toThrow(NotFoundError);
    });

    it('snooze ends at the start of the user\'s next local day', async () => {
      await sys.service.createAlert(alertInput({ visibility: { kind: 'user', userIds: ['u1', 'u3'] } }));

      // T0 is 03:00 EST in New York
      expect((await sys.service.snooze('u3', '1')).snoozedUntil).toBe(Date.parse('2026-03-03T05:00:00.000Z'));
      expect((await sys.service.snooze('u1', '1')).snoozedUntil).toBe(Date.parse('2026-03-03T00:00:00.000Z'));
    });

    it('falls back to the configured default zone', async () => {
      sys = makeSystem({ defaultTimeZone: 'Asia/Tokyo' });
      await sys.service.createAlert(alertInput());
      // T0 is 17:00 JST
      expect((await sys.service.snooze('u1', '1')).snoozedUntil).toBe(Date.parse('2026-03-02T15:00:00.000Z'));
    });

    it('alertsForUser lists only started, live alerts targeting the user', async () => {
      await sys.service.createAlert(alertInput({ title: 'now' }));
      await sys.service.createAlert(alertInput({ title: 'later', startAt: T0 + HOUR }));
      await sys.service.createAlert(alertInput({ title: 'archived' }));
      await sys.service.createAlert(alertInput({ title: 'elsewhere', visibility: { kind: 'team', teamIds: ['team2'] } }));
      sys.service.archiveAlert('3');
      await sys.service.markRead('u1', '1');

      const views = await sys.service.alertsForUser('u1');
      expect(views.map((v) => [v.alert.title, v.state.read])).toEqual([['now', 'read']]);
    });
  });

  describe('archived alerts', () => {
    beforeEach(async () => {
      await sys.service.createAlert(alertInput());
      sys.service.archiveAlert('1');
    });

    it('refuse updates and snoozes', async () => {
      await expect(sys.service.updateAlert('1', { title: 'again' })).rejects.toThrow(InvalidStateError);
      await expect(sys.service.snooze('u1', '1')).rejects.toThrow(InvalidStateError);
    });

    it('still allow read-state changes and reporting', async () => {
      expect((await sys.service.markRead('u1', '1')).read).toBe('read');
      expect((await sys.service.markUnread('u1', '1')).read).toBe('unread');
      expect(sys.service.analytics().alerts.byStatus).toEqual({ active: 0, archived: 1 });
      expect(sys.service.archiveAlert('1').status).toBe('archived');
    });
  });

  it('walks an alert through reminders, a read and a snooze', async () => {
    await sys.service.createAlert(alertInput({ reminderIntervalMs: 2 * HOUR }));
    expect(sys.states.get('u1', '1')?.lastNotifiedAt).toBe(T0);

    sys.clock.set(T0 + 3 * HOUR);
    expect((await sys.service.runTick()).dispatched).toBe(2);

    await sys.service.markRead('u1', '1');

    sys.clock.set(T0 + 5 * HOUR);
    expect((await sys.service.runTick()).dispatched).toBe(2);

    await sys.service.snooze('u2', '1');
    expect(sys.states.get('u2', '1')?.snoozedUntil).toBe(Date.parse('2026-03-03T00:00:00.000Z'));

    sys.clock.set(T0 + 6 * HOUR);
    const quiet = await sys.service.runTick();
    expect(quiet.dispatched).toBe(0);
    expect(quiet.skipped).toBe(2);

    const report = sys.service.analytics();
    expect(report.alerts.activeNow).toBe(1);
    expect(report.states).toEqual({ total: 2, read: 1, unread: 1, snoozed: 1, notSnoozed: 1 });
    expect(report.deliveries.attempts).toBe(6);
    expect(sys.service.recentDeliveries(2).map((d) => d.kind)).toEqual(['reminder', 'reminder']);
  });
});
