/**
 * Shared test helpers — mock factories and fixtures.
 */

import type { Clock } from '../src/core/clock.js';
import type { Logger } from '../src/core/logger.js';
import type { Alert, ChannelName } from '../src/core/types.js';
import type { NotificationChannel } from '../src/alerts/interface.js';
import { InMemoryUserDirectory } from '../src/data/userDirectory.js';
import { createAlertingSystem, type AlertingSystem, type AlertingSystemOptions } from '../src/app.js';

export const HOUR = 3_600_000;

/** Monday 2026-03-02 08:00 UTC. */
export const T0 = Date.parse('2026-03-02T08:00:00.000Z');

// ── Mock Logger ─────────────────────────────────────────────────────

export const createMockLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

// ── Manual Clock ────────────────────────────────────────────────────

export class ManualClock implements Clock {
  constructor(private current = T0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

// ── Directory ───────────────────────────────────────────────────────

/** u1, u2 in team1; u3 (New York) in team2; u4 in no team. */
export const makeDirectory = (): InMemoryUserDirectory =>
  new InMemoryUserDirectory({
    users: [{ id: 'u1' }, { id: 'u2' }, { id: 'u3', timeZone: 'America/New_York' }, { id: 'u4' }],
    teams: [
      { id: 'team1', name: 'Engineering', memberIds: ['u1', 'u2'] },
      { id: 'team2', name: 'Marketing', memberIds: ['u3'] },
    ],
  });

// ── Channels ────────────────────────────────────────────────────────

export interface RecordingChannel extends NotificationChannel {
  calls: Array<{ alertId: string; userId: string }>;
}

export const createRecordingChannel = (
  name: ChannelName,
  behavior: () => Promise<boolean> = async () => true,
): RecordingChannel => {
  const calls: Array<{ alertId: string; userId: string }> = [];
  return {
    name,
    calls,
    async deliver(alert: Alert, userId: string) {
      calls.push({ alertId: alert.id, userId });
      return behavior();
    },
  };
};

// ── Alert Factory ───────────────────────────────────────────────────

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: '1',
    title: 'Database maintenance',
    message: 'The primary database restarts at 22:00 UTC.',
    severity: 'warning',
    createdBy: 'admin',
    visibility: { kind: 'organization' },
    deliveryChannels: ['in_app'],
    startAt: T0,
    expiresAt: null,
    remindersEnabled: true,
    reminderIntervalMs: 2 * HOUR,
    status: 'active',
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

// ── System Factory ──────────────────────────────────────────────────

export interface TestSystem extends AlertingSystem {
  clock: ManualClock;
  directory: InMemoryUserDirectory;
}

export function makeSystem(
  overrides: Omit<AlertingSystemOptions, 'clock' | 'directory' | 'logger'> = {},
): TestSystem {
  const clock = new ManualClock();
  const directory = makeDirectory();
  const system = createAlertingSystem({
    ...overrides,
    logger: createMockLogger(),
    directory,
    clock,
  });
  return { ...system, clock, directory };
}
