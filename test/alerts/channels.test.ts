import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { InAppChannel } from '../../src/alerts/inApp.js';
import { ConsoleChannel } from '../../src/alerts/console.js';
import { WebhookChannel } from '../../src/alerts/webhook.js';
import { EventBus, type NotificationEvent } from '../../backend/src/services/eventBus.js';
import { ManualClock, T0, makeAlert } from '../helpers.js';

vi.mock('axios', () => ({ default: { post: vi.fn() } }));

describe('InAppChannel', () => {
  it('appends to the user inbox and returns newest first', async () => {
    const clock = new ManualClock();
    const channel = new InAppChannel(clock);
    await channel.deliver(makeAlert({ id: '1', title: 'first' }), 'u1');
    clock.advance(1_000);
    await channel.deliver(makeAlert({ id: '2', title: 'second' }), 'u1');

    const inbox = channel.inbox('u1');
    expect(inbox.map((e) => e.title)).toEqual(['second', 'first']);
    expect(inbox[0]?.deliveredAt).toBe(T0 + 1_000);
    expect(channel.inbox('u2')).toEqual([]);
  });

  it('caps each inbox at maxPerUser entries', async () => {
    const channel = new InAppChannel(new ManualClock(), undefined, 2);
    for (const id of ['1', '2', '3']) await channel.deliver(makeAlert({ id }), 'u1');
    expect(channel.inbox('u1').map((e) => e.alertId)).toEqual(['3', '2']);
  });

  it('publishes each entry on the notifications channel', async () => {
    const bus = new EventBus();
    const received: NotificationEvent[] = [];
    bus.on('notifications', (event) => { received.push(event); });

    const channel = new InAppChannel(new ManualClock(), bus);
    await channel.deliver(makeAlert({ id: '7', severity: 'critical' }), 'u2');

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ entryId: 1, userId: 'u2', alertId: '7', severity: 'critical', deliveredAt: T0 });
  });
});

describe('ConsoleChannel', () => {
  it('writes one JSON line per delivery', async () => {
    const lines: string[] = [];
    const channel = new ConsoleChannel(new ManualClock(), (line) => { lines.push(line); });
    await expect(channel.deliver(makeAlert({ id: '3' }), 'u1')).resolves.toBe(true);

    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toEqual({
      ts: '2026-03-02T08:00:00.000Z',
      alert: 'Database maintenance',
      alertId: '3',
      severity: 'warning',
      userId: 'u1',
      message: 'The primary database restarts at 22:00 UTC.',
    });
  });
});

describe('WebhookChannel', () => {
  const post = vi.mocked(axios.post);

  beforeEach(() => {
    post.mockReset();
  });

  it('posts the alert payload and rejects once retries are exhausted', async () => {
    post.mockImplementation(async () => {
      throw new Error('Request failed with status code 502');
    });
    const channel = new WebhookChannel({ url: 'http://hooks.test/alerts', timeoutMs: 100, retries: 1 });

    await expect(channel.deliver(makeAlert({ id: '4' }), 'u1')).rejects.toThrow('status code 502');
    expect(post).toHaveBeenCalledTimes(2);
    expect(post.mock.calls[0]?.[0]).toBe('http://hooks.test/alerts');
    expect(post.mock.calls[0]?.[1]).toEqual({
      userId: 'u1',
      alertId: '4',
      title: 'Database maintenance',
      message: 'The primary database restarts at 22:00 UTC.',
      severity: 'warning',
    });
  });
});
