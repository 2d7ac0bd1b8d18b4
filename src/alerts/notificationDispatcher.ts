/**
 * NotificationDispatcher — fans one (alert, user) pair out to the alert's channels.
 *
 * Delivery is best effort: every channel call runs in isolation under a timeout,
 * a failure on one never blocks the others, and nothing is thrown back to the
 * caller. Every attempt lands in the DeliveryLog.
 */

import type { Alert, ChannelName, DeliveryKind } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { DeliveryLog } from '../data/deliveryLog.js';
import { withTimeout } from '../core/async.js';
import type { NotificationChannel } from './interface.js';

export interface DispatchResult {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface DispatcherOptions {
  timeoutMs?: number;
}

export class NotificationDispatcher {
  private readonly channels = new Map<ChannelName, NotificationChannel>();
  private readonly timeoutMs: number;

  constructor(
    channels: NotificationChannel[],
    private readonly deliveryLog: DeliveryLog,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    opts: DispatcherOptions = {},
  ) {
    for (const channel of channels) this.register(channel);
    this.timeoutMs = opts.timeoutMs ?? 5_000;
  }

  register(channel: NotificationChannel): void {
    this.channels.set(channel.name, channel);
  }

  channelNames(): ChannelName[] {
    return [...this.channels.keys()];
  }

  async dispatch(alert: Alert, userId: string, kind: DeliveryKind): Promise<DispatchResult> {
    const deliveries: Promise<boolean>[] = [];

    for (const name of alert.deliveryChannels) {
      const channel = this.channels.get(name);
      if (!channel) {
        this.logger.debug('channel not configured, skipping', { channel: name, alertId: alert.id });
        continue;
      }
      deliveries.push(this.deliverVia(channel, alert, userId, kind));
    }

    const outcomes = await Promise.all(deliveries);
    const succeeded = outcomes.filter(Boolean).length;
    return { attempted: outcomes.length, succeeded, failed: outcomes.length - succeeded };
  }

  private async deliverVia(
    channel: NotificationChannel,
    alert: Alert,
    userId: string,
    kind: DeliveryKind,
  ): Promise<boolean> {
    let ok = false;
    let error: string | undefined;
    try {
      ok = await withTimeout(
        channel.deliver(alert, userId),
        this.timeoutMs,
        `${channel.name} delivery timed out after ${this.timeoutMs}ms`,
      );
      if (!ok) error = 'rejected by channel';
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    this.deliveryLog.record({
      channel: channel.name,
      alertId: alert.id,
      userId,
      kind,
      ok,
      error,
      timestamp: this.clock.now(),
    });
    this.metrics.increment('deliveries_attempted');
    if (!ok) {
      this.metrics.increment('deliveries_failed');
      this.logger.warn(`notification delivery failed for ${channel.name}`, {
        alertId: alert.id,
        userId,
        kind,
        error,
      });
    }
    return ok;
  }
}
