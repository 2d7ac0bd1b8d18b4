/**
 * Delivery Log — in-memory ring buffer of dispatch attempts.
 *
 * Keeps the last N attempts for inspection, plus running totals that survive
 * eviction so analytics stay exact.
 */

import type { DeliveryAttempt } from '../core/types.js';

export interface OutcomeCounts {
  attempts: number;
  succeeded: number;
  failed: number;
}

export interface DeliveryTotals extends OutcomeCounts {
  byChannel: Record<string, OutcomeCounts>;
}

export class DeliveryLog {
  private readonly buffer: DeliveryAttempt[] = [];
  private readonly maxSize: number;
  private readonly byChannel = new Map<string, OutcomeCounts>();
  private readonly overall: OutcomeCounts = { attempts: 0, succeeded: 0, failed: 0 };
  private nextId = 1;

  constructor(maxSize = 5_000) {
    this.maxSize = maxSize;
  }

  record(attempt: Omit<DeliveryAttempt, 'id'>): DeliveryAttempt {
    const entry: DeliveryAttempt = { ...attempt, id: this.nextId++ };
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }

    const channel = this.byChannel.get(entry.channel) ?? { attempts: 0, succeeded: 0, failed: 0 };
    for (const counts of [channel, this.overall]) {
      counts.attempts += 1;
      if (entry.ok) counts.succeeded += 1;
      else counts.failed += 1;
    }
    this.byChannel.set(entry.channel, channel);
    return entry;
  }

  getRecent(limit = 100): DeliveryAttempt[] {
    const start = Math.max(0, this.buffer.length - limit);
    return this.buffer.slice(start).reverse();
  }

  getForAlert(alertId: string, limit = 100): DeliveryAttempt[] {
    const filtered = this.buffer.filter(a => a.alertId === alertId);
    const start = Math.max(0, filtered.length - limit);
    return filtered.slice(start).reverse();
  }

  totals(): DeliveryTotals {
    return {
      ...this.overall,
      byChannel: Object.fromEntries(
        Array.from(this.byChannel.entries(), ([name, counts]) => [name, { ...counts }]),
      ),
    };
  }

  get size(): number {
    return this.buffer.length;
  }
}
