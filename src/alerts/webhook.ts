import axios from 'axios';
import type { Alert } from '../core/types.js';
import { withRetry } from '../core/async.js';
import type { NotificationChannel } from './interface.js';

export interface WebhookChannelOptions {
  url: string;
  timeoutMs?: number;
  retries?: number;
}

/** POSTs one JSON payload per (alert, user); non-2xx responses reject after the configured retries. */
export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook' as const;

  constructor(private readonly opts: WebhookChannelOptions) {}

  async deliver(alert: Alert, userId: string): Promise<boolean> {
    await withRetry(
      () =>
        axios.post(
          this.opts.url,
          {
            userId,
            alertId: alert.id,
            title: alert.title,
            message: alert.message,
            severity: alert.severity
          },
          { timeout: this.opts.timeoutMs ?? 5_000 }
        ),
      this.opts.retries ?? 0
    );
    return true;
  }
}
