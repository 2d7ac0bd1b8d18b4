import type { Alert } from '../core/types.js';
import type { Clock } from '../core/clock.js';
import type { NotificationChannel } from './interface.js';

export class ConsoleChannel implements NotificationChannel {
  readonly name = 'console' as const;

  constructor(
    private readonly clock: Clock,
    private readonly write: (line: string) => void = (line) => {
      process.stdout.write(line);
    }
  ) {}

  async deliver(alert: Alert, userId: string): Promise<boolean> {
    this.write(
      `${JSON.stringify({
        ts: new Date(this.clock.now()).toISOString(),
        alert: alert.title,
        alertId: alert.id,
        severity: alert.severity,
        userId,
        message: alert.message
      })}\n`
    );
    return true;
  }
}
