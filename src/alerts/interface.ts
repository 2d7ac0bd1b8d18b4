import type { Alert, ChannelName } from '../core/types.js';

/**
 * A delivery channel. `deliver` resolves true when the channel accepted the
 * notification; false or a rejection counts as a failed attempt.
 */
export interface NotificationChannel {
  readonly name: ChannelName;
  deliver(alert: Alert, userId: string): Promise<boolean>;
}
