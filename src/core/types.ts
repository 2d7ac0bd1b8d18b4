export type Severity = 'info' | 'warning' | 'critical';

export type AlertStatus = 'active' | 'archived';

export type ChannelName = 'in_app' | 'console' | 'webhook';

// ── Visibility ──────────────────────────────────────────────────────

export type Visibility =
  | { kind: 'organization' }
  | { kind: 'team'; teamIds: string[] }
  | { kind: 'user'; userIds: string[] };

export type VisibilityKind = Visibility['kind'];

// ── Alert ───────────────────────────────────────────────────────────

export interface Alert {
  id: string;
  title: string;
  message: string;
  severity: Severity;
  createdBy: string;
  visibility: Visibility;
  deliveryChannels: ChannelName[];
  startAt: number;
  expiresAt: number | null;
  remindersEnabled: boolean;
  reminderIntervalMs: number;
  status: AlertStatus;
  createdAt: number;
  updatedAt: number;
}

export interface AlertFilter {
  severity?: Severity;
  status?: AlertStatus;
  visibilityKind?: VisibilityKind;
}

// ── Per-user state ──────────────────────────────────────────────────

export type ReadState = 'unread' | 'read';

export interface UserAlertState {
  userId: string;
  alertId: string;
  read: ReadState;
  readAt: number | null;
  /** First instant after the snooze day; null when never snoozed. */
  snoozedUntil: number | null;
  lastNotifiedAt: number | null;
  createdAt: number;
  updatedAt: number;
}

// ── Delivery ────────────────────────────────────────────────────────

export type DeliveryKind = 'initial' | 'reminder';

export interface DeliveryAttempt {
  id: number;
  channel: string;
  alertId: string;
  userId: string;
  kind: DeliveryKind;
  ok: boolean;
  error?: string;
  timestamp: number;
}
