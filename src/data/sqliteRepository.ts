import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Alert, UserAlertState } from '../core/types.js';
import type { AlertRecord, AlertRepository, UserAlertStateRepository } from './repository.js';
import { alertStatusSchema, channelNameSchema, severitySchema, visibilitySchema } from '../alerts/schemas.js';

const jsonColumn = <T extends z.ZodTypeAny>(schema: T) =>
  z.string().transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON column' });
      return z.NEVER;
    }
  }).pipe(schema);

const alertRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  message: z.string(),
  severity: severitySchema,
  created_by: z.string(),
  visibility: jsonColumn(visibilitySchema),
  delivery_channels: jsonColumn(z.array(channelNameSchema)),
  start_at: z.number(),
  expires_at: z.number().nullable(),
  reminders_enabled: z.number(),
  reminder_interval_ms: z.number(),
  status: alertStatusSchema,
  created_at: z.number(),
  updated_at: z.number(),
  targets: jsonColumn(z.array(z.string())).nullable()
});

const stateRowSchema = z.object({
  user_id: z.string(),
  alert_id: z.string(),
  read: z.enum(['unread', 'read']),
  read_at: z.number().nullable(),
  snoozed_until: z.number().nullable(),
  last_notified_at: z.number().nullable(),
  created_at: z.number(),
  updated_at: z.number()
});

/** SQLite persistence for alerts and per-user state (better-sqlite3, synchronous). */
export class SqliteRepository implements AlertRepository, UserAlertStateRepository {
  private readonly db: Database.Database;

  constructor(dbPath = './data/alerts.sqlite') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS alerts (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        message TEXT NOT NULL,
        severity TEXT NOT NULL,
        created_by TEXT NOT NULL,
        visibility TEXT NOT NULL,
        delivery_channels TEXT NOT NULL,
        start_at INTEGER NOT NULL,
        expires_at INTEGER,
        reminders_enabled INTEGER NOT NULL,
        reminder_interval_ms INTEGER NOT NULL,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        targets TEXT
      );

      CREATE TABLE IF NOT EXISTS user_alert_states (
        user_id TEXT NOT NULL,
        alert_id TEXT NOT NULL,
        read TEXT NOT NULL,
        read_at INTEGER,
        snoozed_until INTEGER,
        last_notified_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, alert_id)
      );

      CREATE INDEX IF NOT EXISTS idx_user_alert_states_alert ON user_alert_states(alert_id);
    `);
  }

  saveAlert(alert: Alert, targets: ReadonlySet<string> | null): void {
    this.db.prepare(`
      INSERT INTO alerts(
        id, title, message, severity, created_by, visibility, delivery_channels, start_at,
        expires_at, reminders_enabled, reminder_interval_ms, status, created_at, updated_at, targets
      ) VALUES (
        @id, @title, @message, @severity, @createdBy, @visibility, @deliveryChannels, @startAt,
        @expiresAt, @remindersEnabled, @reminderIntervalMs, @status, @createdAt, @updatedAt, @targets
      )
      ON CONFLICT(id) DO UPDATE SET
        title=excluded.title,
        message=excluded.message,
        severity=excluded.severity,
        visibility=excluded.visibility,
        delivery_channels=excluded.delivery_channels,
        start_at=excluded.start_at,
        expires_at=excluded.expires_at,
        reminders_enabled=excluded.reminders_enabled,
        reminder_interval_ms=excluded.reminder_interval_ms,
        status=excluded.status,
        updated_at=excluded.updated_at,
        targets=excluded.targets
    `).run({
      id: alert.id,
      title: alert.title,
      message: alert.message,
      severity: alert.severity,
      createdBy: alert.createdBy,
      visibility: JSON.stringify(alert.visibility),
      deliveryChannels: JSON.stringify(alert.deliveryChannels),
      startAt: alert.startAt,
      expiresAt: alert.expiresAt,
      remindersEnabled: alert.remindersEnabled ? 1 : 0,
      reminderIntervalMs: alert.reminderIntervalMs,
      status: alert.status,
      createdAt: alert.createdAt,
      updatedAt: alert.updatedAt,
      targets: targets ? JSON.stringify([...targets]) : null
    });
  }

  loadAlerts(): AlertRecord[] {
    const rows = this.db.prepare('SELECT * FROM alerts ORDER BY CAST(id AS INTEGER)').all();
    return rows.map((raw) => {
      const row = alertRowSchema.parse(raw);
      return {
        alert: {
          id: row.id,
          title: row.title,
          message: row.message,
          severity: row.severity,
          createdBy: row.created_by,
          visibility: row.visibility,
          deliveryChannels: row.delivery_channels,
          startAt: row.start_at,
          expiresAt: row.expires_at,
          remindersEnabled: row.reminders_enabled === 1,
          reminderIntervalMs: row.reminder_interval_ms,
          status: row.status,
          createdAt: row.created_at,
          updatedAt: row.updated_at
        },
        targets: row.targets
      };
    });
  }

  saveState(state: UserAlertState): void {
    this.db.prepare(`
      INSERT INTO user_alert_states(
        user_id, alert_id, read, read_at, snoozed_until, last_notified_at, created_at, updated_at
      ) VALUES (
        @userId, @alertId, @read, @readAt, @snoozedUntil, @lastNotifiedAt, @createdAt, @updatedAt
      )
      ON CONFLICT(user_id, alert_id) DO UPDATE SET
        read=excluded.read,
        read_at=excluded.read_at,
        snoozed_until=excluded.snoozed_until,
        last_notified_at=excluded.last_notified_at,
        updated_at=excluded.updated_at
    `).run({ ...state });
  }

  loadStates(): UserAlertState[] {
    const rows = this.db.prepare('SELECT * FROM user_alert_states ORDER BY created_at').all();
    return rows.map((raw) => {
      const row = stateRowSchema.parse(raw);
      return {
        userId: row.user_id,
        alertId: row.alert_id,
        read: row.read,
        readAt: row.read_at,
        snoozedUntil: row.snoozed_until,
        lastNotifiedAt: row.last_notified_at,
        createdAt: row.created_at,
        updatedAt: row.updated_at
      };
    });
  }

  close(): void {
    this.db.close();
  }
}
