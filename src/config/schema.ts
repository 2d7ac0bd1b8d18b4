import { z } from 'zod';
import { isValidTimeZone } from '../core/clock.js';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const parseList = (v: unknown, fallback: string[]): string[] => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),
  API_KEY: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),

  // Unset keeps everything in memory
  DB_PATH: z.string().optional(),
  DIRECTORY_PATH: z.string().default('./data/directory.json'),
  DEFAULT_TIMEZONE: z.string().default('UTC').refine(isValidTimeZone, 'unknown IANA time zone'),

  REMINDER_TICK_MS: z.coerce.number().int().positive().default(60_000),
  REMINDER_DEFAULT_INTERVAL_MS: z.coerce.number().int().positive().default(2 * 3_600_000),
  DISPATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  DELIVERY_LOG_SIZE: z.coerce.number().int().positive().default(5_000),

  ALERT_CONSOLE_ENABLED: z.string().optional(),
  ALERT_WEBHOOK_ENABLED: z.string().optional(),
  ALERT_WEBHOOK_URL: z.string().url().optional()
});

export const configSchema = rawSchema
  .superRefine((raw, ctx) => {
    if (parseBoolean(raw.ALERT_WEBHOOK_ENABLED, false) && !raw.ALERT_WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ALERT_WEBHOOK_URL'],
        message: 'required when ALERT_WEBHOOK_ENABLED is set'
      });
    }
  })
  .transform((raw) => ({
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,
    httpPort: raw.HTTP_PORT,
    apiKey: raw.API_KEY,
    corsOrigins: parseList(raw.CORS_ORIGINS, ['http://localhost:3000', 'http://localhost:5173']),

    storage: {
      dbPath: raw.DB_PATH,
      directoryPath: raw.DIRECTORY_PATH
    },

    defaultTimeZone: raw.DEFAULT_TIMEZONE,

    reminders: {
      tickMs: raw.REMINDER_TICK_MS,
      defaultIntervalMs: raw.REMINDER_DEFAULT_INTERVAL_MS
    },

    dispatch: {
      timeoutMs: raw.DISPATCH_TIMEOUT_MS,
      deliveryLogSize: raw.DELIVERY_LOG_SIZE
    },

    channels: {
      console: {
        enabled: parseBoolean(raw.ALERT_CONSOLE_ENABLED, false)
      },
      webhook: {
        enabled: parseBoolean(raw.ALERT_WEBHOOK_ENABLED, false),
        url: raw.ALERT_WEBHOOK_URL
      }
    }
  }));

export type AppConfig = z.infer<typeof configSchema>;
