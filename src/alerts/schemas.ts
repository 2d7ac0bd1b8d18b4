import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

/** Epoch milliseconds, or an ISO-8601 timestamp with offset. */
export const timestampSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .datetime({ offset: true })
    .transform((s) => Date.parse(s))
]);

export const severitySchema = z.enum(['info', 'warning', 'critical']);
export const alertStatusSchema = z.enum(['active', 'archived']);
export const channelNameSchema = z.enum(['in_app', 'console', 'webhook']);

export const visibilitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('organization') }),
  z.object({ kind: z.literal('team'), teamIds: z.array(z.string().min(1)) }),
  z.object({ kind: z.literal('user'), userIds: z.array(z.string().min(1)) })
]);

export const createAlertSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    message: z.string().trim().min(1).max(4000),
    severity: severitySchema,
    createdBy: z.string().min(1),
    visibility: visibilitySchema,
    deliveryChannels: z.array(channelNameSchema).min(1).optional(),
    startAt: timestampSchema.optional(),
    expiresAt: timestampSchema.nullable().optional(),
    remindersEnabled: z.boolean().optional(),
    reminderIntervalMs: z.number().int().positive().optional()
  })
  .strict();

export const alertPatchSchema = createAlertSchema.omit({ createdBy: true }).partial().strict();

export const alertFilterSchema = z
  .object({
    severity: severitySchema.optional(),
    status: alertStatusSchema.optional(),
    visibilityKind: z.enum(['organization', 'team', 'user']).optional()
  })
  .strict();

export type CreateAlertInput = z.input<typeof createAlertSchema>;
export type AlertPatch = z.input<typeof alertPatchSchema>;

/** Parse `input` or throw a ValidationError listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`invalid ${what}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
