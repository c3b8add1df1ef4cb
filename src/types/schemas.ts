/**
 * Zod Validation Schemas - Court Alerts Engine
 *
 * Runtime validation for data crossing a trust boundary: snapshot payloads
 * returned by booking-system adapters, and items read back from DynamoDB.
 */

import { z } from 'zod';

const isoDateTimeSchema = z.string().datetime({ offset: true, message: 'Invalid ISO 8601 datetime' });
const ymdSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD');
const nonEmptyString = z.string().min(1, 'Cannot be empty');
const hhmmSchema = z
  .string()
  .regex(/^(([01]\d|2[0-3]):[0-5]\d|24:00)$/, 'Time must be HH:MM');

export const slotStatusSchema = z.enum(['OPEN', 'BOOKED', 'UNKNOWN']);

export const subscriptionStatusSchema = z.enum(['ACTIVE', 'PAUSED', 'EXPIRED', 'CANCELLED']);

export const dateRangeSchema = z
  .object({
    from: ymdSchema,
    to: ymdSchema,
  })
  .refine((range) => range.from <= range.to, {
    message: 'Date range must not end before it starts',
  });

export const slotSchema = z.object({
  courtId: nonEmptyString,
  start: isoDateTimeSchema,
  end: isoDateTimeSchema,
  status: slotStatusSchema,
  price: z.number().nonnegative().optional(),
  currency: z.string().length(3).optional(),
});

/**
 * Snapshot payload as returned by an AvailabilitySource
 */
export const snapshotPayloadSchema = z.object({
  sourceId: nonEmptyString,
  capturedAt: isoDateTimeSchema,
  dateRange: dateRangeSchema,
  slotsByCourt: z.record(z.array(slotSchema)),
  courtNames: z.record(z.string()).optional(),
  sourceUpdatedAt: isoDateTimeSchema.optional(),
});

export type SnapshotPayload = z.infer<typeof snapshotPayloadSchema>;

const minutesOf = (hhmm: string): number => {
  const [hours = '0', minutes = '0'] = hhmm.split(':');
  return Number(hours) * 60 + Number(minutes);
};

export const preferredTimeSchema = z
  .object({
    dayOfWeek: z.number().int().min(0).max(6),
    startTime: hhmmSchema,
    endTime: hhmmSchema,
  })
  .refine((entry) => minutesOf(entry.endTime) > minutesOf(entry.startTime), {
    message: 'Preferred time must end after it starts',
  });

export const sourcePreferenceSchema = z.object({
  sourceId: nonEmptyString,
  courtIds: z.array(nonEmptyString).default([]),
});

export const subscriptionSchema = z.object({
  id: nonEmptyString,
  ownerId: nonEmptyString,
  notifyEmail: z.string().email('Invalid email format'),
  sourcePreferences: z.array(sourcePreferenceSchema).min(1),
  preferredTimes: z.array(preferredTimeSchema).min(1),
  minSlotDurationMinutes: z.number().int().min(30).max(480).default(60),
  expiryDate: ymdSchema.optional(),
  maxNotificationsPerDay: z.number().int().min(1).max(10).default(3),
  notificationFrequencyHours: z.number().int().min(1).max(168).default(24),
  status: subscriptionStatusSchema,
  createdAt: isoDateTimeSchema,
  updatedAt: isoDateTimeSchema,
});

export const coveredWindowSchema = z.object({
  sourceId: nonEmptyString,
  courtId: nonEmptyString,
  start: isoDateTimeSchema,
  end: isoDateTimeSchema,
});

export const notificationRecordSchema = z.object({
  recordId: nonEmptyString,
  subscriptionId: nonEmptyString,
  digestId: nonEmptyString,
  sentAt: isoDateTimeSchema,
  coveredWindow: coveredWindowSchema,
});
