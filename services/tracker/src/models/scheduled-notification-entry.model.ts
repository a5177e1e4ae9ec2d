/**
 * Scheduled Notification Entry Model
 * One reminder recorded in the per-pet, per-day notification index
 */

import { z } from 'zod';
import { NOTIFICATION_KINDS, TREATMENT_TYPES } from '../../../../shared';
import type { NotificationKind, TreatmentType } from '../../../../shared';

const TIME_SLOT_PATTERN = /^\d{2}:\d{2}$/;

/**
 * HH:mm with hours 00-23 and minutes 00-59
 */
export function isValidTimeSlot(timeSlot: string): boolean {
  if (!TIME_SLOT_PATTERN.test(timeSlot)) {
    return false;
  }
  const [hour, minute] = timeSlot.split(':').map(Number);
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

export function isValidKind(kind: string): kind is NotificationKind {
  return (NOTIFICATION_KINDS as readonly string[]).includes(kind);
}

export function isValidTreatmentType(type: string): type is TreatmentType {
  return (TREATMENT_TYPES as readonly string[]).includes(type);
}

export const ScheduledNotificationEntrySchema = z.object({
  notificationId: z.number().int().nonnegative(),
  scheduleId: z.string().min(1),
  treatmentType: z.enum(TREATMENT_TYPES),
  timeSlotISO: z.string().refine(isValidTimeSlot, { message: 'Invalid timeSlotISO' }),
  kind: z.enum(NOTIFICATION_KINDS),
});

export type ScheduledNotificationEntry = z.infer<typeof ScheduledNotificationEntrySchema>;

/**
 * Validate raw JSON into an entry
 * Throws on any missing or invalid field
 */
export function parseScheduledNotificationEntry(json: unknown): ScheduledNotificationEntry {
  const result = ScheduledNotificationEntrySchema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid scheduled notification entry: ${details}`);
  }
  return result.data;
}

/**
 * Serialize with a fixed key order
 * The index checksum is computed over this exact representation
 */
export function toEntryJson(entry: ScheduledNotificationEntry): ScheduledNotificationEntry {
  return {
    notificationId: entry.notificationId,
    scheduleId: entry.scheduleId,
    treatmentType: entry.treatmentType,
    timeSlotISO: entry.timeSlotISO,
    kind: entry.kind,
  };
}
