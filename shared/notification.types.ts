/**
 * Notification Types
 */

import type { TreatmentType } from './treatment.types';

/**
 * Reminder kinds
 * - initial: at the scheduled time
 * - followup: a nudge after the initial reminder
 * - snooze: user-requested repeat
 */
export const NOTIFICATION_KINDS = ['initial', 'followup', 'snooze'] as const;
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];

export const CHANNEL_MEDICATION_REMINDERS = 'medication_reminders';
export const CHANNEL_FLUID_REMINDERS = 'fluid_reminders';
export const CHANNEL_WEEKLY_SUMMARIES = 'weekly_summaries';

export type NotificationChannel =
  | typeof CHANNEL_MEDICATION_REMINDERS
  | typeof CHANNEL_FLUID_REMINDERS
  | typeof CHANNEL_WEEKLY_SUMMARIES;

/**
 * JSON payload attached to every treatment reminder
 * Used to rebuild the notification index and to snooze from a delivered reminder
 */
export interface ReminderPayload {
  userId: string;
  petId: string;
  scheduleId: string;
  timeSlot: string; // HH:mm
  kind: NotificationKind;
  treatmentType: TreatmentType;
}
