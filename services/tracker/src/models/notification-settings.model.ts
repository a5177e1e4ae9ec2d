/**
 * Notification Settings Model
 * Per-user reminder preferences, kept in the local key/value store
 */

import { z } from 'zod';

export const NotificationSettingsSchema = z.object({
  enableNotifications: z.boolean().default(true),
  snoozeEnabled: z.boolean().default(true),
  weeklySummaryEnabled: z.boolean().default(true),
});

export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;

export const NotificationSettingsUpdateSchema = NotificationSettingsSchema.partial().strict();

export type NotificationSettingsUpdate = z.infer<typeof NotificationSettingsUpdateSchema>;

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = Object.freeze({
  enableNotifications: true,
  snoozeEnabled: true,
  weeklySummaryEnabled: true,
});

export function notificationSettingsKey(userId: string): string {
  return `notification_settings_${userId}`;
}
