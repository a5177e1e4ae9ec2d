/**
 * Notification Settings Service
 */

import logger from '../../logger';
import {
  DEFAULT_NOTIFICATION_SETTINGS,
  NotificationSettingsSchema,
  notificationSettingsKey,
} from '../../models/notification-settings.model';
import type {
  NotificationSettings,
  NotificationSettingsUpdate,
} from '../../models/notification-settings.model';
import { errorMessage } from '../../utils/error-utils';
import type { KeyValueStore } from '../key-value-store.service';

const log = logger.child({ module: 'notification-settings' });

export class NotificationSettingsService {
  constructor(private readonly store: KeyValueStore) {}

  /**
   * Stored settings, or the defaults when none are saved or they cannot be read
   */
  async getSettings(userId: string): Promise<NotificationSettings> {
    const raw = await this.store.getString(notificationSettingsKey(userId));
    if (raw === null) {
      return { ...DEFAULT_NOTIFICATION_SETTINGS };
    }

    try {
      return NotificationSettingsSchema.parse(JSON.parse(raw));
    } catch (error) {
      log.warn(
        { userId, error: errorMessage(error) },
        'Stored notification settings unreadable, using defaults'
      );
      return { ...DEFAULT_NOTIFICATION_SETTINGS };
    }
  }

  async updateSettings(
    userId: string,
    update: NotificationSettingsUpdate
  ): Promise<NotificationSettings> {
    const current = await this.getSettings(userId);
    const next: NotificationSettings = { ...current, ...update };
    await this.store.setString(notificationSettingsKey(userId), JSON.stringify(next));

    log.info({ userId, settings: next }, 'Notification settings updated');
    return next;
  }
}
