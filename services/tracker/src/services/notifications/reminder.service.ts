/**
 * Reminder Service
 * Schedules, cancels and snoozes treatment reminders for a pet and keeps the
 * notification index in step with the reminder plugin.
 */

import { z } from 'zod';
import logger from '../../logger';
import { DEFAULT_PET_NAME, REMINDER_MESSAGES } from '../../constants/messages';
import {
  CHANNEL_FLUID_REMINDERS,
  CHANNEL_MEDICATION_REMINDERS,
  CHANNEL_WEEKLY_SUMMARIES,
  TREATMENT_TYPES,
} from '../../../../../shared';
import type {
  NotificationChannel,
  NotificationKind,
  ReminderPayload,
  TreatmentType,
} from '../../../../../shared';
import { addDays, addMinutes, formatTimeSlot, nextMondayAt9 } from '../../utils/date-utils';
import { reminderTimesOnDate } from '../../models/schedule.model';
import type { Schedule } from '../../models/schedule.model';
import type { ScheduledNotificationEntry } from '../../models/scheduled-notification-entry.model';
import { generateNotificationId, generateWeeklySummaryNotificationId } from './notification-id';
import { NotificationIndexStore, pendingForPet } from './notification-index-store.service';
import type { ReconcileResult } from './notification-index-store.service';
import type { NotificationSettingsService } from './notification-settings.service';
import type { ReminderPlugin } from './reminder-plugin';
import {
  DEFAULT_GRACE_PERIOD_MINUTES,
  calculateFollowupTime,
  evaluateGracePeriod,
  zonedDateTimeForToday,
} from './scheduling-helpers';
import { errorMessage } from '../../utils/error-utils';

const log = logger.child({ module: 'reminder-service' });

export const MAX_NOTIFICATIONS_PER_PET = 50;
export const NOTIFICATION_WARNING_THRESHOLD = 40;

const LIMIT_WINDOW_HOURS = 24;
const WEEKLY_SUMMARY_WEEKS_TO_CANCEL = 4;

/**
 * At the per-pet limit only reminders within the next 24 hours are scheduled
 */
export function isBeyondLimitWindow(reminderTime: Date, now: Date, currentCount: number): boolean {
  if (currentCount < MAX_NOTIFICATIONS_PER_PET) {
    return false;
  }
  return reminderTime.getTime() > now.getTime() + LIMIT_WINDOW_HOURS * 60 * 60 * 1000;
}

export interface ReminderServiceOptions {
  now?: () => Date;
  followupOffsetHours?: number;
  gracePeriodMinutes?: number;
  snoozeMinutes?: number;
}

export interface ScheduleResult {
  scheduled: number;
  immediate: number;
  missed: number;
  skippedDueToLimit: number;
  errors: string[];
  cacheEmpty?: boolean;
  skipped?: boolean;
}

export interface ScheduleRequest {
  schedules: Schedule[];
  petName?: string;
}

export type WeeklySummaryResult =
  | { success: true; scheduledFor: string; notificationId: number }
  | {
      success: false;
      reason: 'disabled_in_settings' | 'already_scheduled' | 'error';
      scheduledFor?: string;
      notificationId?: number;
      error?: string;
    };

export interface RescheduleResult {
  orphansCanceled: number;
  missingCount: number;
  scheduleResult: ScheduleResult;
  weeklySummaryResult: WeeklySummaryResult;
}

export type SnoozeFailureReason =
  | 'invalid_payload'
  | 'snooze_disabled'
  | 'invalid_kind'
  | 'scheduling_failed'
  | 'unknown_error';

export type SnoozeResult =
  | { success: true; snoozedUntil: string; snoozeId: number }
  | { success: false; reason: SnoozeFailureReason; error?: string };

// Field presence is checked here; kind is checked separately so it maps to its own reason
const SnoozePayloadSchema = z.object({
  userId: z.string().min(1),
  petId: z.string().min(1),
  scheduleId: z.string().min(1),
  timeSlot: z.string().min(1),
  kind: z.string().min(1),
  treatmentType: z.enum(TREATMENT_TYPES),
});

interface SlotCounts {
  scheduled: number;
  immediate: number;
  missed: number;
}

function emptyResult(): ScheduleResult {
  return { scheduled: 0, immediate: 0, missed: 0, skippedDueToLimit: 0, errors: [] };
}

function groupIdFor(petId: string): string {
  return `pet_${petId}`;
}

function channelFor(treatmentType: TreatmentType): NotificationChannel {
  return treatmentType === 'medication' ? CHANNEL_MEDICATION_REMINDERS : CHANNEL_FLUID_REMINDERS;
}

/**
 * Title and body for a reminder of the given kind
 */
export function reminderContent(
  treatmentType: TreatmentType,
  kind: NotificationKind,
  petName: string
): { title: string; body: string; channelId: NotificationChannel } {
  const channelId = channelFor(treatmentType);

  switch (kind) {
    case 'initial':
      return treatmentType === 'medication'
        ? {
            title: REMINDER_MESSAGES.medicationTitle(petName),
            body: REMINDER_MESSAGES.medicationBody(petName),
            channelId,
          }
        : {
            title: REMINDER_MESSAGES.fluidTitle(petName),
            body: REMINDER_MESSAGES.fluidBody(petName),
            channelId,
          };
    case 'followup':
      return {
        title: REMINDER_MESSAGES.followupTitle(petName),
        body: REMINDER_MESSAGES.followupBody(petName),
        channelId,
      };
    case 'snooze':
      return {
        title: REMINDER_MESSAGES.snoozeTitle(petName),
        body: REMINDER_MESSAGES.snoozeBody(petName),
        channelId,
      };
  }
}

export function buildReminderPayload(payload: ReminderPayload): string {
  return JSON.stringify({
    userId: payload.userId,
    petId: payload.petId,
    scheduleId: payload.scheduleId,
    timeSlot: payload.timeSlot,
    kind: payload.kind,
    treatmentType: payload.treatmentType,
  });
}

export class ReminderService {
  private readonly now: () => Date;
  private readonly followupOffsetHours: number;
  private readonly gracePeriodMinutes: number;
  private readonly snoozeMinutes: number;

  constructor(
    private readonly plugin: ReminderPlugin,
    private readonly indexStore: NotificationIndexStore,
    private readonly settingsService: NotificationSettingsService,
    options: ReminderServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.followupOffsetHours = options.followupOffsetHours ?? 2;
    this.gracePeriodMinutes = options.gracePeriodMinutes ?? DEFAULT_GRACE_PERIOD_MINUTES;
    this.snoozeMinutes = options.snoozeMinutes ?? 15;
  }

  /**
   * Schedule every reminder due today for the pet's active schedules
   */
  async scheduleAllForToday(
    userId: string,
    petId: string,
    request: ScheduleRequest
  ): Promise<ScheduleResult> {
    const result = emptyResult();
    const petName = request.petName ?? DEFAULT_PET_NAME;

    if (request.schedules.length === 0) {
      log.info({ userId, petId }, 'No schedules available, skipping reminder scheduling');
      return { ...result, cacheEmpty: true };
    }

    if (!(await this.notificationsEnabled(userId))) {
      log.info({ userId, petId }, 'Notifications disabled, skipping reminder scheduling');
      return { ...result, skipped: true };
    }

    const now = this.now();
    const activeToday = request.schedules.filter(
      (schedule) => schedule.isActive && reminderTimesOnDate(schedule, now).length > 0
    );

    for (const schedule of activeToday) {
      try {
        const scheduleResult = await this.scheduleRemindersForSchedule(
          userId,
          petId,
          schedule,
          petName,
          now
        );
        result.scheduled += scheduleResult.scheduled;
        result.immediate += scheduleResult.immediate;
        result.missed += scheduleResult.missed;
        result.skippedDueToLimit += scheduleResult.skippedDueToLimit;
        result.errors.push(...scheduleResult.errors);
      } catch (error) {
        result.errors.push(`Failed to schedule ${schedule.id}: ${errorMessage(error)}`);
      }
    }

    log.info(
      {
        userId,
        petId,
        schedules: activeToday.length,
        scheduled: result.scheduled,
        immediate: result.immediate,
        missed: result.missed,
        errors: result.errors.length,
      },
      'Reminder scheduling complete'
    );

    await this.updateGroupSummary(userId, petId, petName);
    return result;
  }

  /**
   * Replace the reminders of a single schedule (after it was created or edited)
   */
  async scheduleForSchedule(
    userId: string,
    petId: string,
    schedule: Schedule,
    petName: string = DEFAULT_PET_NAME
  ): Promise<ScheduleResult> {
    try {
      await this.cancelForSchedule(userId, petId, schedule.id, petName);

      const now = this.now();
      if (!(await this.notificationsEnabled(userId))) {
        return { ...emptyResult(), skipped: true };
      }
      if (!schedule.isActive || reminderTimesOnDate(schedule, now).length === 0) {
        log.debug({ userId, petId, scheduleId: schedule.id }, 'Schedule not due today, skipping');
        return { ...emptyResult(), skipped: true };
      }

      const result = await this.scheduleRemindersForSchedule(
        userId,
        petId,
        schedule,
        petName,
        now
      );
      await this.updateGroupSummary(userId, petId, petName);
      return result;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId: schedule.id, error: errorMessage(error) },
        'Failed to schedule reminders for schedule'
      );
      return { ...emptyResult(), errors: [errorMessage(error)] };
    }
  }

  async cancelForSchedule(
    userId: string,
    petId: string,
    scheduleId: string,
    petName: string = DEFAULT_PET_NAME
  ): Promise<number> {
    try {
      const entries = await this.indexStore.getForToday(userId, petId);
      let canceled = 0;

      for (const entry of entries.filter((e) => e.scheduleId === scheduleId)) {
        try {
          await this.plugin.cancel(entry.notificationId);
          await this.indexStore.removeEntryBy(
            userId,
            petId,
            scheduleId,
            entry.timeSlotISO,
            entry.kind
          );
          canceled++;
        } catch (error) {
          log.error(
            { userId, petId, notificationId: entry.notificationId, error: errorMessage(error) },
            'Failed to cancel reminder'
          );
        }
      }

      await this.updateGroupSummary(userId, petId, petName);
      return canceled;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId, error: errorMessage(error) },
        'Failed to cancel reminders for schedule'
      );
      return 0;
    }
  }

  /**
   * Cancel every kind of reminder for one time slot (e.g. once the treatment is logged)
   */
  async cancelSlot(
    userId: string,
    petId: string,
    scheduleId: string,
    timeSlot: string
  ): Promise<number> {
    try {
      const entries = await this.indexStore.getForToday(userId, petId);
      let canceled = 0;

      for (const entry of entries) {
        if (entry.scheduleId !== scheduleId || entry.timeSlotISO !== timeSlot) {
          continue;
        }
        try {
          await this.plugin.cancel(entry.notificationId);
          await this.indexStore.removeEntryBy(userId, petId, scheduleId, timeSlot, entry.kind);
          canceled++;
        } catch (error) {
          log.error(
            { userId, petId, notificationId: entry.notificationId, error: errorMessage(error) },
            'Failed to cancel reminder'
          );
        }
      }

      log.debug({ userId, petId, scheduleId, timeSlot, canceled }, 'Canceled slot reminders');
      return canceled;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId, timeSlot, error: errorMessage(error) },
        'Failed to cancel slot'
      );
      return 0;
    }
  }

  /**
   * Rebuild today's reminders from scratch
   * This pet's orphans in the plugin are canceled and the index is cleared before rescheduling.
   */
  async rescheduleAll(
    userId: string,
    petId: string,
    request: ScheduleRequest
  ): Promise<RescheduleResult> {
    const pending = await this.plugin.pendingNotificationRequests();
    const pendingIds = new Set(pending.map((p) => p.id));

    const indexEntries = await this.indexStore.getForToday(userId, petId, this.plugin);
    const indexedIds = new Set(indexEntries.map((e) => e.notificationId));

    let orphansCanceled = 0;
    for (const { id } of pendingForPet(pending, userId, petId)) {
      if (indexedIds.has(id)) {
        continue;
      }
      try {
        await this.plugin.cancel(id);
        orphansCanceled++;
      } catch (error) {
        log.error({ userId, petId, notificationId: id, error: errorMessage(error) }, 'Failed to cancel orphan');
      }
    }

    const missingCount = [...indexedIds].filter((id) => !pendingIds.has(id)).length;

    await this.indexStore.clearForDate(userId, petId, this.now());
    const scheduleResult = await this.scheduleAllForToday(userId, petId, request);

    await this.cancelWeeklySummary(userId, petId);
    const weeklySummaryResult = await this.scheduleWeeklySummary(userId, petId);

    log.info(
      { userId, petId, orphansCanceled, missingCount, weeklySummary: weeklySummaryResult.success },
      'Reminders rescheduled'
    );

    return { orphansCanceled, missingCount, scheduleResult, weeklySummaryResult };
  }

  /**
   * Today's indexed reminders, rebuilt from the plugin when the index is unreadable
   */
  async getTodaysReminders(userId: string, petId: string): Promise<ScheduledNotificationEntry[]> {
    return this.indexStore.getForToday(userId, petId, this.plugin);
  }

  async reconcile(userId: string, petId: string): Promise<ReconcileResult> {
    return this.indexStore.reconcile(userId, petId, this.plugin);
  }

  async cancelAllForToday(userId: string, petId: string): Promise<void> {
    const entries = await this.indexStore.getForToday(userId, petId);

    for (const entry of entries) {
      try {
        await this.plugin.cancel(entry.notificationId);
      } catch (error) {
        log.error(
          { userId, petId, notificationId: entry.notificationId, error: errorMessage(error) },
          'Failed to cancel reminder'
        );
      }
    }

    await this.indexStore.clearForDate(userId, petId, this.now());
    await this.cancelWeeklySummary(userId, petId);
    log.info({ userId, petId, canceled: entries.length }, 'Canceled all reminders for today');
  }

  /**
   * Snooze a delivered reminder, identified by its JSON payload
   */
  async snoozeCurrent(payload: string, petName: string = DEFAULT_PET_NAME): Promise<SnoozeResult> {
    let parsed: z.infer<typeof SnoozePayloadSchema>;
    try {
      parsed = SnoozePayloadSchema.parse(JSON.parse(payload));
    } catch {
      return { success: false, reason: 'invalid_payload' };
    }

    const { userId, petId, scheduleId, timeSlot, kind, treatmentType } = parsed;

    try {
      const settings = await this.settingsService.getSettings(userId);
      if (!settings.snoozeEnabled) {
        return { success: false, reason: 'snooze_disabled' };
      }

      if (kind !== 'initial' && kind !== 'followup') {
        log.warn({ userId, petId, kind }, 'Only initial or followup reminders can be snoozed');
        return { success: false, reason: 'invalid_kind' };
      }

      const canceled = await this.cancelSlot(userId, petId, scheduleId, timeSlot);

      const snoozedUntil = addMinutes(this.now(), this.snoozeMinutes);
      const content = reminderContent(treatmentType, 'snooze', petName);
      const snoozeId = generateNotificationId({
        userId,
        petId,
        scheduleId,
        timeSlot,
        kind: 'snooze',
      });

      try {
        await this.plugin.showZoned({
          id: snoozeId,
          title: content.title,
          body: content.body,
          scheduledDate: snoozedUntil,
          channelId: content.channelId,
          payload: buildReminderPayload({
            userId,
            petId,
            scheduleId,
            timeSlot,
            kind: 'snooze',
            treatmentType,
          }),
          groupId: groupIdFor(petId),
          threadIdentifier: groupIdFor(petId),
        });
      } catch (error) {
        log.error({ userId, petId, scheduleId, error: errorMessage(error) }, 'Failed to show snooze');
        return { success: false, reason: 'scheduling_failed' };
      }

      await this.indexStore.putEntry(userId, petId, {
        notificationId: snoozeId,
        scheduleId,
        treatmentType,
        timeSlotISO: timeSlot,
        kind: 'snooze',
      });

      log.info(
        { event: 'reminder_snoozed', userId, petId, scheduleId, timeSlot, kind, treatmentType, canceled },
        'Reminder snoozed'
      );
      return { success: true, snoozedUntil: snoozedUntil.toISOString(), snoozeId };
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Snooze failed');
      return { success: false, reason: 'unknown_error', error: errorMessage(error) };
    }
  }

  /**
   * Weekly summary on the next Monday at 09:00
   */
  async scheduleWeeklySummary(userId: string, petId: string): Promise<WeeklySummaryResult> {
    try {
      const settings = await this.settingsService.getSettings(userId);
      if (!settings.enableNotifications || !settings.weeklySummaryEnabled) {
        return { success: false, reason: 'disabled_in_settings' };
      }

      const nextMonday = nextMondayAt9(this.now());
      const notificationId = generateWeeklySummaryNotificationId({
        userId,
        petId,
        weekStartDate: nextMonday,
      });
      const scheduledFor = nextMonday.toISOString();

      const pending = await this.plugin.pendingNotificationRequests();
      if (pending.some((p) => p.id === notificationId)) {
        return { success: false, reason: 'already_scheduled', scheduledFor, notificationId };
      }

      await this.plugin.showZoned({
        id: notificationId,
        title: REMINDER_MESSAGES.weeklySummaryTitle,
        body: REMINDER_MESSAGES.weeklySummaryBody,
        scheduledDate: nextMonday,
        channelId: CHANNEL_WEEKLY_SUMMARIES,
        payload: JSON.stringify({ type: 'weekly_summary', route: '/progress', userId, petId }),
      });

      log.info({ userId, petId, scheduledFor, notificationId }, 'Weekly summary scheduled');
      return { success: true, scheduledFor, notificationId };
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Failed to schedule weekly summary');
      return { success: false, reason: 'error', error: errorMessage(error) };
    }
  }

  /**
   * Cancel the weekly summary for the next few Mondays
   */
  async cancelWeeklySummary(userId: string, petId: string): Promise<boolean> {
    const firstMonday = nextMondayAt9(this.now());
    let canceled = 0;

    for (let week = 0; week < WEEKLY_SUMMARY_WEEKS_TO_CANCEL; week++) {
      const notificationId = generateWeeklySummaryNotificationId({
        userId,
        petId,
        weekStartDate: addDays(firstMonday, 7 * week),
      });
      try {
        await this.plugin.cancel(notificationId);
        canceled++;
      } catch (error) {
        log.warn({ userId, petId, notificationId, error: errorMessage(error) }, 'Failed to cancel weekly summary');
      }
    }

    return canceled > 0;
  }

  private async notificationsEnabled(userId: string): Promise<boolean> {
    const settings = await this.settingsService.getSettings(userId);
    return settings.enableNotifications;
  }

  private async scheduleRemindersForSchedule(
    userId: string,
    petId: string,
    schedule: Schedule,
    petName: string,
    now: Date
  ): Promise<ScheduleResult> {
    const result = emptyResult();
    const currentCount = await this.indexStore.getCountForPet(userId, petId, now);
    const limitReached = currentCount >= MAX_NOTIFICATIONS_PER_PET;

    if (limitReached) {
      log.warn(
        { event: 'notification_limit_reached', userId, petId, currentCount, scheduleId: schedule.id },
        'Notification limit reached, applying 24h window'
      );
    } else if (currentCount >= NOTIFICATION_WARNING_THRESHOLD) {
      log.warn(
        { event: 'notification_limit_warning', userId, petId, currentCount },
        'Notification count approaching limit'
      );
    }

    for (const reminderTime of reminderTimesOnDate(schedule, now)) {
      if (isBeyondLimitWindow(reminderTime, now, currentCount)) {
        result.skippedDueToLimit++;
        continue;
      }

      const timeSlot = formatTimeSlot(reminderTime);
      try {
        const counts = await this.scheduleSlot(userId, petId, schedule, timeSlot, petName, now);
        result.scheduled += counts.scheduled;
        result.immediate += counts.immediate;
        result.missed += counts.missed;
      } catch (error) {
        result.errors.push(`Failed to schedule notification for ${timeSlot}: ${errorMessage(error)}`);
      }
    }

    if (result.skippedDueToLimit > 0) {
      log.warn(
        { userId, petId, scheduleId: schedule.id, skipped: result.skippedDueToLimit },
        'Reminders skipped due to per-pet limit'
      );
    }
    return result;
  }

  private async scheduleSlot(
    userId: string,
    petId: string,
    schedule: Schedule,
    timeSlot: string,
    petName: string,
    now: Date
  ): Promise<SlotCounts> {
    const scheduledTime = zonedDateTimeForToday(timeSlot, now);
    const decision = evaluateGracePeriod(scheduledTime, now, this.gracePeriodMinutes);

    if (decision === 'missed') {
      return { scheduled: 0, immediate: 0, missed: 1 };
    }

    await this.showAndIndex(
      userId,
      petId,
      schedule,
      timeSlot,
      'initial',
      decision === 'scheduled' ? scheduledTime : now,
      petName
    );

    let followups = 0;
    try {
      await this.showAndIndex(
        userId,
        petId,
        schedule,
        timeSlot,
        'followup',
        calculateFollowupTime(scheduledTime, this.followupOffsetHours),
        petName
      );
      followups = 1;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId: schedule.id, timeSlot, error: errorMessage(error) },
        'Failed to schedule follow-up'
      );
    }

    return decision === 'scheduled'
      ? { scheduled: 1 + followups, immediate: 0, missed: 0 }
      : { scheduled: followups, immediate: 1, missed: 0 };
  }

  /**
   * Show a reminder, then record it in the index
   * A show failure propagates; an index failure is only logged.
   */
  private async showAndIndex(
    userId: string,
    petId: string,
    schedule: Schedule,
    timeSlot: string,
    kind: NotificationKind,
    scheduledDate: Date,
    petName: string
  ): Promise<void> {
    const treatmentType = schedule.treatmentType;
    const content = reminderContent(treatmentType, kind, petName);
    const notificationId = generateNotificationId({
      userId,
      petId,
      scheduleId: schedule.id,
      timeSlot,
      kind,
    });

    await this.plugin.showZoned({
      id: notificationId,
      title: content.title,
      body: content.body,
      scheduledDate,
      channelId: content.channelId,
      payload: buildReminderPayload({
        userId,
        petId,
        scheduleId: schedule.id,
        timeSlot,
        kind,
        treatmentType,
      }),
      groupId: groupIdFor(petId),
      threadIdentifier: groupIdFor(petId),
    });

    try {
      await this.indexStore.putEntry(userId, petId, {
        notificationId,
        scheduleId: schedule.id,
        treatmentType,
        timeSlotISO: timeSlot,
        kind,
      });
    } catch (error) {
      log.error(
        { userId, petId, scheduleId: schedule.id, kind, error: errorMessage(error) },
        'Failed to index reminder'
      );
    }
  }

  private async updateGroupSummary(userId: string, petId: string, petName: string): Promise<void> {
    try {
      const entries = await this.indexStore.getEntriesForPet(userId, petId, this.now());
      if (entries.length === 0) {
        await this.plugin.cancelGroupSummary(petId);
        return;
      }

      const { medication, fluid } = NotificationIndexStore.categorizeByType(entries);
      await this.plugin.showGroupSummary({
        petId,
        petName,
        medicationCount: medication,
        fluidCount: fluid,
        groupId: groupIdFor(petId),
        threadIdentifier: groupIdFor(petId),
      });
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Failed to update group summary');
    }
  }
}
