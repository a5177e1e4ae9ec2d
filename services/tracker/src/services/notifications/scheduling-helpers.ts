/**
 * Reminder scheduling helpers
 * Pure time math shared by the reminder service
 */

import { addDays } from '../../utils/date-utils';
import { isValidTimeSlot } from '../../models/scheduled-notification-entry.model';

export type GracePeriodDecision = 'scheduled' | 'immediate' | 'missed';

export const DEFAULT_GRACE_PERIOD_MINUTES = 30;

const FOLLOWUP_CUTOFF_HOUR = 23;
const FOLLOWUP_MORNING_HOUR = 8;

/**
 * Local date on the day of `reference` at the "HH:mm" slot
 */
export function zonedDateTimeForToday(timeSlot: string, reference: Date): Date {
  if (!isValidTimeSlot(timeSlot)) {
    throw new Error(`Invalid time slot: "${timeSlot}"`);
  }
  const [hour, minute] = timeSlot.split(':').map(Number);
  return new Date(reference.getFullYear(), reference.getMonth(), reference.getDate(), hour, minute);
}

/**
 * Future slots are scheduled, slots missed by at most the grace period
 * fire immediately, anything older is missed
 */
export function evaluateGracePeriod(
  scheduledTime: Date,
  now: Date,
  gracePeriodMinutes: number = DEFAULT_GRACE_PERIOD_MINUTES
): GracePeriodDecision {
  const diffMinutes = Math.trunc((scheduledTime.getTime() - now.getTime()) / 60_000);

  if (diffMinutes >= 0) {
    return 'scheduled';
  }
  if (Math.abs(diffMinutes) <= gracePeriodMinutes) {
    return 'immediate';
  }
  return 'missed';
}

/**
 * Follow-up time for an initial reminder
 * Pushed to 08:00 the next morning when it would land after 23:00
 */
export function calculateFollowupTime(initialTime: Date, followupOffsetHours: number): Date {
  const followup = new Date(initialTime.getTime() + followupOffsetHours * 60 * 60 * 1000);

  const cutoff = new Date(
    initialTime.getFullYear(),
    initialTime.getMonth(),
    initialTime.getDate(),
    FOLLOWUP_CUTOFF_HOUR,
    0
  );
  if (followup.getTime() > cutoff.getTime()) {
    const nextDay = addDays(initialTime, 1);
    return new Date(
      nextDay.getFullYear(),
      nextDay.getMonth(),
      nextDay.getDate(),
      FOLLOWUP_MORNING_HOUR,
      0
    );
  }
  return followup;
}
