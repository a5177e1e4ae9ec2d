/**
 * Week status
 * Dot status for each day of a Monday-to-Sunday week on the progress calendar
 */

import type { DayDotStatus } from '../../../../../shared';
import type { DailySummary } from '../../models/daily-summary.model';
import { reminderTimesOnDate } from '../../models/schedule.model';
import type { Schedule } from '../../models/schedule.model';
import { addDays, formatDate, startOfDay } from '../../utils/date-utils';

export interface WeekStatusInput {
  weekStart: Date;
  medicationSchedules: Schedule[];
  fluidSchedule: Schedule | null;
  /** Keyed by YYYY-MM-DD; a missing key and null both mean no summary */
  summaries: Record<string, DailySummary | null>;
  now: Date;
  trackingStartDate?: Date | null;
}

export type WeekStatuses = Record<string, DayDotStatus>;

/**
 * - future days and days before tracking started: none
 * - nothing scheduled: today for the current day, none otherwise
 * - current day: complete once every scheduled dose and session is logged, otherwise today
 * - past day: complete when the counts match, otherwise missed
 */
export function computeWeekStatuses(input: WeekStatusInput): WeekStatuses {
  const statuses: WeekStatuses = {};
  const today = startOfDay(input.now).getTime();
  const trackingStart = input.trackingStartDate
    ? startOfDay(input.trackingStartDate).getTime()
    : null;

  for (let i = 0; i < 7; i++) {
    const date = startOfDay(addDays(input.weekStart, i));
    const key = formatDate(date);
    const time = date.getTime();

    if (time > today || (trackingStart !== null && time < trackingStart)) {
      statuses[key] = 'none';
      continue;
    }

    const scheduledMed = input.medicationSchedules.reduce(
      (sum, schedule) => sum + reminderTimesOnDate(schedule, date).length,
      0
    );
    const scheduledFluid = input.fluidSchedule
      ? reminderTimesOnDate(input.fluidSchedule, date).length
      : 0;
    const isToday = time === today;

    if (scheduledMed + scheduledFluid === 0) {
      statuses[key] = isToday ? 'today' : 'none';
      continue;
    }

    const summary = input.summaries[key] ?? null;
    if (!isToday && summary === null) {
      statuses[key] = 'missed';
      continue;
    }

    const medOk = scheduledMed === 0 || (summary?.medicationTotalDoses ?? 0) === scheduledMed;
    const fluidOk = scheduledFluid === 0 || (summary?.fluidSessionCount ?? 0) === scheduledFluid;

    if (medOk && fluidOk) {
      statuses[key] = 'complete';
    } else {
      statuses[key] = isToday ? 'today' : 'missed';
    }
  }

  return statuses;
}
