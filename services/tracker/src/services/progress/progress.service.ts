/**
 * Progress Service
 * Loads a week's schedules and daily summaries for the progress calendar
 */

import type { Firestore } from '@google-cloud/firestore';
import { summaryDocPath } from '../../../../../shared';
import logger from '../../logger';
import { dailySummaryConverter } from '../../models/daily-summary.model';
import type { DailySummary } from '../../models/daily-summary.model';
import { addDays, formatDate, startOfDay } from '../../utils/date-utils';
import type { ScheduleService } from '../schedule/schedule.service';
import { computeWeekStatusesMemoized } from './week-status-memo';
import type { WeekStatuses } from './week-status';

export type ScheduleReader = Pick<ScheduleService, 'listSchedules'>;

export class ProgressService {
  private readonly log = logger.child({ module: 'progress' });

  constructor(
    private readonly db: Firestore,
    private readonly schedules: ScheduleReader,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getWeekStatuses(
    userId: string,
    petId: string,
    weekStart: Date,
    trackingStartDate?: Date
  ): Promise<WeekStatuses> {
    const start = startOfDay(weekStart);
    const [schedules, summaries] = await Promise.all([
      this.schedules.listSchedules(userId, petId, { activeOnly: true }),
      this.loadDailySummaries(userId, petId, start),
    ]);

    const statuses = computeWeekStatusesMemoized({
      weekStart: start,
      medicationSchedules: schedules.filter((s) => s.treatmentType === 'medication'),
      fluidSchedule: schedules.find((s) => s.treatmentType === 'fluid') ?? null,
      summaries,
      now: this.now(),
      trackingStartDate: trackingStartDate ?? null,
    });

    this.log.debug({ userId, petId, weekStart: formatDate(start) }, 'Computed week statuses');
    return statuses;
  }

  private async loadDailySummaries(
    userId: string,
    petId: string,
    weekStart: Date
  ): Promise<Record<string, DailySummary | null>> {
    const days = Array.from({ length: 7 }, (_, i) => formatDate(addDays(weekStart, i)));
    const snapshots = await Promise.all(
      days.map((day) =>
        this.db
          .doc(summaryDocPath(userId, petId, 'daily', day))
          .withConverter(dailySummaryConverter)
          .get()
      )
    );

    const summaries: Record<string, DailySummary | null> = {};
    days.forEach((day, i) => {
      summaries[day] = snapshots[i].data() ?? null;
    });
    return summaries;
  }
}
