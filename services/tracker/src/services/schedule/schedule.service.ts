/**
 * Schedule Service
 * CRUD for a pet's medication and fluid schedules
 */

import { randomUUID } from 'crypto';
import type { Firestore, Query } from '@google-cloud/firestore';
import logger from '../../logger';
import {
  getSchedulesCollection,
  hasReminderOnDate,
  isScheduleValid,
} from '../../models/schedule.model';
import type { Schedule, ScheduleInput, ScheduleUpdate } from '../../models/schedule.model';

export class ScheduleValidationException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScheduleValidationException';
  }

  get userMessage(): string {
    return this.message;
  }
}

function assertComplete(schedule: Schedule): void {
  if (!isScheduleValid(schedule)) {
    const required =
      schedule.treatmentType === 'fluid'
        ? 'a target volume, injection site, needle gauge and at least one reminder time'
        : 'a medication name, dosage, unit and at least one reminder time';
    throw new ScheduleValidationException(`A ${schedule.treatmentType} schedule needs ${required}.`);
  }
}

export interface ListSchedulesOptions {
  activeOnly?: boolean;
}

export class ScheduleService {
  private readonly log = logger.child({ module: 'schedule' });

  constructor(
    private readonly db: Firestore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listSchedules(
    userId: string,
    petId: string,
    options: ListSchedulesOptions = {}
  ): Promise<Schedule[]> {
    const collection = getSchedulesCollection(this.db, userId, petId);
    const query: Query<Schedule> = options.activeOnly
      ? collection.where('isActive', '==', true)
      : collection;

    const snapshot = await query.get();
    return snapshot.docs.map((doc) => doc.data());
  }

  /**
   * Active schedules with at least one reminder today
   */
  async getTodaysSchedules(userId: string, petId: string): Promise<Schedule[]> {
    const today = this.now();
    const schedules = await this.listSchedules(userId, petId, { activeOnly: true });
    return schedules.filter((schedule) => hasReminderOnDate(schedule, today));
  }

  async getSchedule(userId: string, petId: string, scheduleId: string): Promise<Schedule | null> {
    const snapshot = await getSchedulesCollection(this.db, userId, petId).doc(scheduleId).get();
    return snapshot.data() ?? null;
  }

  async createSchedule(userId: string, petId: string, input: ScheduleInput): Promise<Schedule> {
    const now = this.now();
    const schedule: Schedule = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
    assertComplete(schedule);

    await getSchedulesCollection(this.db, userId, petId).doc(schedule.id).set(schedule);

    this.log.info(
      { userId, petId, scheduleId: schedule.id, treatmentType: schedule.treatmentType },
      'Schedule created'
    );
    return schedule;
  }

  /**
   * @returns the updated schedule, or null when it does not exist
   */
  async updateSchedule(
    userId: string,
    petId: string,
    scheduleId: string,
    update: ScheduleUpdate
  ): Promise<Schedule | null> {
    const existing = await this.getSchedule(userId, petId, scheduleId);
    if (!existing) {
      return null;
    }

    const schedule: Schedule = { ...existing, ...update, updatedAt: this.now() };
    assertComplete(schedule);

    await getSchedulesCollection(this.db, userId, petId).doc(scheduleId).set(schedule);

    this.log.info({ userId, petId, scheduleId }, 'Schedule updated');
    return schedule;
  }

  /**
   * @returns false when the schedule does not exist
   */
  async deleteSchedule(userId: string, petId: string, scheduleId: string): Promise<boolean> {
    const ref = getSchedulesCollection(this.db, userId, petId).doc(scheduleId);
    const snapshot = await ref.get();
    if (!snapshot.exists) {
      return false;
    }

    await ref.delete();
    this.log.info({ userId, petId, scheduleId }, 'Schedule deleted');
    return true;
  }
}
