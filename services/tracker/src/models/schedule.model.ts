/**
 * Schedule Model
 * Schema for 'users/{userId}/pets/{petId}/schedules' (medication and fluid treatment plans)
 */

import { z } from 'zod';
import type { DocumentData, Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import {
  FLUID_LOCATIONS,
  SCHEDULES_COLLECTION,
  TREATMENT_FREQUENCIES,
  TREATMENT_TYPES,
  petCollectionPath,
} from '../../../../shared';
import type { TreatmentFrequency } from '../../../../shared';
import { calendarDaysBetween, startOfDay } from '../utils/date-utils';
import { DateFieldSchema, toTimestamp } from './date-field';

export const ScheduleSchema = z.object({
  id: z.string().min(1),
  treatmentType: z.enum(TREATMENT_TYPES),
  frequency: z.enum(TREATMENT_FREQUENCIES),
  reminderTimes: z.array(DateFieldSchema),
  isActive: z.boolean().default(true),
  createdAt: DateFieldSchema,
  updatedAt: DateFieldSchema,

  // Fluid therapy
  targetVolume: z.number().optional(), // ml
  preferredLocation: z.enum(FLUID_LOCATIONS).optional(),
  needleGauge: z.string().optional(),

  // Medication
  medicationName: z.string().optional(),
  targetDosage: z.number().optional(),
  medicationUnit: z.string().optional(), // e.g. "pills", "ml"
  medicationStrengthAmount: z.string().optional(), // e.g. "2.5"
  medicationStrengthUnit: z.string().optional(), // e.g. "mg", "other"
  customMedicationStrengthUnit: z.string().optional(),
});

export type Schedule = z.infer<typeof ScheduleSchema>;

/**
 * Client-supplied fields; id and timestamps are assigned on create
 */
export const ScheduleInputSchema = ScheduleSchema.omit({ id: true, createdAt: true, updatedAt: true });
export type ScheduleInput = z.infer<typeof ScheduleInputSchema>;

export const ScheduleUpdateSchema = ScheduleInputSchema.partial().strict();
export type ScheduleUpdate = z.infer<typeof ScheduleUpdateSchema>;

const INTERVAL_DAYS: Partial<Record<TreatmentFrequency, number>> = {
  everyOtherDay: 2,
  every3Days: 3,
};

/**
 * Reminder times that fall on `date`, as local date-times on that day
 * Interval schedules count days from the schedule's creation day.
 */
export function reminderTimesOnDate(schedule: Schedule, date: Date): Date[] {
  const day = startOfDay(date);
  const interval = INTERVAL_DAYS[schedule.frequency];

  if (interval !== undefined) {
    const daysSinceCreated = calendarDaysBetween(startOfDay(schedule.createdAt), day);
    if (daysSinceCreated < 0 || daysSinceCreated % interval !== 0) {
      return [];
    }
  }

  return schedule.reminderTimes.map(
    (reminder) =>
      new Date(
        day.getFullYear(),
        day.getMonth(),
        day.getDate(),
        reminder.getHours(),
        reminder.getMinutes(),
        reminder.getSeconds(),
        reminder.getMilliseconds()
      )
  );
}

export function hasReminderOnDate(schedule: Schedule, date: Date): boolean {
  return reminderTimesOnDate(schedule, date).length > 0;
}

/**
 * A schedule is usable once its type-specific fields are filled in
 */
export function isScheduleValid(schedule: Schedule): boolean {
  if (schedule.reminderTimes.length === 0) {
    return false;
  }

  if (schedule.treatmentType === 'fluid') {
    return (
      schedule.targetVolume !== undefined &&
      schedule.targetVolume > 0 &&
      schedule.preferredLocation !== undefined &&
      schedule.needleGauge !== undefined
    );
  }

  return (
    schedule.medicationName !== undefined &&
    schedule.medicationName.length > 0 &&
    schedule.targetDosage !== undefined &&
    schedule.targetDosage > 0 &&
    schedule.medicationUnit !== undefined
  );
}

/**
 * Firestore document data (id lives in the document path)
 */
export function scheduleToFirestore(schedule: Schedule): DocumentData {
  const { id: _id, reminderTimes, createdAt, updatedAt, ...rest } = schedule;
  return {
    ...rest,
    reminderTimes: reminderTimes.map(toTimestamp),
    createdAt: toTimestamp(createdAt),
    updatedAt: toTimestamp(updatedAt),
  };
}

/**
 * Firestore converter for type-safe reads/writes
 */
export const scheduleConverter = {
  toFirestore: (schedule: Schedule): DocumentData => scheduleToFirestore(schedule),
  fromFirestore: (snapshot: QueryDocumentSnapshot): Schedule =>
    ScheduleSchema.parse({ ...snapshot.data(), id: snapshot.id }),
};

/**
 * Collection reference with type safety
 */
export function getSchedulesCollection(db: Firestore, userId: string, petId: string) {
  return db
    .collection(petCollectionPath(userId, petId, SCHEDULES_COLLECTION))
    .withConverter(scheduleConverter);
}
