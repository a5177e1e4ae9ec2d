/**
 * Medication Session Model
 * Schema for 'users/{userId}/pets/{petId}/medicationSessions' (one logged dose)
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { DocumentData, Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { MEDICATION_SESSIONS_COLLECTION, petCollectionPath } from '../../../../shared';
import { DateFieldSchema, toOptionalTimestamp, toTimestamp } from './date-field';
import type { Schedule } from './schedule.model';

export const MAX_REASONABLE_DOSAGE = 100;

export const MedicationSessionSchema = z.object({
  id: z.string(),
  petId: z.string(),
  userId: z.string(),
  dateTime: DateFieldSchema,

  medicationName: z.string(),
  dosageGiven: z.number(),
  dosageScheduled: z.number(),
  medicationUnit: z.string(),
  medicationStrengthAmount: z.string().optional(),
  medicationStrengthUnit: z.string().optional(),
  customMedicationStrengthUnit: z.string().optional(),

  completed: z.boolean(),
  notes: z.string().optional(),

  // Set when the dose was matched to a schedule reminder
  scheduleId: z.string().optional(),
  scheduledTime: DateFieldSchema.optional(),

  createdAt: DateFieldSchema,
  syncedAt: DateFieldSchema.optional(),
  updatedAt: DateFieldSchema.optional(),
});

export type MedicationSession = z.infer<typeof MedicationSessionSchema>;

/**
 * Fields a caller supplies when logging a dose; ids, owner and timestamps are filled in server-side
 */
export const MedicationSessionInputSchema = MedicationSessionSchema.omit({
  id: true,
  petId: true,
  userId: true,
  scheduleId: true,
  scheduledTime: true,
  createdAt: true,
  syncedAt: true,
  updatedAt: true,
});

export type MedicationSessionInput = z.infer<typeof MedicationSessionInputSchema>;

export const MedicationSessionUpdateSchema = MedicationSessionInputSchema.partial().strict();

export type MedicationSessionUpdate = z.infer<typeof MedicationSessionUpdateSchema>;

/**
 * Structural checks; an empty list means the session can be saved
 */
export function validateMedicationSession(
  session: MedicationSession,
  now: Date = new Date()
): string[] {
  const errors: string[] = [];

  if (session.id.length === 0) errors.push('Session ID is required');
  if (session.petId.length === 0) errors.push('Pet ID is required');
  if (session.userId.length === 0) errors.push('User ID is required');
  if (session.medicationName.length === 0) errors.push('Medication name is required');
  if (session.medicationUnit.length === 0) errors.push('Medication unit is required');

  if (session.dosageGiven < 0) errors.push('Dosage given cannot be negative');
  if (session.dosageScheduled <= 0) errors.push('Dosage scheduled must be greater than 0');
  if (session.dosageGiven > MAX_REASONABLE_DOSAGE) {
    errors.push('Dosage given seems unrealistically high (over 100)');
  }

  if (session.dateTime.getTime() > now.getTime()) {
    errors.push('Treatment time cannot be in the future');
  }

  if (
    session.medicationStrengthUnit === 'other' &&
    (session.customMedicationStrengthUnit === undefined ||
      session.customMedicationStrengthUnit.length === 0)
  ) {
    errors.push('Custom strength unit is required when strength unit is "other"');
  }

  return errors;
}

export function adherencePercentage(session: MedicationSession): number {
  return session.dosageScheduled > 0 ? (session.dosageGiven / session.dosageScheduled) * 100 : 0;
}

export function isFullDose(session: MedicationSession): boolean {
  return session.dosageGiven >= session.dosageScheduled;
}

export function isPartialDose(session: MedicationSession): boolean {
  return session.dosageGiven > 0 && session.dosageGiven < session.dosageScheduled;
}

export function isMissed(session: MedicationSession): boolean {
  return session.dosageGiven === 0 || !session.completed;
}

export interface MedicationFromScheduleParams {
  schedule: Schedule;
  scheduledTime: Date;
  petId: string;
  userId: string;
  actualDateTime?: Date;
  actualDosage?: number;
  wasCompleted?: boolean;
  notes?: string;
  now?: Date;
}

/**
 * Session pre-filled from a medication schedule; the dose defaults to the target
 */
export function medicationSessionFromSchedule(params: MedicationFromScheduleParams): MedicationSession {
  const { schedule } = params;
  if (
    schedule.medicationName === undefined ||
    schedule.targetDosage === undefined ||
    schedule.medicationUnit === undefined
  ) {
    throw new Error(`Schedule ${schedule.id} is missing medication details`);
  }

  return {
    id: randomUUID(),
    petId: params.petId,
    userId: params.userId,
    dateTime: params.actualDateTime ?? params.scheduledTime,
    medicationName: schedule.medicationName,
    dosageGiven: params.actualDosage ?? schedule.targetDosage,
    dosageScheduled: schedule.targetDosage,
    medicationUnit: schedule.medicationUnit,
    medicationStrengthAmount: schedule.medicationStrengthAmount,
    medicationStrengthUnit: schedule.medicationStrengthUnit,
    customMedicationStrengthUnit: schedule.customMedicationStrengthUnit,
    completed: params.wasCompleted ?? true,
    notes: params.notes,
    scheduleId: schedule.id,
    scheduledTime: params.scheduledTime,
    createdAt: params.now ?? new Date(),
  };
}

export function medicationSessionToFirestore(session: MedicationSession): DocumentData {
  return {
    ...session,
    dateTime: toTimestamp(session.dateTime),
    scheduledTime: toOptionalTimestamp(session.scheduledTime),
    createdAt: toTimestamp(session.createdAt),
    syncedAt: toOptionalTimestamp(session.syncedAt),
    updatedAt: toOptionalTimestamp(session.updatedAt),
  };
}

/**
 * Firestore converter for type-safe reads/writes
 */
export const medicationSessionConverter = {
  toFirestore: (session: MedicationSession): DocumentData => medicationSessionToFirestore(session),
  fromFirestore: (snapshot: QueryDocumentSnapshot): MedicationSession =>
    MedicationSessionSchema.parse(snapshot.data()),
};

export function getMedicationSessionsCollection(db: Firestore, userId: string, petId: string) {
  return db
    .collection(petCollectionPath(userId, petId, MEDICATION_SESSIONS_COLLECTION))
    .withConverter(medicationSessionConverter);
}
