/**
 * Fluid Session Model
 * Schema for 'users/{userId}/pets/{petId}/fluidSessions' (one subcutaneous fluid treatment)
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { DocumentData, Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import {
  FLUID_LOCATIONS,
  FLUID_SESSIONS_COLLECTION,
  STRESS_LEVELS,
  petCollectionPath,
} from '../../../../shared';
import type { FluidLocation } from '../../../../shared';
import { DateFieldSchema, toOptionalTimestamp, toTimestamp } from './date-field';
import type { Schedule } from './schedule.model';

export const MIN_FLUID_VOLUME_ML = 1;
export const MAX_FLUID_VOLUME_ML = 500;

export const FluidSessionSchema = z.object({
  id: z.string(),
  petId: z.string(),
  userId: z.string(),
  dateTime: DateFieldSchema,

  volumeGiven: z.number(), // ml
  injectionSite: z.enum(FLUID_LOCATIONS).optional(),
  // Kept as a plain string so a bad value reaches validation instead of failing the parse
  stressLevel: z.string().optional(),
  notes: z.string().optional(),

  scheduleId: z.string().optional(),
  scheduledTime: DateFieldSchema.optional(),

  createdAt: DateFieldSchema,
  syncedAt: DateFieldSchema.optional(),
  updatedAt: DateFieldSchema.optional(),
});

export type FluidSession = z.infer<typeof FluidSessionSchema>;

export const FluidSessionInputSchema = FluidSessionSchema.omit({
  id: true,
  petId: true,
  userId: true,
  scheduleId: true,
  scheduledTime: true,
  createdAt: true,
  syncedAt: true,
  updatedAt: true,
});

export type FluidSessionInput = z.infer<typeof FluidSessionInputSchema>;

export const FluidSessionUpdateSchema = FluidSessionInputSchema.partial().strict();

export type FluidSessionUpdate = z.infer<typeof FluidSessionUpdateSchema>;

export function validateFluidSession(session: FluidSession, now: Date = new Date()): string[] {
  const errors: string[] = [];

  if (session.id.length === 0) errors.push('Session ID is required');
  if (session.petId.length === 0) errors.push('Pet ID is required');
  if (session.userId.length === 0) errors.push('User ID is required');

  if (session.volumeGiven <= 0) {
    errors.push('Volume must be greater than 0');
  } else if (session.volumeGiven < MIN_FLUID_VOLUME_ML) {
    errors.push('Volume must be at least 1ml');
  } else if (session.volumeGiven > MAX_FLUID_VOLUME_ML) {
    errors.push('Volume must be 500ml or less');
  }

  if (
    session.stressLevel !== undefined &&
    !(STRESS_LEVELS as readonly string[]).includes(session.stressLevel)
  ) {
    errors.push('Stress level must be "low", "medium", or "high"');
  }

  if (session.dateTime.getTime() > now.getTime()) {
    errors.push('Treatment time cannot be in the future');
  }

  return errors;
}

export interface FluidFromScheduleParams {
  schedule: Schedule;
  scheduledTime: Date;
  petId: string;
  userId: string;
  actualDateTime?: Date;
  actualVolume?: number;
  actualInjectionSite?: FluidLocation;
  stressLevel?: string;
  notes?: string;
  now?: Date;
}

/**
 * Session pre-filled from a fluid schedule; the volume defaults to the target
 */
export function fluidSessionFromSchedule(params: FluidFromScheduleParams): FluidSession {
  const { schedule } = params;
  if (schedule.targetVolume === undefined) {
    throw new Error(`Schedule ${schedule.id} is missing a target volume`);
  }

  return {
    id: randomUUID(),
    petId: params.petId,
    userId: params.userId,
    dateTime: params.actualDateTime ?? params.scheduledTime,
    volumeGiven: params.actualVolume ?? schedule.targetVolume,
    injectionSite: params.actualInjectionSite ?? schedule.preferredLocation,
    stressLevel: params.stressLevel,
    notes: params.notes,
    scheduleId: schedule.id,
    scheduledTime: params.scheduledTime,
    createdAt: params.now ?? new Date(),
  };
}

export function fluidSessionToFirestore(session: FluidSession): DocumentData {
  return {
    ...session,
    dateTime: toTimestamp(session.dateTime),
    scheduledTime: toOptionalTimestamp(session.scheduledTime),
    createdAt: toTimestamp(session.createdAt),
    syncedAt: toOptionalTimestamp(session.syncedAt),
    updatedAt: toOptionalTimestamp(session.updatedAt),
  };
}

export const fluidSessionConverter = {
  toFirestore: (session: FluidSession): DocumentData => fluidSessionToFirestore(session),
  fromFirestore: (snapshot: QueryDocumentSnapshot): FluidSession =>
    FluidSessionSchema.parse(snapshot.data()),
};

export function getFluidSessionsCollection(db: Firestore, userId: string, petId: string) {
  return db
    .collection(petCollectionPath(userId, petId, FLUID_SESSIONS_COLLECTION))
    .withConverter(fluidSessionConverter);
}
