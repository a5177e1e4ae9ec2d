/**
 * Logging Operation Model
 * Treatment writes queued on the device while Firestore is unreachable.
 * Serialized as JSON in the local key/value store; dates travel as ISO strings.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { DateFieldSchema } from './date-field';
import { FluidSessionSchema } from './fluid-session.model';
import { MedicationSessionSchema } from './medication-session.model';
import { ScheduleSchema } from './schedule.model';

export const OPERATION_TTL_DAYS = 30;

export const OPERATION_STATUSES = ['pending', 'syncing', 'failed'] as const;
export type OperationStatus = (typeof OPERATION_STATUSES)[number];

const BaseOperationSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  petId: z.string().min(1),
  createdAt: DateFieldSchema,
  status: z.enum(OPERATION_STATUSES).default('pending'),
  retryCount: z.number().int().nonnegative().default(0),
  lastError: z.string().optional(),
});

// Set when today's schedules could not be read; the replay reads them again
const schedulesUnavailable = z.boolean().optional();

export const LoggingOperationSchema = z.discriminatedUnion('type', [
  BaseOperationSchema.extend({
    type: z.literal('createMedication'),
    session: MedicationSessionSchema,
    todaysSchedules: z.array(ScheduleSchema),
    recentSessions: z.array(MedicationSessionSchema),
    schedulesUnavailable,
  }),
  BaseOperationSchema.extend({
    type: z.literal('createFluid'),
    session: FluidSessionSchema,
    todaysSchedule: ScheduleSchema.optional(),
    schedulesUnavailable,
  }),
  BaseOperationSchema.extend({
    type: z.literal('updateMedication'),
    oldSession: MedicationSessionSchema,
    newSession: MedicationSessionSchema,
  }),
  BaseOperationSchema.extend({
    type: z.literal('updateFluid'),
    oldSession: FluidSessionSchema,
    newSession: FluidSessionSchema,
  }),
  BaseOperationSchema.extend({
    type: z.literal('quickLogAll'),
    todaysSchedules: z.array(ScheduleSchema),
    schedulesUnavailable,
  }),
]);

export type LoggingOperation = z.infer<typeof LoggingOperationSchema>;
export type LoggingOperationType = LoggingOperation['type'];

export function isOperationExpired(operation: LoggingOperation, now: Date = new Date()): boolean {
  const ttlMs = OPERATION_TTL_DAYS * 24 * 60 * 60 * 1000;
  return now.getTime() - operation.createdAt.getTime() > ttlMs;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Operation as the caller describes it; bookkeeping fields are filled in on creation
 */
export type NewLoggingOperation = DistributiveOmit<
  LoggingOperation,
  'id' | 'createdAt' | 'status' | 'retryCount' | 'lastError'
>;

export function createLoggingOperation(
  input: NewLoggingOperation,
  now: Date = new Date()
): LoggingOperation {
  return { ...input, id: randomUUID(), createdAt: now, status: 'pending', retryCount: 0 };
}

/**
 * Treatment type the operation writes, for logs
 */
export function operationTreatmentType(operation: LoggingOperation): 'medication' | 'fluid' | 'mixed' {
  switch (operation.type) {
    case 'createMedication':
    case 'updateMedication':
      return 'medication';
    case 'createFluid':
    case 'updateFluid':
      return 'fluid';
    case 'quickLogAll':
      return 'mixed';
  }
}
