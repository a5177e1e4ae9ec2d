/**
 * Deterministic notification IDs
 *
 * Reminder ids are derived from (user, pet, schedule, time slot, kind) so the same
 * reminder always maps to the same id. Rescheduling replaces instead of duplicating,
 * and a reminder can be cancelled without first looking up its id.
 */

import { formatDate } from '../../utils/date-utils';
import { isValidKind, isValidTimeSlot } from '../../models/scheduled-notification-entry.model';

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

// Platform notification ids are signed 32-bit; keep them non-negative
const ID_MASK = 0x7fffffff;

export interface NotificationIdParams {
  userId: string;
  petId: string;
  scheduleId: string;
  timeSlot: string;
  kind: string;
}

/**
 * 32-bit FNV-1a over the UTF-8 bytes of `input`
 */
export function fnv1a32(input: string, seed: number = FNV_OFFSET_BASIS): number {
  let hash = seed >>> 0;
  for (const byte of Buffer.from(input, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function generateNotificationId(params: NotificationIdParams): number {
  const { userId, petId, scheduleId, timeSlot, kind } = params;

  const required: Array<[keyof NotificationIdParams, string]> = [
    ['userId', userId],
    ['petId', petId],
    ['scheduleId', scheduleId],
    ['timeSlot', timeSlot],
    ['kind', kind],
  ];
  for (const [field, value] of required) {
    if (value.length === 0) {
      throw new Error(`${field} must not be empty`);
    }
  }

  if (!isValidTimeSlot(timeSlot)) {
    throw new Error(`timeSlot must be in "HH:mm" format (00:00 to 23:59), got: "${timeSlot}"`);
  }
  if (!isValidKind(kind)) {
    throw new Error(`kind must be "initial", "followup", or "snooze", got: "${kind}"`);
  }

  const composite = `${userId}|${petId}|${scheduleId}|${timeSlot}|${kind}`;
  return (fnv1a32(composite) & ID_MASK) >>> 0;
}

/**
 * Id of the weekly summary reminder for the week starting on `weekStartDate`
 */
export function generateWeeklySummaryNotificationId(params: {
  userId: string;
  petId: string;
  weekStartDate: Date;
}): number {
  const { userId, petId, weekStartDate } = params;
  if (userId.length === 0) {
    throw new Error('userId must not be empty');
  }
  if (petId.length === 0) {
    throw new Error('petId must not be empty');
  }

  const composite = `${userId}|${petId}|weekly_summary|${formatDate(weekStartDate)}`;
  return (fnv1a32(composite) & ID_MASK) >>> 0;
}

/**
 * Id of the low fluid inventory alert; one per pet, so a new alert replaces the last
 */
export function generateInventoryNotificationId(params: { userId: string; petId: string }): number {
  const { userId, petId } = params;
  if (userId.length === 0) {
    throw new Error('userId must not be empty');
  }
  if (petId.length === 0) {
    throw new Error('petId must not be empty');
  }

  return (fnv1a32(`${userId}|${petId}|inventory_low`) & ID_MASK) >>> 0;
}
