/**
 * Date fields
 * Stored in Firestore as Timestamp, sent over JSON as ISO strings, surfaced as Date
 */

import { z } from 'zod';
import { Timestamp } from '@google-cloud/firestore';

function isTimestampLike(value: unknown): value is Timestamp {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toDate' in value &&
    typeof value.toDate === 'function'
  );
}

function isDateInput(value: unknown): value is Date | Timestamp | string {
  if (value instanceof Date) {
    return !Number.isNaN(value.getTime());
  }
  if (typeof value === 'string') {
    return !Number.isNaN(Date.parse(value));
  }
  return isTimestampLike(value);
}

export const DateFieldSchema = z
  .custom<Date | Timestamp | string>(isDateInput, { message: 'Expected a date' })
  .transform((value) => {
    if (value instanceof Date) {
      return value;
    }
    return typeof value === 'string' ? new Date(value) : value.toDate();
  });

export function toTimestamp(date: Date): Timestamp {
  return Timestamp.fromDate(date);
}

export function toOptionalTimestamp(date: Date | undefined): Timestamp | undefined {
  return date ? Timestamp.fromDate(date) : undefined;
}
