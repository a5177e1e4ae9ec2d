/**
 * Treatment logging errors
 * Each error carries a `userMessage` safe to show as-is; `message` is for logs.
 */

import type { MedicationSession } from '../../models/medication-session.model';

export class LoggingException extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'LoggingException';
    this.code = code;
  }

  get userMessage(): string {
    return 'Something went wrong. Please try again.';
  }
}

export interface DuplicateSessionDetails {
  sessionType: 'medication' | 'fluid';
  conflictingTime: Date;
  medicationName?: string;
  existingSession?: MedicationSession;
}

export class DuplicateSessionException extends LoggingException {
  readonly sessionType: 'medication' | 'fluid';
  readonly conflictingTime: Date;
  readonly medicationName?: string;
  readonly existingSession?: MedicationSession;

  constructor(details: DuplicateSessionDetails) {
    super('Duplicate session detected', 'duplicate_session');
    this.name = 'DuplicateSessionException';
    this.sessionType = details.sessionType;
    this.conflictingTime = details.conflictingTime;
    this.medicationName = details.medicationName;
    this.existingSession = details.existingSession;
  }

  get userMessage(): string {
    return "You've already logged this treatment today. Would you like to update it instead?";
  }
}

export class SessionValidationException extends LoggingException {
  constructor(readonly errors: string[]) {
    super('Session validation failed', 'validation_failed');
    this.name = 'SessionValidationException';
  }

  get userMessage(): string {
    return this.errors[0] ?? 'Please check your entries and try again.';
  }
}

export class ScheduleMatchException extends LoggingException {
  constructor(message: string) {
    super(message, 'schedule_match_failed');
    this.name = 'ScheduleMatchException';
  }

  get userMessage(): string {
    return "We couldn't find a matching schedule. Logging as a one-time entry.";
  }
}

export class BatchWriteException extends LoggingException {
  constructor(
    readonly operation: string,
    reason: string
  ) {
    super(`Batch write failed during ${operation}: ${reason}`, 'batch_write_failed');
    this.name = 'BatchWriteException';
  }

  get userMessage(): string {
    return 'Unable to save right now. Your data is saved offline and will sync automatically.';
  }
}

export class OfflineLoggingException extends LoggingException {
  constructor() {
    super('Operation queued for sync', 'queued_offline');
    this.name = 'OfflineLoggingException';
  }

  get userMessage(): string {
    return 'Logged successfully! Will sync when you are back online.';
  }
}

export class SyncFailedException extends LoggingException {
  constructor(
    readonly failedCount: number,
    readonly lastError?: string
  ) {
    super('Sync operation failed', 'sync_failed');
    this.name = 'SyncFailedException';
  }

  get userMessage(): string {
    const plural = this.failedCount > 1 ? 's' : '';
    return `${this.failedCount} treatment${plural} could not sync. Check your connection and tap retry.`;
  }
}

export class QueueWarningException extends LoggingException {
  constructor(readonly queueSize: number) {
    super('Offline queue approaching limit', 'queue_warning');
    this.name = 'QueueWarningException';
  }

  get userMessage(): string {
    return `You have ${this.queueSize} treatments waiting to sync. Connect to internet soon to avoid data loss.`;
  }
}

export class QueueFullException extends LoggingException {
  constructor(readonly queueSize: number) {
    super('Offline queue full', 'queue_full');
    this.name = 'QueueFullException';
  }

  get userMessage(): string {
    return `Too many treatments waiting to sync (${this.queueSize}). Please connect to internet to free up space.`;
  }
}
