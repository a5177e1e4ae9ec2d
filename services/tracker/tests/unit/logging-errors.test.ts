/**
 * Logging error messages
 */

import {
  BatchWriteException,
  LoggingException,
  OfflineLoggingException,
  QueueWarningException,
  ScheduleMatchException,
  SessionValidationException,
  SyncFailedException,
} from '../../src/services/logging/logging-errors';

describe('logging errors', () => {
  it('should keep the log message apart from the user message', () => {
    const error = new BatchWriteException('logFluidSession', 'deadline exceeded');

    expect(error).toBeInstanceOf(LoggingException);
    expect(error.message).toBe('Batch write failed during logFluidSession: deadline exceeded');
    expect(error.code).toBe('batch_write_failed');
    expect(error.userMessage).toBe(
      'Unable to save right now. Your data is saved offline and will sync automatically.'
    );
  });

  it('should show the first validation error, or a generic prompt', () => {
    expect(new SessionValidationException(['Volume must be 500ml or less']).userMessage).toBe(
      'Volume must be 500ml or less'
    );
    expect(new SessionValidationException([]).userMessage).toBe(
      'Please check your entries and try again.'
    );
  });

  it('should pluralize only above one failed treatment', () => {
    expect(new SyncFailedException(1).userMessage).toBe(
      '1 treatment could not sync. Check your connection and tap retry.'
    );
    expect(new SyncFailedException(3, 'unavailable').userMessage).toBe(
      '3 treatments could not sync. Check your connection and tap retry.'
    );
  });

  it('should carry the queue size into the warning', () => {
    expect(new QueueWarningException(50).userMessage).toBe(
      'You have 50 treatments waiting to sync. Connect to internet soon to avoid data loss.'
    );
  });

  it('should describe schedule matching and offline outcomes', () => {
    const match = new ScheduleMatchException('No reminder within two hours');

    expect(match.message).toBe('No reminder within two hours');
    expect(match.userMessage).toBe(
      "We couldn't find a matching schedule. Logging as a one-time entry."
    );
    const offline = new OfflineLoggingException();
    expect(offline.message).toBe('Operation queued for sync');
    expect(offline.code).toBe('queued_offline');
    expect(offline.userMessage).toBe('Logged successfully! Will sync when you are back online.');
  });
});
