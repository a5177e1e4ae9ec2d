/**
 * Offline Logging Service
 * Queues treatment writes that could not reach Firestore and replays them later.
 *
 * Each user has their own queue, one JSON array in the local key/value store.
 * Operations older than 30 days are dropped on the next enqueue.
 */

import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import logger from '../../logger';
import {
  LoggingOperationSchema,
  isOperationExpired,
  operationTreatmentType,
} from '../../models/logging-operation.model';
import type { LoggingOperation } from '../../models/logging-operation.model';
import type { Schedule } from '../../models/schedule.model';
import { errorMessage } from '../../utils/error-utils';
import type { KeyValueStore } from '../key-value-store.service';
import { QueueFullException, QueueWarningException, SyncFailedException } from './logging-errors';
import type { LoggingService } from './logging.service';
import type { ScheduleService } from '../schedule/schedule.service';

const log = logger.child({ module: 'offline-logging' });

export const QUEUE_KEY_PREFIX = 'logging_operation_queue_';
export const MAX_QUEUE_SIZE = 200;
export const SOFT_WARNING_THRESHOLD = 50;
export const MAX_RETRIES = 5;
export const RETRY_DELAYS_MS = [1000, 2000, 4000, 8000, 30000];

const QueueSchema = z.array(LoggingOperationSchema);

export function buildQueueKey(userId: string): string {
  return `${QUEUE_KEY_PREFIX}${userId}`;
}

/**
 * The writes an operation can replay
 */
export type OperationExecutor = Pick<
  LoggingService,
  | 'logMedicationSession'
  | 'logFluidSession'
  | 'updateMedicationSession'
  | 'updateFluidSession'
  | 'quickLogAllTreatments'
>;

export type ScheduleSource = Pick<ScheduleService, 'listSchedules'>;

export interface OfflineLoggingOptions {
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  /** Re-reads schedules for operations queued without them */
  schedules?: ScheduleSource;
}

export interface SyncResult {
  successCount: number;
  failureCount: number;
}

export class OfflineLoggingService {
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly schedules?: ScheduleSource;

  constructor(
    private readonly store: KeyValueStore,
    private readonly executor: OperationExecutor,
    options: OfflineLoggingOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.schedules = options.schedules;
  }

  /**
   * Append an operation to its user's queue
   * @throws QueueFullException when the queue is already at its limit (nothing is saved)
   * @throws QueueWarningException after saving, once the queue reaches the warning size
   */
  async enqueueOperation(operation: LoggingOperation): Promise<void> {
    const { userId } = operation;
    const queue = await this.loadQueue(userId);

    if (queue.length >= MAX_QUEUE_SIZE) {
      log.warn(
        { event: 'offline_queue_full', userId, queueSize: queue.length },
        'Offline queue full'
      );
      throw new QueueFullException(queue.length);
    }

    const now = this.now();
    const updated = queue.filter((op) => !isOperationExpired(op, now));
    updated.push(operation);
    await this.saveQueue(userId, updated);

    log.info(
      {
        event: 'offline_logging_queued',
        userId,
        operationId: operation.id,
        type: operation.type,
        treatmentType: operationTreatmentType(operation),
        queueSize: updated.length,
      },
      'Operation queued'
    );

    if (updated.length >= SOFT_WARNING_THRESHOLD) {
      log.warn({ userId, queueSize: updated.length }, 'Offline queue approaching limit');
      throw new QueueWarningException(updated.length);
    }
  }

  async getPendingOperations(userId: string): Promise<LoggingOperation[]> {
    const queue = await this.loadQueue(userId);
    return queue.filter((op) => op.status === 'pending');
  }

  async getFailedOperations(userId: string): Promise<LoggingOperation[]> {
    const queue = await this.loadQueue(userId);
    return queue.filter((op) => op.status === 'failed');
  }

  async getAllOperations(userId: string): Promise<LoggingOperation[]> {
    return this.loadQueue(userId);
  }

  async getQueueSize(userId: string): Promise<number> {
    const queue = await this.loadQueue(userId);
    return queue.length;
  }

  async shouldShowWarning(userId: string): Promise<boolean> {
    return (await this.getQueueSize(userId)) >= SOFT_WARNING_THRESHOLD;
  }

  /**
   * Replay every pending operation of the user in order
   * @throws SyncFailedException when any operation still fails after all retries
   */
  async syncPendingOperations(userId: string): Promise<SyncResult> {
    const startedAt = Date.now();
    const pending = await this.getPendingOperations(userId);

    if (pending.length === 0) {
      return { successCount: 0, failureCount: 0 };
    }

    log.info({ userId, count: pending.length }, 'Syncing pending operations');

    let successCount = 0;
    let failureCount = 0;

    for (const operation of pending) {
      await this.updateOperation(userId, { ...operation, status: 'syncing' });

      if (await this.syncWithRetry(operation)) {
        await this.removeOperation(userId, operation.id);
        successCount++;
      } else {
        await this.markFailed(userId, operation.id);
        failureCount++;
      }
    }

    log.info(
      {
        event: 'offline_sync',
        userId,
        queueSize: pending.length,
        successCount,
        failureCount,
        durationMs: Date.now() - startedAt,
      },
      'Sync complete'
    );

    if (failureCount > 0) {
      log.warn(
        { event: 'offline_sync_failed', userId, failureCount },
        'Some operations failed to sync'
      );
      throw new SyncFailedException(failureCount, 'Max retries exceeded');
    }

    return { successCount, failureCount };
  }

  /**
   * Reset a failed operation and replay it immediately
   * Removed from the queue on success; marked failed again otherwise.
   * @returns false for an unknown id or when the replay fails
   */
  async retryFailedOperation(userId: string, operationId: string): Promise<boolean> {
    const queue = await this.loadQueue(userId);
    const operation = queue.find((op) => op.id === operationId);
    if (!operation) {
      log.warn({ userId, operationId }, 'Retry requested for unknown operation');
      return false;
    }

    const reset: LoggingOperation = { ...operation, status: 'pending', retryCount: 0 };
    await this.updateOperation(userId, reset);

    if (await this.syncWithRetry(reset)) {
      await this.removeOperation(userId, operationId);
      return true;
    }

    await this.markFailed(userId, operationId);
    return false;
  }

  async removeOperation(userId: string, operationId: string): Promise<void> {
    const queue = await this.loadQueue(userId);
    await this.saveQueue(userId, queue.filter((op) => op.id !== operationId));
  }

  async clearAllOperations(userId: string): Promise<void> {
    await this.store.remove(buildQueueKey(userId));
    log.info({ userId }, 'Offline queue cleared');
  }

  /**
   * Up to MAX_RETRIES + 1 attempts; retryCount and lastError are saved after each failure
   */
  private async syncWithRetry(operation: LoggingOperation): Promise<boolean> {
    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      try {
        await this.execute(operation);
        return true;
      } catch (error) {
        const lastError = errorMessage(error);
        log.warn(
          { operationId: operation.id, attempt: attempt + 1, error: lastError },
          'Sync attempt failed'
        );
        await this.patchOperation(operation.userId, operation.id, {
          retryCount: attempt + 1,
          lastError,
        });

        if (attempt < MAX_RETRIES) {
          await this.sleep(RETRY_DELAYS_MS[Math.min(attempt, RETRY_DELAYS_MS.length - 1)]);
        }
      }
    }
    return false;
  }

  private async execute(operation: LoggingOperation): Promise<void> {
    const { userId, petId } = operation;

    switch (operation.type) {
      case 'createMedication':
        await this.executor.logMedicationSession({
          userId,
          petId,
          session: operation.session,
          todaysSchedules: operation.schedulesUnavailable
            ? await this.readSchedules(userId, petId)
            : operation.todaysSchedules,
          recentSessions: operation.recentSessions,
        });
        return;
      case 'createFluid':
        await this.executor.logFluidSession({
          userId,
          petId,
          session: operation.session,
          todaysSchedule: operation.schedulesUnavailable
            ? (await this.readSchedules(userId, petId)).find((s) => s.treatmentType === 'fluid')
            : operation.todaysSchedule,
        });
        return;
      case 'updateMedication':
        await this.executor.updateMedicationSession({
          userId,
          petId,
          oldSession: operation.oldSession,
          newSession: operation.newSession,
        });
        return;
      case 'updateFluid':
        await this.executor.updateFluidSession({
          userId,
          petId,
          oldSession: operation.oldSession,
          newSession: operation.newSession,
        });
        return;
      case 'quickLogAll':
        await this.executor.quickLogAllTreatments(
          userId,
          petId,
          operation.schedulesUnavailable
            ? await this.readSchedules(userId, petId)
            : operation.todaysSchedules
        );
        return;
    }
  }

  private async readSchedules(userId: string, petId: string): Promise<Schedule[]> {
    if (!this.schedules) {
      return [];
    }
    return this.schedules.listSchedules(userId, petId, { activeOnly: true });
  }

  private async markFailed(userId: string, operationId: string): Promise<void> {
    await this.patchOperation(userId, operationId, {
      status: 'failed',
      lastError: 'Max retries exceeded',
    });
  }

  private async patchOperation(
    userId: string,
    operationId: string,
    patch: Partial<Pick<LoggingOperation, 'status' | 'retryCount' | 'lastError'>>
  ): Promise<void> {
    const queue = await this.loadQueue(userId);
    await this.saveQueue(
      userId,
      queue.map((op) => (op.id === operationId ? { ...op, ...patch } : op))
    );
  }

  private async updateOperation(userId: string, operation: LoggingOperation): Promise<void> {
    const queue = await this.loadQueue(userId);
    await this.saveQueue(userId, queue.map((op) => (op.id === operation.id ? operation : op)));
  }

  /**
   * A missing or unreadable queue is treated as empty
   */
  private async loadQueue(userId: string): Promise<LoggingOperation[]> {
    const raw = await this.store.getString(buildQueueKey(userId));
    if (raw === null) {
      return [];
    }

    try {
      const parsed = QueueSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      log.warn(
        { userId, issues: parsed.error.issues.length },
        'Stored offline queue is invalid, ignoring'
      );
    } catch (error) {
      log.warn({ userId, error: errorMessage(error) }, 'Stored offline queue is not JSON, ignoring');
    }
    return [];
  }

  private async saveQueue(userId: string, queue: LoggingOperation[]): Promise<void> {
    await this.store.setString(buildQueueKey(userId), JSON.stringify(queue));
  }
}
