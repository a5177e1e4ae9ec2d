/**
 * Logging Controller
 * Treatment logging endpoints. A write that cannot reach Firestore, or whose
 * schedules cannot be read, is queued offline and answered with 202; a logged
 * treatment clears its pending reminders, and a logged fluid session draws
 * from the fluid inventory.
 */

import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import {
  FluidSessionInputSchema,
  FluidSessionUpdateSchema,
  MedicationSessionInputSchema,
  MedicationSessionUpdateSchema,
  createLoggingOperation,
} from '../models';
import type {
  FluidSession,
  MedicationSession,
  NewLoggingOperation,
  Schedule,
} from '../models';
import {
  BatchWriteException,
  OfflineLoggingException,
  QueueWarningException,
} from '../services/logging/logging-errors';
import type { LoggingException } from '../services/logging/logging-errors';
import { matchFluidSchedule, matchMedicationSchedule } from '../services/logging/logging.service';
import type { InventoryService } from '../services/inventory/inventory.service';
import type { LoggingService, ScheduleMatch } from '../services/logging/logging.service';
import type { OfflineLoggingService } from '../services/logging/offline-logging.service';
import type { ReminderService } from '../services/notifications/reminder.service';
import type { ScheduleService } from '../services/schedule/schedule.service';
import { formatTimeSlot } from '../utils/date-utils';
import { errorMessage } from '../utils/error-utils';
import { PetParamsSchema, parseBody, parseParams, sendError } from '../utils/http-utils';
import type { PetParams } from '../utils/http-utils';

const log = logger.child({ module: 'logging-controller' });

const SessionParamsSchema = PetParamsSchema.extend({ sessionId: z.string().min(1) });

export interface LoggingControllerDeps {
  logging: LoggingService;
  schedules: ScheduleService;
  offline: OfflineLoggingService;
  reminders: ReminderService;
  inventory: InventoryService;
  now?: () => Date;
}

export class LoggingController {
  private readonly logging: LoggingService;
  private readonly schedules: ScheduleService;
  private readonly offline: OfflineLoggingService;
  private readonly reminders: ReminderService;
  private readonly inventory: InventoryService;
  private readonly now: () => Date;

  constructor(deps: LoggingControllerDeps) {
    this.logging = deps.logging;
    this.schedules = deps.schedules;
    this.offline = deps.offline;
    this.reminders = deps.reminders;
    this.inventory = deps.inventory;
    this.now = deps.now ?? (() => new Date());
  }

  logMedication = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(MedicationSessionInputSchema, req, res);
    if (!params || !body) return;

    const { userId, petId } = params;
    const now = this.now();
    const session: MedicationSession = { ...body, id: randomUUID(), userId, petId, createdAt: now };

    const todaysSchedules = await this.readTodaysSchedules(params);
    if (!todaysSchedules) {
      await this.queueOffline(res, new OfflineLoggingException(), {
        type: 'createMedication',
        userId,
        petId,
        session,
        todaysSchedules: [],
        recentSessions: [],
        schedulesUnavailable: true,
      });
      return;
    }

    let recentSessions: MedicationSession[] = [];
    try {
      recentSessions = await this.logging.getTodaysMedicationSessions(
        userId,
        petId,
        session.medicationName
      );

      const id = await this.logging.logMedicationSession({
        userId,
        petId,
        session,
        todaysSchedules,
        recentSessions,
      });
      const match = matchMedicationSchedule(session, todaysSchedules);
      await this.cancelMatchedSlot(params, match);

      res.status(StatusCodes.CREATED).json({ id, ...match });
    } catch (error) {
      if (error instanceof BatchWriteException) {
        await this.queueOffline(res, error, {
          type: 'createMedication',
          userId,
          petId,
          session,
          todaysSchedules,
          recentSessions,
        });
        return;
      }
      sendError(res, error, 'log medication session', log);
    }
  };

  updateMedication = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(SessionParamsSchema, req, res);
    const body = params && parseBody(MedicationSessionUpdateSchema, req, res);
    if (!params || !body) return;

    const { userId, petId, sessionId } = params;
    let oldSession: MedicationSession | null = null;
    let newSession: MedicationSession | null = null;

    try {
      oldSession = await this.logging.getMedicationSession(userId, petId, sessionId);
      if (!oldSession) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Medication session not found' });
        return;
      }

      newSession = { ...oldSession, ...body };
      await this.logging.updateMedicationSession({ userId, petId, oldSession, newSession });
      res.status(StatusCodes.OK).json({ session: newSession });
    } catch (error) {
      if (error instanceof BatchWriteException && oldSession && newSession) {
        await this.queueOffline(res, error, {
          type: 'updateMedication',
          userId,
          petId,
          oldSession,
          newSession,
        });
        return;
      }
      sendError(res, error, 'update medication session', log);
    }
  };

  logFluid = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(FluidSessionInputSchema, req, res);
    if (!params || !body) return;

    const { userId, petId } = params;
    const now = this.now();
    const session: FluidSession = { ...body, id: randomUUID(), userId, petId, createdAt: now };

    const schedules = await this.readTodaysSchedules(params);
    if (!schedules) {
      await this.queueOffline(res, new OfflineLoggingException(), {
        type: 'createFluid',
        userId,
        petId,
        session,
        schedulesUnavailable: true,
      });
      return;
    }
    const todaysSchedule = schedules.find((schedule) => schedule.treatmentType === 'fluid');

    try {
      const id = await this.logging.logFluidSession({ userId, petId, session, todaysSchedule });
      const match = matchFluidSchedule(session, todaysSchedule ? [todaysSchedule] : []);
      await this.cancelMatchedSlot(params, match);
      await this.drawFromInventory(params, session, schedules);

      res.status(StatusCodes.CREATED).json({ id, ...match });
    } catch (error) {
      if (error instanceof BatchWriteException) {
        await this.queueOffline(res, error, {
          type: 'createFluid',
          userId,
          petId,
          session,
          todaysSchedule,
        });
        return;
      }
      sendError(res, error, 'log fluid session', log);
    }
  };

  updateFluid = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(SessionParamsSchema, req, res);
    const body = params && parseBody(FluidSessionUpdateSchema, req, res);
    if (!params || !body) return;

    const { userId, petId, sessionId } = params;
    let oldSession: FluidSession | null = null;
    let newSession: FluidSession | null = null;

    try {
      oldSession = await this.logging.getFluidSession(userId, petId, sessionId);
      if (!oldSession) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Fluid session not found' });
        return;
      }

      newSession = { ...oldSession, ...body };
      await this.logging.updateFluidSession({ userId, petId, oldSession, newSession });
      await this.drawFromInventory(params, newSession, null, oldSession);
      res.status(StatusCodes.OK).json({ session: newSession });
    } catch (error) {
      if (error instanceof BatchWriteException && oldSession && newSession) {
        await this.queueOffline(res, error, {
          type: 'updateFluid',
          userId,
          petId,
          oldSession,
          newSession,
        });
        return;
      }
      sendError(res, error, 'update fluid session', log);
    }
  };

  quickLog = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    const { userId, petId } = params;

    const todaysSchedules = await this.readTodaysSchedules(params);
    if (!todaysSchedules) {
      await this.queueOffline(res, new OfflineLoggingException(), {
        type: 'quickLogAll',
        userId,
        petId,
        todaysSchedules: [],
        schedulesUnavailable: true,
      });
      return;
    }

    try {
      const sessionCount = await this.logging.quickLogAllTreatments(userId, petId, todaysSchedules);

      for (const schedule of todaysSchedules) {
        await this.reminders.cancelForSchedule(userId, petId, schedule.id);
      }

      res.status(StatusCodes.CREATED).json({ sessionCount });
    } catch (error) {
      if (error instanceof BatchWriteException) {
        await this.queueOffline(res, error, { type: 'quickLogAll', userId, petId, todaysSchedules });
        return;
      }
      sendError(res, error, 'quick-log treatments', log);
    }
  };

  /**
   * Today's schedules, or null when they cannot be read and the write should go offline
   */
  private async readTodaysSchedules(params: PetParams): Promise<Schedule[] | null> {
    try {
      return await this.schedules.getTodaysSchedules(params.userId, params.petId);
    } catch (error) {
      log.warn(
        { userId: params.userId, petId: params.petId, error: errorMessage(error) },
        'Schedules unavailable, queueing offline'
      );
      return null;
    }
  }

  private async cancelMatchedSlot(params: PetParams, match: ScheduleMatch): Promise<void> {
    if (match.scheduleId === undefined || match.scheduledTime === undefined) {
      return;
    }
    await this.reminders.cancelSlot(
      params.userId,
      params.petId,
      match.scheduleId,
      formatTimeSlot(match.scheduledTime)
    );
  }

  /**
   * The session is already saved, so a failure here is logged rather than answered
   * @param schedules - today's schedules, read again when null
   */
  private async drawFromInventory(
    params: PetParams,
    session: FluidSession,
    schedules: Schedule[] | null,
    previous?: FluidSession
  ): Promise<void> {
    const { userId, petId } = params;
    try {
      const inventory = await this.inventory.deductForSession(userId, session, previous);
      if (!inventory) {
        return;
      }
      await this.inventory.checkThresholdAndNotify({
        userId,
        petId,
        inventory,
        schedules: schedules ?? (await this.schedules.getTodaysSchedules(userId, petId)),
      });
    } catch (error) {
      log.warn(
        { userId, petId, sessionId: session.id, error: errorMessage(error) },
        'Inventory not updated for fluid session'
      );
    }
  }

  private async queueOffline(
    res: Response,
    cause: LoggingException,
    input: NewLoggingOperation
  ): Promise<void> {
    const operation = createLoggingOperation(input, this.now());
    log.warn(
      { userId: input.userId, petId: input.petId, operationId: operation.id, error: cause.message },
      'Queueing operation offline'
    );

    try {
      await this.offline.enqueueOperation(operation);
      res.status(StatusCodes.ACCEPTED).json({
        queued: true,
        operationId: operation.id,
        userMessage: cause.userMessage,
      });
    } catch (error) {
      if (error instanceof QueueWarningException) {
        res.status(StatusCodes.ACCEPTED).json({
          queued: true,
          operationId: operation.id,
          userMessage: error.userMessage,
          queueSize: error.queueSize,
        });
        return;
      }
      sendError(res, error, 'queue operation offline', log);
    }
  }
}
