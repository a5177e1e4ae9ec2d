/**
 * Reminder Controller
 * Schedules, reconciles and snoozes a pet's local treatment reminders
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import type { ReminderService, SnoozeFailureReason } from '../services/notifications/reminder.service';
import type { ScheduleService } from '../services/schedule/schedule.service';
import { PetParamsSchema, parseBody, parseParams, sendError } from '../utils/http-utils';

const log = logger.child({ module: 'reminder-controller' });

const PetNameBodySchema = z.object({ petName: z.string().min(1).optional() });

const SnoozeBodySchema = z.object({
  payload: z.string().min(1),
  petName: z.string().min(1).optional(),
});

const SNOOZE_FAILURE_STATUS: Record<SnoozeFailureReason, number> = {
  invalid_payload: StatusCodes.BAD_REQUEST,
  invalid_kind: StatusCodes.BAD_REQUEST,
  snooze_disabled: StatusCodes.CONFLICT,
  scheduling_failed: StatusCodes.INTERNAL_SERVER_ERROR,
  unknown_error: StatusCodes.INTERNAL_SERVER_ERROR,
};

export class ReminderController {
  constructor(
    private readonly reminders: ReminderService,
    private readonly schedules: ScheduleService
  ) {}

  scheduleToday = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(PetNameBodySchema, req, res);
    if (!params || !body) return;

    try {
      const schedules = await this.schedules.listSchedules(params.userId, params.petId, {
        activeOnly: true,
      });
      const result = await this.reminders.scheduleAllForToday(params.userId, params.petId, {
        schedules,
        petName: body.petName,
      });
      res.status(StatusCodes.OK).json(result);
    } catch (error) {
      sendError(res, error, 'schedule reminders', log);
    }
  };

  reschedule = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(PetNameBodySchema, req, res);
    if (!params || !body) return;

    try {
      const schedules = await this.schedules.listSchedules(params.userId, params.petId, {
        activeOnly: true,
      });
      const result = await this.reminders.rescheduleAll(params.userId, params.petId, {
        schedules,
        petName: body.petName,
      });
      res.status(StatusCodes.OK).json(result);
    } catch (error) {
      sendError(res, error, 'reschedule reminders', log);
    }
  };

  reconcile = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      const result = await this.reminders.reconcile(params.userId, params.petId);
      res.status(StatusCodes.OK).json(result);
    } catch (error) {
      sendError(res, error, 'reconcile reminders', log);
    }
  };

  cancelToday = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      await this.reminders.cancelAllForToday(params.userId, params.petId);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'cancel reminders', log);
    }
  };

  listToday = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      const reminders = await this.reminders.getTodaysReminders(params.userId, params.petId);
      res.status(StatusCodes.OK).json({ reminders });
    } catch (error) {
      sendError(res, error, 'list reminders', log);
    }
  };

  snooze = async (req: Request, res: Response): Promise<void> => {
    const body = parseBody(SnoozeBodySchema, req, res);
    if (!body) return;

    try {
      const result = await this.reminders.snoozeCurrent(body.payload, body.petName);
      if (result.success) {
        res.status(StatusCodes.OK).json(result);
        return;
      }
      res.status(SNOOZE_FAILURE_STATUS[result.reason]).json(result);
    } catch (error) {
      sendError(res, error, 'snooze reminder', log);
    }
  };
}
