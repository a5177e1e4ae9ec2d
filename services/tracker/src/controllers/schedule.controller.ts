/**
 * Schedule Controller
 * CRUD for schedules; every change reschedules that schedule's reminders for today
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import { ScheduleInputSchema, ScheduleUpdateSchema } from '../models';
import type { ReminderService } from '../services/notifications/reminder.service';
import type { ScheduleService } from '../services/schedule/schedule.service';
import { PetParamsSchema, parseBody, parseParams, parseQuery, sendError } from '../utils/http-utils';

const log = logger.child({ module: 'schedule-controller' });

const ScheduleParamsSchema = PetParamsSchema.extend({ scheduleId: z.string().min(1) });

const ListQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional(),
});

const CreateBodySchema = ScheduleInputSchema.extend({ petName: z.string().min(1).optional() });
const UpdateBodySchema = ScheduleUpdateSchema.extend({ petName: z.string().min(1).optional() });
const DeleteBodySchema = z.object({ petName: z.string().min(1).optional() });

export class ScheduleController {
  constructor(
    private readonly schedules: ScheduleService,
    private readonly reminders: ReminderService
  ) {}

  list = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const query = params && parseQuery(ListQuerySchema, req, res);
    if (!params || !query) return;

    try {
      const schedules = await this.schedules.listSchedules(params.userId, params.petId, {
        activeOnly: query.active === 'true',
      });
      res.status(StatusCodes.OK).json({ schedules });
    } catch (error) {
      sendError(res, error, 'list schedules', log);
    }
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(CreateBodySchema, req, res);
    if (!params || !body) return;

    const { petName, ...input } = body;
    try {
      const schedule = await this.schedules.createSchedule(params.userId, params.petId, input);
      const reminders = await this.reminders.scheduleForSchedule(
        params.userId,
        params.petId,
        schedule,
        petName
      );
      res.status(StatusCodes.CREATED).json({ schedule, reminders });
    } catch (error) {
      sendError(res, error, 'create schedule', log);
    }
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(ScheduleParamsSchema, req, res);
    const body = params && parseBody(UpdateBodySchema, req, res);
    if (!params || !body) return;

    const { petName, ...update } = body;
    try {
      const schedule = await this.schedules.updateSchedule(
        params.userId,
        params.petId,
        params.scheduleId,
        update
      );
      if (!schedule) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Schedule not found' });
        return;
      }

      const reminders = await this.reminders.scheduleForSchedule(
        params.userId,
        params.petId,
        schedule,
        petName
      );
      res.status(StatusCodes.OK).json({ schedule, reminders });
    } catch (error) {
      sendError(res, error, 'update schedule', log);
    }
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(ScheduleParamsSchema, req, res);
    const body = params && parseBody(DeleteBodySchema, req, res);
    if (!params || !body) return;

    try {
      const deleted = await this.schedules.deleteSchedule(
        params.userId,
        params.petId,
        params.scheduleId
      );
      if (!deleted) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Schedule not found' });
        return;
      }

      await this.reminders.cancelForSchedule(
        params.userId,
        params.petId,
        params.scheduleId,
        body.petName
      );
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'delete schedule', log);
    }
  };
}
