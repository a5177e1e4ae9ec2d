/**
 * Progress Controller
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import type { ProgressService } from '../services/progress/progress.service';
import { formatDate, startOfWeek } from '../utils/date-utils';
import {
  CalendarDateSchema,
  PetParamsSchema,
  parseParams,
  parseQuery,
  sendError,
} from '../utils/http-utils';

const log = logger.child({ module: 'progress-controller' });

const WeekQuerySchema = z.object({
  weekStart: CalendarDateSchema.optional(),
  trackingStartDate: CalendarDateSchema.optional(),
});

export class ProgressController {
  constructor(
    private readonly progress: ProgressService,
    private readonly now: () => Date = () => new Date()
  ) {}

  getWeek = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const query = params && parseQuery(WeekQuerySchema, req, res);
    if (!params || !query) return;

    const weekStart = query.weekStart ?? startOfWeek(this.now());
    try {
      const days = await this.progress.getWeekStatuses(
        params.userId,
        params.petId,
        weekStart,
        query.trackingStartDate
      );
      res.status(StatusCodes.OK).json({ weekStart: formatDate(weekStart), days });
    } catch (error) {
      sendError(res, error, 'load week progress', log);
    }
  };
}
