/**
 * Symptoms Controller
 * Daily symptom check-ins, addressed by calendar date
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import { SymptomScoresSchema } from '../models';
import type { SymptomsService } from '../services/health/symptoms.service';
import {
  CalendarDateSchema,
  PetParamsSchema,
  parseBody,
  parseParams,
  parseQuery,
  sendError,
} from '../utils/http-utils';

const log = logger.child({ module: 'symptoms-controller' });

const DateParamsSchema = PetParamsSchema.extend({ date: CalendarDateSchema });

const SymptomsBodySchema = z.object({
  symptoms: SymptomScoresSchema.optional(),
  notes: z.string().optional(),
});

const RecentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  symptomsOnly: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

export class SymptomsController {
  constructor(private readonly symptoms: SymptomsService) {}

  save = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    const body = params && parseBody(SymptomsBodySchema, req, res);
    if (!params || !body) return;

    try {
      const parameter = await this.symptoms.saveSymptoms({ ...params, ...body });
      res.status(StatusCodes.OK).json(parameter);
    } catch (error) {
      sendError(res, error, 'save symptoms', log);
    }
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    if (!params) return;

    try {
      const parameter = await this.symptoms.getDailyHealth(params.userId, params.petId, params.date);
      if (!parameter) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'No health entry on that day' });
        return;
      }
      res.status(StatusCodes.OK).json(parameter);
    } catch (error) {
      sendError(res, error, 'read symptoms', log);
    }
  };

  clear = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    if (!params) return;

    try {
      await this.symptoms.clearSymptoms(params.userId, params.petId, params.date);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'clear symptoms', log);
    }
  };

  recent = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const query = params && parseQuery(RecentQuerySchema, req, res);
    if (!params || !query) return;

    try {
      const entries = await this.symptoms.getRecentHealth(params.userId, params.petId, query);
      res.status(StatusCodes.OK).json({ entries });
    } catch (error) {
      sendError(res, error, 'list symptoms', log);
    }
  };
}
