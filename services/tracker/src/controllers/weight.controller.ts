/**
 * Weight Controller
 * One weight entry per pet per day
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import type { WeightService } from '../services/health/weight.service';
import {
  CalendarDateSchema,
  PetParamsSchema,
  parseBody,
  parseParams,
  parseQuery,
  sendError,
} from '../utils/http-utils';

const log = logger.child({ module: 'weight-controller' });

const DateParamsSchema = PetParamsSchema.extend({ date: CalendarDateSchema });

const WeightBodySchema = z.object({
  date: CalendarDateSchema.optional(),
  weightKg: z.number(),
  notes: z.string().optional(),
});

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  startAfter: CalendarDateSchema.optional(),
});

export class WeightController {
  constructor(
    private readonly weights: WeightService,
    private readonly now: () => Date = () => new Date()
  ) {}

  create = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(WeightBodySchema, req, res);
    if (!params || !body) return;

    try {
      const entry = await this.weights.logWeight({
        ...params,
        date: body.date ?? this.now(),
        weightKg: body.weightKg,
        notes: body.notes,
      });
      res.status(StatusCodes.CREATED).json(entry);
    } catch (error) {
      sendError(res, error, 'log weight', log);
    }
  };

  /**
   * A body date moves the entry to that day
   */
  update = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    const body = params && parseBody(WeightBodySchema, req, res);
    if (!params || !body) return;

    try {
      const entry = await this.weights.updateWeight({
        userId: params.userId,
        petId: params.petId,
        oldDate: params.date,
        date: body.date ?? params.date,
        weightKg: body.weightKg,
        notes: body.notes,
      });
      res.status(StatusCodes.OK).json(entry);
    } catch (error) {
      sendError(res, error, 'update weight', log);
    }
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    if (!params) return;

    try {
      await this.weights.deleteWeight(params.userId, params.petId, params.date);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'delete weight', log);
    }
  };

  history = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const query = params && parseQuery(HistoryQuerySchema, req, res);
    if (!params || !query) return;

    try {
      const entries = await this.weights.getWeightHistory(params.userId, params.petId, query);
      res.status(StatusCodes.OK).json({ entries });
    } catch (error) {
      sendError(res, error, 'list weights', log);
    }
  };

  latest = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      const entry = await this.weights.getLatestWeight(params.userId, params.petId);
      res.status(StatusCodes.OK).json({ entry });
    } catch (error) {
      sendError(res, error, 'read latest weight', log);
    }
  };
}
