/**
 * QoL Controller
 * Quality of life check-ins: one per pet per day, with scores and trend
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import { QOL_INTERPRETATION_MESSAGES } from '../constants/messages';
import logger from '../logger';
import { QolAssessmentInputSchema, createQolAssessment, isAssessmentComplete } from '../models';
import type { QolAssessment } from '../models';
import {
  calculateDomainScores,
  calculateOverallScore,
  scoreBand,
} from '../services/qol/qol-scoring.service';
import type { QolService } from '../services/qol/qol.service';
import { startOfDay } from '../utils/date-utils';
import {
  CalendarDateSchema,
  PetParamsSchema,
  parseBody,
  parseParams,
  parseQuery,
  sendError,
} from '../utils/http-utils';

const log = logger.child({ module: 'qol-controller' });

const DateParamsSchema = PetParamsSchema.extend({ date: CalendarDateSchema });

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  startAfter: CalendarDateSchema.optional(),
});

function presentAssessment(assessment: QolAssessment) {
  const overallScore = calculateOverallScore(assessment.responses);
  return {
    ...assessment,
    domainScores: calculateDomainScores(assessment.responses),
    overallScore,
    scoreBand: scoreBand(overallScore),
    isComplete: isAssessmentComplete(assessment),
  };
}

export class QolController {
  constructor(
    private readonly qol: QolService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Save today's (or the given day's) check-in; an existing one for that day is replaced
   */
  submit = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const body = params && parseBody(QolAssessmentInputSchema, req, res);
    if (!params || !body) return;

    const { userId, petId } = params;
    try {
      const date = startOfDay(body.date ?? this.now());
      const existing = await this.qol.getAssessment(userId, petId, date);

      if (existing) {
        const updated = await this.qol.updateAssessment({ ...existing, responses: body.responses });
        res.status(StatusCodes.OK).json(presentAssessment(updated));
        return;
      }

      const assessment = createQolAssessment(userId, petId, { ...body, date }, this.now());
      await this.qol.saveAssessment(assessment);
      res.status(StatusCodes.CREATED).json(presentAssessment(assessment));
    } catch (error) {
      sendError(res, error, 'save QoL assessment', log);
    }
  };

  list = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    const query = params && parseQuery(ListQuerySchema, req, res);
    if (!params || !query) return;

    try {
      const assessments = await this.qol.getRecentAssessments(params.userId, params.petId, query);
      res.status(StatusCodes.OK).json({ assessments: assessments.map(presentAssessment) });
    } catch (error) {
      sendError(res, error, 'list QoL assessments', log);
    }
  };

  trend = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      const trend = await this.qol.getTrend(params.userId, params.petId);
      res.status(StatusCodes.OK).json({
        ...trend,
        message: trend.interpretation ? QOL_INTERPRETATION_MESSAGES[trend.interpretation] : null,
      });
    } catch (error) {
      sendError(res, error, 'load QoL trend', log);
    }
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    if (!params) return;

    try {
      const assessment = await this.qol.getAssessment(params.userId, params.petId, params.date);
      if (!assessment) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'QoL assessment not found' });
        return;
      }
      res.status(StatusCodes.OK).json(presentAssessment(assessment));
    } catch (error) {
      sendError(res, error, 'read QoL assessment', log);
    }
  };

  remove = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(DateParamsSchema, req, res);
    if (!params) return;

    try {
      const existing = await this.qol.getAssessment(params.userId, params.petId, params.date);
      if (!existing) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'QoL assessment not found' });
        return;
      }
      await this.qol.deleteAssessment(params.userId, params.petId, params.date);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'delete QoL assessment', log);
    }
  };
}
