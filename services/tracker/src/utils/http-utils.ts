/**
 * HTTP helpers shared by the controllers
 * Request validation with zod and the mapping from domain errors to status codes
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { Logger } from 'pino';
import {
  DuplicateSessionException,
  LoggingException,
  QueueFullException,
  SessionValidationException,
  SyncFailedException,
} from '../services/logging/logging-errors';
import {
  HealthServiceException,
  HealthValidationException,
  WeightNotFoundException,
} from '../services/health/health-errors';
import {
  InventoryNotFoundException,
  InventoryServiceException,
  InventoryValidationException,
} from '../services/inventory/inventory-errors';
import { QolServiceException, QolValidationException } from '../services/qol/qol-errors';
import { ScheduleValidationException } from '../services/schedule/schedule.service';
import { parseDate } from './date-utils';
import { errorMessage } from './error-utils';

export const PetParamsSchema = z.object({
  userId: z.string().min(1),
  petId: z.string().min(1),
});

export type PetParams = z.infer<typeof PetParamsSchema>;

export const UserParamsSchema = z.object({
  userId: z.string().min(1),
});

/**
 * YYYY-MM-DD as a local calendar date
 */
export const CalendarDateSchema = z.string().transform((value, ctx) => {
  const date = parseDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a date as YYYY-MM-DD' });
    return z.NEVER;
  }
  return date;
});

function sendInvalid(res: Response, error: string, issues: z.ZodIssue[]): void {
  res.status(StatusCodes.BAD_REQUEST).json({
    error,
    issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

/**
 * Validate the JSON body; answers 400 and returns null when it does not match
 */
export function parseBody<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> | null {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    sendInvalid(res, 'Invalid request body', result.error.issues);
    return null;
  }
  return result.data;
}

export function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> | null {
  const result = schema.safeParse(req.params);
  if (!result.success) {
    sendInvalid(res, 'Invalid path parameters', result.error.issues);
    return null;
  }
  return result.data;
}

export function parseQuery<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> | null {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    sendInvalid(res, 'Invalid query parameters', result.error.issues);
    return null;
  }
  return result.data;
}

/**
 * Answer with the status that matches a domain error
 * @param action - completes "Failed to ..." in the generic 500 response
 */
export function sendError(res: Response, error: unknown, action: string, log: Logger): void {
  if (error instanceof SessionValidationException) {
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.message,
      errors: error.errors,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof DuplicateSessionException) {
    res.status(StatusCodes.CONFLICT).json({
      error: error.message,
      sessionType: error.sessionType,
      conflictingTime: error.conflictingTime,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof QueueFullException) {
    res.status(StatusCodes.SERVICE_UNAVAILABLE).json({
      error: error.message,
      queueSize: error.queueSize,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof SyncFailedException) {
    res.status(StatusCodes.BAD_GATEWAY).json({
      error: error.message,
      failedCount: error.failedCount,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof QolValidationException) {
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.message,
      errors: error.errors,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof HealthValidationException) {
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.message,
      errors: error.errors,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof InventoryValidationException) {
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.message,
      errors: error.errors,
      userMessage: error.userMessage,
    });
    return;
  }

  if (error instanceof InventoryNotFoundException) {
    res.status(StatusCodes.NOT_FOUND).json({ error: error.message });
    return;
  }

  if (error instanceof WeightNotFoundException) {
    res.status(StatusCodes.NOT_FOUND).json({ error: error.message, date: error.date });
    return;
  }

  if (error instanceof ScheduleValidationException) {
    res.status(StatusCodes.BAD_REQUEST).json({
      error: error.message,
      userMessage: error.userMessage,
    });
    return;
  }

  const message = errorMessage(error);
  log.error(
    { error: message, stack: error instanceof Error ? error.stack : undefined },
    `Failed to ${action}`
  );

  const body: Record<string, string> = { error: `Failed to ${action}: ${message}` };
  if (
    error instanceof LoggingException ||
    error instanceof QolServiceException ||
    error instanceof HealthServiceException ||
    error instanceof InventoryServiceException
  ) {
    body.userMessage = error.userMessage;
  }
  res.status(StatusCodes.INTERNAL_SERVER_ERROR).json(body);
}
