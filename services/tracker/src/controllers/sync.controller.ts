/**
 * Sync Controller
 * Inspect and replay a user's offline logging queue
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import logger from '../logger';
import type { OfflineLoggingService } from '../services/logging/offline-logging.service';
import { UserParamsSchema, parseParams, sendError } from '../utils/http-utils';

const log = logger.child({ module: 'sync-controller' });

const OperationParamsSchema = UserParamsSchema.extend({ operationId: z.string().min(1) });

export class SyncController {
  constructor(private readonly offline: OfflineLoggingService) {}

  getQueue = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    if (!params) return;

    try {
      const operations = await this.offline.getAllOperations(params.userId);
      res.status(StatusCodes.OK).json({
        size: operations.length,
        pending: operations.filter((op) => op.status === 'pending').length,
        failed: operations.filter((op) => op.status === 'failed').length,
        warning: await this.offline.shouldShowWarning(params.userId),
        operations,
      });
    } catch (error) {
      sendError(res, error, 'read offline queue', log);
    }
  };

  sync = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    if (!params) return;

    try {
      const result = await this.offline.syncPendingOperations(params.userId);
      res.status(StatusCodes.OK).json(result);
    } catch (error) {
      sendError(res, error, 'sync offline queue', log);
    }
  };

  retry = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(OperationParamsSchema, req, res);
    if (!params) return;

    try {
      const success = await this.offline.retryFailedOperation(
        params.userId,
        params.operationId
      );
      res.status(StatusCodes.OK).json({ success });
    } catch (error) {
      sendError(res, error, 'retry operation', log);
    }
  };

  removeOperation = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(OperationParamsSchema, req, res);
    if (!params) return;

    try {
      await this.offline.removeOperation(params.userId, params.operationId);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'remove operation', log);
    }
  };

  clear = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    if (!params) return;

    try {
      await this.offline.clearAllOperations(params.userId);
      res.status(StatusCodes.NO_CONTENT).send();
    } catch (error) {
      sendError(res, error, 'clear offline queue', log);
    }
  };
}
