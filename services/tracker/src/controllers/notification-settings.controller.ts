/**
 * Notification Settings Controller
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import logger from '../logger';
import { NotificationSettingsUpdateSchema } from '../models';
import type { NotificationSettingsService } from '../services/notifications/notification-settings.service';
import { UserParamsSchema, parseBody, parseParams, sendError } from '../utils/http-utils';

const log = logger.child({ module: 'notification-settings-controller' });

export class NotificationSettingsController {
  constructor(private readonly settings: NotificationSettingsService) {}

  get = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    if (!params) return;

    try {
      res.status(StatusCodes.OK).json(await this.settings.getSettings(params.userId));
    } catch (error) {
      sendError(res, error, 'read notification settings', log);
    }
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    const body = params && parseBody(NotificationSettingsUpdateSchema, req, res);
    if (!params || !body) return;

    try {
      res.status(StatusCodes.OK).json(await this.settings.updateSettings(params.userId, body));
    } catch (error) {
      sendError(res, error, 'update notification settings', log);
    }
  };
}
