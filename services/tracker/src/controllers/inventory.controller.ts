/**
 * Inventory Controller
 * The user's fluid stock, and how long it lasts against a pet's schedules
 */

import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import logger from '../logger';
import { InventoryInputSchema, RefillInputSchema, VolumeAdjustmentSchema } from '../models';
import { calculateMetrics, thresholdVolume } from '../services/inventory/inventory.service';
import type { InventoryService } from '../services/inventory/inventory.service';
import type { ScheduleService } from '../services/schedule/schedule.service';
import { PetParamsSchema, UserParamsSchema, parseBody, parseParams, sendError } from '../utils/http-utils';

const log = logger.child({ module: 'inventory-controller' });

export class InventoryController {
  constructor(
    private readonly inventory: InventoryService,
    private readonly schedules: ScheduleService,
    private readonly now: () => Date = () => new Date()
  ) {}

  get = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    if (!params) return;

    try {
      const inventory = await this.inventory.getInventory(params.userId);
      if (!inventory) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Inventory not found' });
        return;
      }
      res.status(StatusCodes.OK).json({ inventory });
    } catch (error) {
      sendError(res, error, 'read inventory', log);
    }
  };

  create = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    const body = params && parseBody(InventoryInputSchema, req, res);
    if (!params || !body) return;

    try {
      await this.inventory.createInventory({ userId: params.userId, ...body });
      res.status(StatusCodes.CREATED).json({
        remainingVolume: body.volumeAdded,
        reminderSessionsLeft: body.reminderSessionsLeft,
      });
    } catch (error) {
      sendError(res, error, 'create inventory', log);
    }
  };

  refill = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    const body = params && parseBody(RefillInputSchema, req, res);
    if (!params || !body) return;

    try {
      const remainingVolume = await this.inventory.addRefill({ userId: params.userId, ...body });
      res.status(StatusCodes.CREATED).json({ remainingVolume });
    } catch (error) {
      sendError(res, error, 'add refill', log);
    }
  };

  adjust = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(UserParamsSchema, req, res);
    const body = params && parseBody(VolumeAdjustmentSchema, req, res);
    if (!params || !body) return;

    try {
      const inventory = await this.inventory.updateVolume({ userId: params.userId, ...body });
      res.status(StatusCodes.OK).json({ inventory });
    } catch (error) {
      sendError(res, error, 'adjust inventory', log);
    }
  };

  /**
   * Sessions and days left at the pet's scheduled consumption
   */
  metrics = async (req: Request, res: Response): Promise<void> => {
    const params = parseParams(PetParamsSchema, req, res);
    if (!params) return;

    try {
      const inventory = await this.inventory.getInventory(params.userId);
      if (!inventory) {
        res.status(StatusCodes.NOT_FOUND).json({ error: 'Inventory not found' });
        return;
      }

      const schedules = await this.schedules.listSchedules(params.userId, params.petId, { activeOnly: true });
      const metrics = calculateMetrics(inventory, schedules, this.now());
      const threshold = thresholdVolume(inventory, metrics.averageVolumePerSession);
      res.status(StatusCodes.OK).json({
        inventory,
        ...metrics,
        thresholdVolume: threshold,
        isLow: metrics.averageVolumePerSession > 0 && inventory.remainingVolume < threshold,
      });
    } catch (error) {
      sendError(res, error, 'calculate inventory', log);
    }
  };
}
