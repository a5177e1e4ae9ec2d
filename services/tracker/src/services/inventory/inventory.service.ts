/**
 * Inventory Service
 * The user's stock of subcutaneous fluid: refills add to it, logged fluid
 * sessions draw from it, and a low-stock alert goes out once it falls below
 * the sessions the user asked to be warned at.
 */

import { FieldValue } from '@google-cloud/firestore';
import type { DocumentData, Firestore } from '@google-cloud/firestore';
import { CHANNEL_FLUID_REMINDERS, REFILLS_SUBCOLLECTION, fluidInventoryDocPath } from '../../../../../shared';
import logger from '../../logger';
import { FluidInventorySchema } from '../../models/fluid-inventory.model';
import type { FluidInventory } from '../../models/fluid-inventory.model';
import type { FluidSession } from '../../models/fluid-session.model';
import type { Schedule } from '../../models/schedule.model';
import { addDays } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import { generateInventoryNotificationId } from '../notifications/notification-id';
import type { ReminderPlugin } from '../notifications/reminder-plugin';
import {
  InventoryNotFoundException,
  InventoryServiceException,
  InventoryValidationException,
} from './inventory-errors';

const ALERT_DELAY_MS = 1000;
const INVENTORY_GROUP_ID = 'inventory_alerts';

export interface InventoryMetrics {
  sessionsLeft: number;
  daysRemaining: number;
  estimatedEndDate: Date | null;
  averageVolumePerSession: number;
  totalDailyVolume: number;
}

export interface StockParams {
  userId: string;
  volumeAdded: number;
  reminderSessionsLeft: number;
}

export interface RefillParams extends StockParams {
  isReset: boolean;
}

export interface VolumeAdjustment {
  userId: string;
  newVolume: number;
  averageVolumePerSession?: number;
}

export interface ThresholdCheck {
  userId: string;
  petId: string;
  petName?: string;
  inventory: FluidInventory;
  schedules: Schedule[];
}

export type ThresholdOutcome = 'notified' | 'cleared' | 'unchanged';

function validateStock(volume: number, reminderSessionsLeft: number): string[] {
  const errors: string[] = [];
  if (!Number.isFinite(volume) || volume <= 0) {
    errors.push('Volume must be greater than 0 mL');
  }
  if (reminderSessionsLeft < 0) {
    errors.push('Reminder sessions must not be negative');
  }
  return errors;
}

/**
 * Consumption from active fluid schedules with a target volume and reminder times
 */
export function calculateMetrics(inventory: FluidInventory, schedules: Schedule[], now: Date): InventoryMetrics {
  let totalDailyVolume = 0;
  let sessionsPerDay = 0;
  for (const schedule of schedules) {
    if (
      !schedule.isActive ||
      schedule.treatmentType !== 'fluid' ||
      schedule.targetVolume === undefined ||
      schedule.reminderTimes.length === 0
    ) {
      continue;
    }
    totalDailyVolume += schedule.targetVolume * schedule.reminderTimes.length;
    sessionsPerDay += schedule.reminderTimes.length;
  }

  const averageVolumePerSession = sessionsPerDay > 0 ? totalDailyVolume / sessionsPerDay : 0;
  const remaining = Math.max(0, inventory.remainingVolume);
  const daysRemaining = totalDailyVolume > 0 ? Math.floor(remaining / totalDailyVolume) : 0;

  return {
    sessionsLeft: averageVolumePerSession > 0 ? Math.floor(remaining / averageVolumePerSession) : 0,
    daysRemaining,
    estimatedEndDate: totalDailyVolume > 0 ? addDays(now, daysRemaining) : null,
    averageVolumePerSession,
    totalDailyVolume,
  };
}

export function thresholdVolume(inventory: FluidInventory, averageVolumePerSession: number): number {
  return inventory.reminderSessionsLeft * averageVolumePerSession;
}

export class InventoryService {
  private readonly log = logger.child({ module: 'inventory' });

  constructor(
    private readonly db: Firestore,
    private readonly plugin: ReminderPlugin,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getInventory(userId: string): Promise<FluidInventory | null> {
    try {
      const snapshot = await this.inventoryRef(userId).get();
      return snapshot.exists ? FluidInventorySchema.parse(snapshot.data()) : null;
    } catch (error) {
      throw new InventoryServiceException(`Failed to read inventory: ${errorMessage(error)}`);
    }
  }

  /**
   * Start tracking with a first refill; an existing inventory is replaced
   * @throws InventoryValidationException when the volume is not positive
   */
  async createInventory(params: StockParams): Promise<void> {
    const { userId, volumeAdded, reminderSessionsLeft } = params;
    this.assertValid(userId, validateStock(volumeAdded, reminderSessionsLeft));

    const refillRef = this.refillsCollection(userId).doc();
    const timestamp = FieldValue.serverTimestamp();
    const batch = this.db.batch();
    batch.set(this.inventoryRef(userId), {
      remainingVolume: volumeAdded,
      initialVolume: volumeAdded,
      reminderSessionsLeft,
      lastRefillDate: timestamp,
      refillCount: 1,
      inventoryEnabledAt: timestamp,
      lastThresholdNotificationSentAt: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    batch.set(refillRef, this.refillDoc(refillRef.id, params, volumeAdded, true));

    try {
      await batch.commit();
    } catch (error) {
      this.log.error({ userId, error: errorMessage(error) }, 'Inventory batch write failed');
      throw new InventoryServiceException(`Failed to create inventory: ${errorMessage(error)}`);
    }
    this.log.info({ event: 'inventory_created', userId, volumeAdded, reminderSessionsLeft }, 'Inventory created');
  }

  /**
   * Add to (or with `isReset`, replace) the remaining volume and re-arm the low-stock alert
   * @returns the remaining volume after the refill
   * @throws InventoryNotFoundException when inventory tracking was never started
   */
  async addRefill(params: RefillParams): Promise<number> {
    const { userId, volumeAdded, reminderSessionsLeft, isReset } = params;
    this.assertValid(userId, validateStock(volumeAdded, reminderSessionsLeft));

    const inventoryRef = this.inventoryRef(userId);
    const refillRef = this.refillsCollection(userId).doc();

    let total: number;
    try {
      total = await this.db.runTransaction(async (transaction) => {
        const snapshot = await transaction.get(inventoryRef);
        if (!snapshot.exists) {
          throw new InventoryNotFoundException(userId);
        }
        const current = FluidInventorySchema.parse(snapshot.data());
        const newTotal = isReset ? volumeAdded : current.remainingVolume + volumeAdded;

        transaction.update(inventoryRef, {
          remainingVolume: newTotal,
          initialVolume: newTotal,
          reminderSessionsLeft,
          lastRefillDate: FieldValue.serverTimestamp(),
          refillCount: FieldValue.increment(1),
          lastThresholdNotificationSentAt: null,
          updatedAt: FieldValue.serverTimestamp(),
        });
        transaction.set(refillRef, this.refillDoc(refillRef.id, params, newTotal, isReset));
        return newTotal;
      });
    } catch (error) {
      if (error instanceof InventoryNotFoundException) {
        throw error;
      }
      this.log.error({ userId, error: errorMessage(error) }, 'Refill transaction failed');
      throw new InventoryServiceException(`Failed to add refill: ${errorMessage(error)}`);
    }

    this.log.info({ event: 'inventory_refilled', userId, volumeAdded, isReset, total }, 'Refill added');
    return total;
  }

  /**
   * Correct the remaining volume by hand
   * With the average session volume given, a volume back above the alert threshold re-arms the alert.
   */
  async updateVolume(params: VolumeAdjustment): Promise<FluidInventory> {
    const { userId, newVolume, averageVolumePerSession } = params;
    this.assertValid(userId, Number.isFinite(newVolume) && newVolume >= 0 ? [] : ['Volume must not be negative']);

    const inventory = await this.getInventory(userId);
    if (!inventory) {
      throw new InventoryNotFoundException(userId);
    }

    const updates: DocumentData = {
      remainingVolume: newVolume,
      initialVolume: Math.max(inventory.initialVolume, newVolume),
      updatedAt: FieldValue.serverTimestamp(),
    };
    const rearm =
      averageVolumePerSession !== undefined && newVolume >= thresholdVolume(inventory, averageVolumePerSession);
    if (rearm) {
      updates.lastThresholdNotificationSentAt = null;
    }

    await this.write(userId, updates, 'adjust volume');
    this.log.info({ event: 'inventory_adjusted', userId, newVolume, rearm }, 'Inventory volume adjusted');
    return {
      ...inventory,
      remainingVolume: newVolume,
      initialVolume: Math.max(inventory.initialVolume, newVolume),
      lastThresholdNotificationSentAt: rearm ? null : inventory.lastThresholdNotificationSentAt,
    };
  }

  /**
   * Draw a logged session's volume from the stock; with `previous`, only the change in volume
   * Sessions from before tracking started are not drawn.
   * @returns the inventory after the draw, or null when nothing was drawn
   */
  async deductForSession(
    userId: string,
    session: FluidSession,
    previous?: FluidSession
  ): Promise<FluidInventory | null> {
    const inventory = await this.getInventory(userId);
    if (!inventory) {
      return null;
    }
    if (inventory.inventoryEnabledAt && session.dateTime.getTime() < inventory.inventoryEnabledAt.getTime()) {
      return null;
    }

    const volume = session.volumeGiven - (previous?.volumeGiven ?? 0);
    if (volume === 0) {
      return null;
    }

    await this.write(
      userId,
      { remainingVolume: FieldValue.increment(-volume), updatedAt: FieldValue.serverTimestamp() },
      'deduct session'
    );
    this.log.debug({ userId, sessionId: session.id, volume }, 'Session drawn from inventory');
    return { ...inventory, remainingVolume: inventory.remainingVolume - volume };
  }

  /**
   * Alert once when the stock drops below the warning threshold; clear the flag once it is back above
   */
  async checkThresholdAndNotify(check: ThresholdCheck): Promise<ThresholdOutcome> {
    const { userId, petId, inventory } = check;
    const metrics = calculateMetrics(inventory, check.schedules, this.now());
    if (metrics.averageVolumePerSession <= 0) {
      return 'unchanged';
    }

    const threshold = thresholdVolume(inventory, metrics.averageVolumePerSession);
    const alerted = inventory.lastThresholdNotificationSentAt !== null;

    if (inventory.remainingVolume >= threshold) {
      if (!alerted) {
        return 'unchanged';
      }
      await this.write(
        userId,
        { lastThresholdNotificationSentAt: null, updatedAt: FieldValue.serverTimestamp() },
        'clear alert'
      );
      return 'cleared';
    }
    if (alerted) {
      return 'unchanged';
    }

    await this.showLowStockAlert(check, metrics);
    await this.write(
      userId,
      { lastThresholdNotificationSentAt: FieldValue.serverTimestamp(), updatedAt: FieldValue.serverTimestamp() },
      'record alert'
    );
    this.log.info(
      { event: 'inventory_low', userId, petId, remainingVolume: inventory.remainingVolume, threshold },
      'Low inventory alert sent'
    );
    return 'notified';
  }

  private async showLowStockAlert(check: ThresholdCheck, metrics: InventoryMetrics): Promise<void> {
    const { userId, petId, petName, inventory } = check;
    const remainingMl = Math.trunc(inventory.remainingVolume);
    const now = this.now();

    await this.plugin.showZoned({
      id: generateInventoryNotificationId({ userId, petId }),
      title: 'Fluid Inventory Low',
      body: `Only ${remainingMl} mL left (~${metrics.sessionsLeft} sessions)${petName ? ` for ${petName}` : ''}`,
      scheduledDate: new Date(now.getTime() + ALERT_DELAY_MS),
      channelId: CHANNEL_FLUID_REMINDERS,
      payload: JSON.stringify({
        type: 'inventory_low',
        userId,
        petId,
        remainingMl,
        sessionsLeft: metrics.sessionsLeft,
        timestamp: now.toISOString(),
      }),
      groupId: INVENTORY_GROUP_ID,
      threadIdentifier: INVENTORY_GROUP_ID,
    });
  }

  private refillDoc(id: string, params: StockParams, totalAfterRefill: number, isReset: boolean): DocumentData {
    const timestamp = FieldValue.serverTimestamp();
    return {
      id,
      volumeAdded: params.volumeAdded,
      totalAfterRefill,
      isReset,
      reminderSessionsLeft: params.reminderSessionsLeft,
      refillDate: timestamp,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  private async write(userId: string, updates: DocumentData, operation: string): Promise<void> {
    try {
      await this.inventoryRef(userId).update(updates);
    } catch (error) {
      this.log.error({ userId, operation, error: errorMessage(error) }, 'Inventory write failed');
      throw new InventoryServiceException(`Failed to ${operation}: ${errorMessage(error)}`);
    }
  }

  private assertValid(userId: string, errors: string[]): void {
    if (errors.length > 0) {
      this.log.warn({ userId, errors }, 'Inventory change rejected');
      throw new InventoryValidationException(errors);
    }
  }

  private inventoryRef(userId: string) {
    return this.db.doc(fluidInventoryDocPath(userId));
  }

  private refillsCollection(userId: string) {
    return this.db.collection(`${fluidInventoryDocPath(userId)}/${REFILLS_SUBCOLLECTION}`);
  }
}
