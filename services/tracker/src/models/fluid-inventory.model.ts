/**
 * Fluid Inventory Model
 * Schema for 'users/{userId}/fluidInventory/main' and its 'refills' subcollection
 *
 * One inventory per user; every pet's fluid sessions draw from it.
 */

import { z } from 'zod';
import { DateFieldSchema } from './date-field';

export const FluidInventorySchema = z.object({
  remainingVolume: z.number(), // ml, negative once overdrawn
  initialVolume: z.number(),
  reminderSessionsLeft: z.number().int(),
  refillCount: z.number().int().default(0),
  lastRefillDate: DateFieldSchema.optional(),
  inventoryEnabledAt: DateFieldSchema.optional(),
  lastThresholdNotificationSentAt: DateFieldSchema.nullable().default(null),
  createdAt: DateFieldSchema.optional(),
  updatedAt: DateFieldSchema.optional(),
});

export type FluidInventory = z.infer<typeof FluidInventorySchema>;

export const RefillEntrySchema = z.object({
  id: z.string(),
  volumeAdded: z.number(),
  totalAfterRefill: z.number(),
  isReset: z.boolean(),
  reminderSessionsLeft: z.number().int(),
  refillDate: DateFieldSchema.optional(),
});

export type RefillEntry = z.infer<typeof RefillEntrySchema>;

export const InventoryInputSchema = z.object({
  volumeAdded: z.number(),
  reminderSessionsLeft: z.number().int(),
});

export const RefillInputSchema = InventoryInputSchema.extend({
  isReset: z.boolean().default(false),
});

export const VolumeAdjustmentSchema = z.object({
  newVolume: z.number(),
  averageVolumePerSession: z.number().positive().optional(),
});
