/**
 * Notification Index Store
 * Tracks the reminders scheduled for each pet per day, keyed by local date.
 *
 * Each day's index is saved as { checksum, entries }. A checksum mismatch marks
 * the index as corrupt; when the reminder plugin is available the index is rebuilt
 * from the plugin's pending notifications (their payloads carry everything needed).
 */

import { z } from 'zod';
import logger from '../../logger';
import { addDays, formatDate } from '../../utils/date-utils';
import { fnv1a32 } from './notification-id';
import {
  isValidKind,
  isValidTimeSlot,
  isValidTreatmentType,
  parseScheduledNotificationEntry,
  toEntryJson,
} from '../../models/scheduled-notification-entry.model';
import type { ScheduledNotificationEntry } from '../../models/scheduled-notification-entry.model';
import type { KeyValueStore } from '../key-value-store.service';
import type { PendingNotificationRequest, ReminderPlugin } from './reminder-plugin';
import { errorMessage } from '../../utils/error-utils';

const log = logger.child({ module: 'notification-index-store' });

export const INDEX_KEY_PREFIX = 'notif_index_v2_';

const StoredIndexSchema = z.object({
  checksum: z.string(),
  entries: z.array(z.unknown()),
});

const PayloadSchema = z.object({
  userId: z.string(),
  petId: z.string(),
  scheduleId: z.string().min(1),
  timeSlot: z.string(),
  kind: z.string(),
  treatmentType: z.string(),
});

const OwnerSchema = z.object({
  userId: z.string(),
  petId: z.string(),
  scheduleId: z.string().min(1),
});

export interface ReconcileResult {
  added: number;
  removed: number;
}

export interface TypeBreakdown {
  medication: number;
  fluid: number;
}

export interface PetRef {
  userId: string;
  petId: string;
}

// Pet ids are store-generated and never contain an underscore
function parseOwner(owner: string): PetRef | null {
  const split = owner.lastIndexOf('_');
  if (split <= 0 || split === owner.length - 1) {
    return null;
  }
  return { userId: owner.slice(0, split), petId: owner.slice(split + 1) };
}

export function buildIndexKey(userId: string, petId: string, date: Date): string {
  return `${INDEX_KEY_PREFIX}${userId}_${petId}_${formatDate(date)}`;
}

/**
 * Pending treatment reminders whose payload belongs to the pet
 * One plugin serves every user, so requests without a matching payload are not ours to touch.
 */
export function pendingForPet(
  pending: PendingNotificationRequest[],
  userId: string,
  petId: string
): PendingNotificationRequest[] {
  return pending.filter((request) => {
    if (!request.payload) {
      return false;
    }
    try {
      const owner = OwnerSchema.safeParse(JSON.parse(request.payload));
      return owner.success && owner.data.userId === userId && owner.data.petId === petId;
    } catch {
      return false;
    }
  });
}

/**
 * FNV-1a over the JSON of every entry, sorted by notificationId
 * Returned as 8 lowercase hex digits
 */
export function computeChecksum(entries: ScheduledNotificationEntry[]): string {
  const sorted = [...entries].sort((a, b) => a.notificationId - b.notificationId);

  let hash: number | undefined;
  for (const entry of sorted) {
    hash = fnv1a32(JSON.stringify(toEntryJson(entry)), hash);
  }
  return (hash ?? fnv1a32('')).toString(16).padStart(8, '0');
}

export class NotificationIndexStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Count entries per treatment type; unknown types are skipped
   */
  static categorizeByType(entries: ScheduledNotificationEntry[]): TypeBreakdown {
    const breakdown: TypeBreakdown = { medication: 0, fluid: 0 };
    for (const entry of entries) {
      if (entry.treatmentType === 'medication') {
        breakdown.medication++;
      } else if (entry.treatmentType === 'fluid') {
        breakdown.fluid++;
      }
    }
    return breakdown;
  }

  async getForToday(
    userId: string,
    petId: string,
    plugin?: ReminderPlugin
  ): Promise<ScheduledNotificationEntry[]> {
    return this.loadIndex(userId, petId, this.now(), plugin);
  }

  async getForDate(
    userId: string,
    petId: string,
    date: Date,
    plugin?: ReminderPlugin
  ): Promise<ScheduledNotificationEntry[]> {
    return this.loadIndex(userId, petId, date, plugin);
  }

  async getEntriesForPet(
    userId: string,
    petId: string,
    date: Date
  ): Promise<ScheduledNotificationEntry[]> {
    return this.loadIndex(userId, petId, date);
  }

  async getCountForPet(userId: string, petId: string, date: Date): Promise<number> {
    try {
      const entries = await this.loadIndex(userId, petId, date);
      return entries.length;
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Failed to count index entries');
      return 0;
    }
  }

  /**
   * Add or replace (by notificationId) an entry in today's index
   */
  async putEntry(userId: string, petId: string, entry: ScheduledNotificationEntry): Promise<void> {
    const today = this.now();
    const entries = await this.loadIndex(userId, petId, today);
    const updated = entries.filter((e) => e.notificationId !== entry.notificationId);
    updated.push(entry);
    await this.saveIndex(userId, petId, today, updated);
  }

  async removeEntryBy(
    userId: string,
    petId: string,
    scheduleId: string,
    timeSlotISO: string,
    kind: string
  ): Promise<number> {
    try {
      const today = this.now();
      const entries = await this.loadIndex(userId, petId, today);
      const remaining = entries.filter(
        (e) => !(e.scheduleId === scheduleId && e.timeSlotISO === timeSlotISO && e.kind === kind)
      );
      const removedCount = entries.length - remaining.length;
      if (removedCount > 0) {
        await this.saveIndex(userId, petId, today, remaining);
      }
      return removedCount;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId, timeSlotISO, kind, error: errorMessage(error) },
        'Failed to remove index entry'
      );
      return 0;
    }
  }

  async removeAllForSchedule(userId: string, petId: string, scheduleId: string): Promise<number> {
    try {
      const today = this.now();
      const entries = await this.loadIndex(userId, petId, today);
      const remaining = entries.filter((e) => e.scheduleId !== scheduleId);
      const removedCount = entries.length - remaining.length;
      if (removedCount > 0) {
        await this.saveIndex(userId, petId, today, remaining);
      }
      return removedCount;
    } catch (error) {
      log.error(
        { userId, petId, scheduleId, error: errorMessage(error) },
        'Failed to remove schedule entries'
      );
      return 0;
    }
  }

  async clearForDate(userId: string, petId: string, date: Date): Promise<void> {
    try {
      await this.store.remove(buildIndexKey(userId, petId, date));
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Failed to clear index');
    }
  }

  /**
   * Drop every pet's index for yesterday (midnight rollover)
   * @returns the pets whose index was dropped; empty on failure
   */
  async clearAllForYesterday(): Promise<PetRef[]> {
    try {
      const yesterday = formatDate(addDays(this.now(), -1));
      const suffix = `_${yesterday}`;
      const keys = (await this.store.keys()).filter(
        (key) => key.startsWith(INDEX_KEY_PREFIX) && key.endsWith(suffix)
      );

      const pets: PetRef[] = [];
      for (const key of keys) {
        await this.store.remove(key);
        const pet = parseOwner(key.slice(INDEX_KEY_PREFIX.length, -suffix.length));
        if (pet) {
          pets.push(pet);
        }
      }
      log.debug({ date: yesterday, cleared: keys.length }, 'Cleared indexes for yesterday');
      return pets;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Failed to clear indexes for yesterday');
      return [];
    }
  }

  /**
   * Compare today's index with the plugin's pending notifications
   * Plugin-only ids of this pet are counted (not enough data to rebuild them here);
   * index-only ids are stale and get removed.
   */
  async reconcile(userId: string, petId: string, plugin: ReminderPlugin): Promise<ReconcileResult> {
    try {
      const today = this.now();
      const indexEntries = await this.loadIndex(userId, petId, today);
      const pending = await plugin.pendingNotificationRequests();

      const indexIds = new Set(indexEntries.map((e) => e.notificationId));
      const pluginIds = new Set(pending.map((p) => p.id));

      const added = pendingForPet(pending, userId, petId).filter(
        (p) => !indexIds.has(p.id)
      ).length;
      const staleIds = new Set([...indexIds].filter((id) => !pluginIds.has(id)));

      if (staleIds.size > 0) {
        await this.saveIndex(
          userId,
          petId,
          today,
          indexEntries.filter((e) => !staleIds.has(e.notificationId))
        );
      }

      log.info(
        { event: 'index_reconciliation_performed', userId, petId, added, removed: staleIds.size },
        'Index reconciled'
      );
      return { added, removed: staleIds.size };
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Index reconciliation failed');
      return { added: 0, removed: 0 };
    }
  }

  private async loadIndex(
    userId: string,
    petId: string,
    date: Date,
    plugin?: ReminderPlugin
  ): Promise<ScheduledNotificationEntry[]> {
    const key = buildIndexKey(userId, petId, date);
    try {
      const raw = await this.store.getString(key);
      if (raw === null) {
        return [];
      }

      const entries = this.parseValidated(raw);
      if (entries) {
        return entries;
      }

      log.warn({ userId, petId, key }, 'Index checksum validation failed');
      if (!plugin) {
        log.warn(
          { event: 'index_corruption_detected', userId, petId, date: formatDate(date) },
          'Index corrupt and no plugin available to rebuild'
        );
        return [];
      }

      const rebuilt = await this.rebuildFromPluginState(userId, petId, plugin);
      if (rebuilt.length > 0) {
        await this.saveIndex(userId, petId, date, rebuilt);
        log.info(
          {
            event: 'index_rebuild_success',
            userId,
            petId,
            date: formatDate(date),
            recoveredCount: rebuilt.length,
          },
          'Index rebuilt from plugin state'
        );
        return rebuilt;
      }

      log.warn(
        { event: 'index_rebuild_failed', userId, petId, date: formatDate(date) },
        'Index rebuild found no matching notifications'
      );
      log.warn(
        { event: 'index_corruption_detected', userId, petId, date: formatDate(date) },
        'Index corruption detected'
      );
      return [];
    } catch (error) {
      log.error({ userId, petId, key, error: errorMessage(error) }, 'Failed to load index');
      return [];
    }
  }

  /**
   * Entries when the stored JSON parses and its checksum matches, otherwise null
   */
  private parseValidated(raw: string): ScheduledNotificationEntry[] | null {
    try {
      const stored = StoredIndexSchema.parse(JSON.parse(raw));
      const entries = stored.entries.map(parseScheduledNotificationEntry);
      return computeChecksum(entries) === stored.checksum ? entries : null;
    } catch (error) {
      log.debug({ error: errorMessage(error) }, 'Stored index unreadable');
      return null;
    }
  }

  private async rebuildFromPluginState(
    userId: string,
    petId: string,
    plugin: ReminderPlugin
  ): Promise<ScheduledNotificationEntry[]> {
    try {
      const pending = await plugin.pendingNotificationRequests();
      const entries: ScheduledNotificationEntry[] = [];

      for (const notification of pending) {
        if (!notification.payload) {
          continue;
        }

        let payload: z.infer<typeof PayloadSchema>;
        try {
          payload = PayloadSchema.parse(JSON.parse(notification.payload));
        } catch {
          log.debug({ notificationId: notification.id }, 'Skipping notification with bad payload');
          continue;
        }

        if (payload.userId !== userId || payload.petId !== petId) {
          continue;
        }
        if (
          !isValidKind(payload.kind) ||
          !isValidTreatmentType(payload.treatmentType) ||
          !isValidTimeSlot(payload.timeSlot)
        ) {
          continue;
        }

        entries.push({
          notificationId: notification.id,
          scheduleId: payload.scheduleId,
          treatmentType: payload.treatmentType,
          timeSlotISO: payload.timeSlot,
          kind: payload.kind,
        });
      }

      return entries;
    } catch (error) {
      log.error({ userId, petId, error: errorMessage(error) }, 'Failed to read plugin state');
      return [];
    }
  }

  private async saveIndex(
    userId: string,
    petId: string,
    date: Date,
    entries: ScheduledNotificationEntry[]
  ): Promise<void> {
    const checksum = computeChecksum(entries);
    const payload = { checksum, entries: entries.map(toEntryJson) };
    await this.store.setString(buildIndexKey(userId, petId, date), JSON.stringify(payload));
  }
}
