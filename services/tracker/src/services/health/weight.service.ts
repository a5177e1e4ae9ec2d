/**
 * Weight Service
 * A weight entry lives on its day's health parameter document. Every write also
 * refreshes the weight fields of each affected monthly summary and the pet's
 * latest weight, all in one batch.
 *
 * Monthly figures are recomputed from the month's entries rather than
 * incremented, so moving or deleting an entry cannot leave them skewed.
 */

import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type { DocumentData, Firestore, WriteBatch } from '@google-cloud/firestore';
import { HEALTH_PARAMETERS_COLLECTION, petCollectionPath, petPath, summaryDocPath } from '../../../../../shared';
import type { WeightTrend } from '../../../../../shared';
import logger from '../../logger';
import {
  HealthParameterSchema,
  MAX_HEALTH_NOTES_LENGTH,
  getHealthParametersCollection,
  healthParameterDocId,
} from '../../models/health-parameter.model';
import type { HealthParameter } from '../../models/health-parameter.model';
import { addMonths, formatMonthId, isSameDay, startOfDay, startOfMonth } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import {
  HealthServiceException,
  WeightNotFoundException,
  WeightValidationException,
} from './health-errors';

export const MAX_WEIGHT_KG = 15;
export const DEFAULT_WEIGHT_HISTORY_LIMIT = 50;
const TREND_THRESHOLD_KG = 0.1;

export interface WeightEntry {
  date: Date;
  weightKg: number;
  notes?: string;
}

export interface LogWeightParams extends WeightEntry {
  userId: string;
  petId: string;
}

export interface UpdateWeightParams extends LogWeightParams {
  oldDate: Date;
}

export interface WeightHistoryOptions {
  limit?: number;
  startAfter?: Date;
}

export interface MonthlyWeightStats {
  weightEntriesCount: number;
  weightFirst: number | null;
  weightFirstDate: Date | null;
  weightLatest: number | null;
  weightLatestDate: Date | null;
  weightChange: number;
  weightChangePercent: number;
  weightTrend: WeightTrend;
}

interface WeightChange {
  remove?: Date;
  upsert?: WeightEntry;
}

interface ChangeState {
  existingUpsert: HealthParameter | null;
  existingRemove: HealthParameter | null;
  monthEntries: Map<string, WeightEntry[]>;
  newest: WeightEntry[];
}

export function validateWeightEntry(weightKg: number, notes?: string): string[] {
  const errors: string[] = [];
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    errors.push('Weight must be greater than 0');
  } else if (weightKg > MAX_WEIGHT_KG) {
    errors.push(
      `Weight of ${weightKg.toFixed(1)}kg is extremely high for a cat. Please verify this is correct`
    );
  }
  if (notes !== undefined && notes.length > MAX_HEALTH_NOTES_LENGTH) {
    errors.push(`Notes must be ${MAX_HEALTH_NOTES_LENGTH} characters or less`);
  }
  return errors;
}

export function calculateWeightTrend(change: number): WeightTrend {
  if (change > TREND_THRESHOLD_KG) return 'increasing';
  if (change < -TREND_THRESHOLD_KG) return 'decreasing';
  return 'stable';
}

/**
 * Month figures from its entries; change is latest against the entry before it
 */
export function calculateMonthlyWeightStats(entries: WeightEntry[]): MonthlyWeightStats {
  const sorted = [...entries].sort((a, b) => a.date.getTime() - b.date.getTime());
  const first = sorted[0];
  const latest = sorted[sorted.length - 1];
  const previous = sorted.length > 1 ? sorted[sorted.length - 2] : undefined;
  const change = latest && previous ? latest.weightKg - previous.weightKg : 0;

  return {
    weightEntriesCount: sorted.length,
    weightFirst: first?.weightKg ?? null,
    weightFirstDate: first?.date ?? null,
    weightLatest: latest?.weightKg ?? null,
    weightLatestDate: latest?.date ?? null,
    weightChange: change,
    weightChangePercent: previous ? (change / previous.weightKg) * 100 : 0,
    weightTrend: calculateWeightTrend(change),
  };
}

function applyChange(entries: WeightEntry[], change: WeightChange): WeightEntry[] {
  const kept = entries.filter(
    (entry) =>
      !(change.remove && isSameDay(entry.date, change.remove)) &&
      !(change.upsert && isSameDay(entry.date, change.upsert.date))
  );
  return change.upsert ? [...kept, change.upsert] : kept;
}

function toWeightEntry(parameter: HealthParameter): WeightEntry[] {
  if (parameter.weight === undefined) {
    return [];
  }
  return [{ date: parameter.date, weightKg: parameter.weight, notes: parameter.notes }];
}

function hasOtherHealthData(parameter: HealthParameter): boolean {
  return parameter.symptoms !== undefined && Object.keys(parameter.symptoms).length > 0;
}

function optionalTimestamp(date: Date | null): Timestamp | null {
  return date ? Timestamp.fromDate(date) : null;
}

export class WeightService {
  private readonly log = logger.child({ module: 'weight' });

  constructor(private readonly db: Firestore) {}

  /**
   * Record the weight for a day; an entry already on that day is replaced
   * @throws WeightValidationException when the weight or notes are out of range
   */
  async logWeight(params: LogWeightParams): Promise<WeightEntry> {
    const { userId, petId } = params;
    this.assertValid(params);

    const entry: WeightEntry = { ...params, date: startOfDay(params.date) };
    await this.writeChange(userId, petId, { upsert: entry }, 'log');

    this.log.info(
      { event: 'weight_logged', userId, petId, date: healthParameterDocId(entry.date), weightKg: entry.weightKg },
      'Weight logged'
    );
    return { date: entry.date, weightKg: entry.weightKg, notes: entry.notes };
  }

  /**
   * Change the weight of an entry, possibly moving it to another day
   * @throws WeightNotFoundException when there is no entry on `oldDate`
   */
  async updateWeight(params: UpdateWeightParams): Promise<WeightEntry> {
    const { userId, petId } = params;
    this.assertValid(params);

    const oldDate = startOfDay(params.oldDate);
    const entry: WeightEntry = { ...params, date: startOfDay(params.date) };
    await this.writeChange(userId, petId, { remove: oldDate, upsert: entry }, 'update');

    this.log.info(
      {
        event: 'weight_updated',
        userId,
        petId,
        from: healthParameterDocId(oldDate),
        to: healthParameterDocId(entry.date),
      },
      'Weight updated'
    );
    return { date: entry.date, weightKg: entry.weightKg, notes: entry.notes };
  }

  /**
   * @throws WeightNotFoundException when there is no entry on `date`
   */
  async deleteWeight(userId: string, petId: string, date: Date): Promise<void> {
    const day = startOfDay(date);
    await this.writeChange(userId, petId, { remove: day }, 'delete');
    this.log.info({ event: 'weight_deleted', userId, petId, date: healthParameterDocId(day) }, 'Weight deleted');
  }

  /**
   * Newest first
   */
  async getWeightHistory(
    userId: string,
    petId: string,
    options: WeightHistoryOptions = {}
  ): Promise<WeightEntry[]> {
    try {
      let query = getHealthParametersCollection(this.db, userId, petId)
        .where('hasWeight', '==', true)
        .orderBy('date', 'desc')
        .limit(options.limit ?? DEFAULT_WEIGHT_HISTORY_LIMIT);
      if (options.startAfter) {
        query = query.startAfter(Timestamp.fromDate(options.startAfter));
      }

      const snapshot = await query.get();
      return snapshot.docs.flatMap((doc) => toWeightEntry(doc.data()));
    } catch (error) {
      throw new HealthServiceException(`Failed to fetch weight history: ${errorMessage(error)}`, 'weight');
    }
  }

  async getLatestWeight(userId: string, petId: string): Promise<WeightEntry | null> {
    try {
      const [latest] = await this.newestEntries(userId, petId, 1);
      return latest ?? null;
    } catch (error) {
      throw new HealthServiceException(`Failed to fetch latest weight: ${errorMessage(error)}`, 'weight');
    }
  }

  /**
   * @throws WeightNotFoundException when `change.remove` names a day without a weight
   */
  private async writeChange(
    userId: string,
    petId: string,
    change: WeightChange,
    operation: string
  ): Promise<void> {
    const { remove, upsert } = change;
    const state = await this.readState(userId, petId, change).catch((error: unknown) => {
      throw new HealthServiceException(`Failed to ${operation} weight: ${errorMessage(error)}`, 'weight');
    });
    const { existingUpsert, existingRemove, monthEntries, newest } = state;

    if (remove && existingRemove?.weight === undefined) {
      throw new WeightNotFoundException(healthParameterDocId(remove));
    }

    const batch = this.db.batch();

    if (remove && existingRemove && !(upsert && isSameDay(remove, upsert.date))) {
      this.addRemoval(batch, userId, petId, remove, existingRemove);
    }
    if (upsert) {
      this.addUpsert(batch, userId, petId, upsert, existingUpsert);
    }

    for (const [monthId, entries] of monthEntries) {
      const stats = calculateMonthlyWeightStats(applyChange(entries, change));
      batch.set(
        this.db.doc(summaryDocPath(userId, petId, 'monthly', monthId)),
        {
          ...stats,
          weightFirstDate: optionalTimestamp(stats.weightFirstDate),
          weightLatestDate: optionalTimestamp(stats.weightLatestDate),
          updatedAt: FieldValue.serverTimestamp(),
        },
        { merge: true }
      );
    }

    const [latest] = applyChange(newest, change).sort((a, b) => b.date.getTime() - a.date.getTime());
    batch.set(
      this.db.doc(petPath(userId, petId)),
      { weightKg: latest?.weightKg ?? null, updatedAt: FieldValue.serverTimestamp() },
      { merge: true }
    );

    await this.commit(batch, operation);
  }

  private async readState(userId: string, petId: string, change: WeightChange): Promise<ChangeState> {
    const { remove, upsert } = change;
    const months = new Map<string, Date>();
    for (const date of [upsert?.date, remove]) {
      if (date) {
        months.set(formatMonthId(date), startOfMonth(date));
      }
    }

    const monthEntries = new Map<string, WeightEntry[]>();
    for (const [monthId, monthStart] of months) {
      monthEntries.set(monthId, await this.monthEntries(userId, petId, monthStart));
    }

    return {
      existingUpsert: upsert ? await this.readParameter(userId, petId, upsert.date) : null,
      existingRemove: remove ? await this.readParameter(userId, petId, remove) : null,
      monthEntries,
      newest: await this.newestEntries(userId, petId, 2),
    };
  }

  private addUpsert(
    batch: WriteBatch,
    userId: string,
    petId: string,
    entry: WeightEntry,
    existing: HealthParameter | null
  ): void {
    const data: DocumentData = {
      date: Timestamp.fromDate(entry.date),
      weight: entry.weightKg,
      hasWeight: true,
      updatedAt: FieldValue.serverTimestamp(),
    };
    if (entry.notes !== undefined) {
      data.notes = entry.notes;
    }
    if (!existing) {
      data.createdAt = FieldValue.serverTimestamp();
    }
    batch.set(this.parameterRef(userId, petId, entry.date), data, { merge: true });
  }

  // Symptoms recorded on the same day keep the document alive
  private addRemoval(
    batch: WriteBatch,
    userId: string,
    petId: string,
    date: Date,
    existing: HealthParameter
  ): void {
    const ref = this.parameterRef(userId, petId, date);
    if (hasOtherHealthData(existing)) {
      batch.set(
        ref,
        { weight: FieldValue.delete(), hasWeight: false, updatedAt: FieldValue.serverTimestamp() },
        { merge: true }
      );
      return;
    }
    batch.delete(ref);
  }

  private async readParameter(userId: string, petId: string, date: Date): Promise<HealthParameter | null> {
    const snapshot = await this.parameterRef(userId, petId, date).get();
    const data = snapshot.data();
    return data ? HealthParameterSchema.parse(data) : null;
  }

  private async monthEntries(userId: string, petId: string, monthStart: Date): Promise<WeightEntry[]> {
    const snapshot = await getHealthParametersCollection(this.db, userId, petId)
      .where('hasWeight', '==', true)
      .where('date', '>=', Timestamp.fromDate(monthStart))
      .where('date', '<', Timestamp.fromDate(addMonths(monthStart, 1)))
      .orderBy('date', 'asc')
      .get();
    return snapshot.docs.flatMap((doc) => toWeightEntry(doc.data()));
  }

  private async newestEntries(userId: string, petId: string, limit: number): Promise<WeightEntry[]> {
    const snapshot = await getHealthParametersCollection(this.db, userId, petId)
      .where('hasWeight', '==', true)
      .orderBy('date', 'desc')
      .limit(limit)
      .get();
    return snapshot.docs.flatMap((doc) => toWeightEntry(doc.data()));
  }

  private parameterRef(userId: string, petId: string, date: Date) {
    return this.db.doc(
      `${petCollectionPath(userId, petId, HEALTH_PARAMETERS_COLLECTION)}/${healthParameterDocId(date)}`
    );
  }

  private assertValid(params: LogWeightParams): void {
    const errors = validateWeightEntry(params.weightKg, params.notes);
    if (errors.length > 0) {
      this.log.warn({ userId: params.userId, errors }, 'Weight entry rejected');
      throw new WeightValidationException(errors);
    }
  }

  private async commit(batch: WriteBatch, operation: string): Promise<void> {
    try {
      await batch.commit();
    } catch (error) {
      this.log.error({ operation, error: errorMessage(error) }, 'Weight batch write failed');
      throw new HealthServiceException(`Failed to ${operation} weight: ${errorMessage(error)}`, 'weight');
    }
  }
}
