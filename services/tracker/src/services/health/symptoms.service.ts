/**
 * Symptoms Service
 * Daily symptom check-ins stored on the day's health parameter document.
 *
 * Saving a check-in rewrites the day's symptom flags on the daily summary and
 * moves the weekly and monthly day counters by the difference from what the
 * daily summary held before.
 */

import { FieldValue } from '@google-cloud/firestore';
import type { DocumentData, DocumentSnapshot, Firestore, WriteBatch } from '@google-cloud/firestore';
import {
  HEALTH_PARAMETERS_COLLECTION,
  MAX_SYMPTOM_SCORE,
  MIN_SYMPTOM_SCORE,
  SYMPTOM_TYPES,
  petCollectionPath,
} from '../../../../../shared';
import type { SymptomType } from '../../../../../shared';
import logger from '../../logger';
import { DailySummarySchema } from '../../models/daily-summary.model';
import type { DailySummary } from '../../models/daily-summary.model';
import {
  HealthParameterSchema,
  MAX_HEALTH_NOTES_LENGTH,
  computeSymptomTotals,
  getHealthParametersCollection,
  healthParameterDocId,
  healthParameterToFirestore,
  symptomScoreValues,
} from '../../models/health-parameter.model';
import type { HealthParameter, SymptomScores, SymptomTotals } from '../../models/health-parameter.model';
import { startOfDay } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import { summaryTargets } from '../logging/logging.service';
import type { SummaryTarget } from '../logging/logging.service';
import { HealthServiceException, SymptomValidationException } from './health-errors';

export const DEFAULT_RECENT_HEALTH_LIMIT = 30;

const SYMPTOM_FLAGS = {
  vomiting: 'hadVomiting',
  diarrhea: 'hadDiarrhea',
  constipation: 'hadConstipation',
  lethargy: 'hadLethargy',
  suppressedAppetite: 'hadSuppressedAppetite',
  injectionSiteReaction: 'hadInjectionSiteReaction',
} as const satisfies Record<SymptomType, keyof DailySummary>;

export interface SaveSymptomsParams {
  userId: string;
  petId: string;
  date: Date;
  symptoms?: SymptomScores;
  notes?: string;
}

export interface RecentHealthOptions {
  limit?: number;
  symptomsOnly?: boolean;
}

export function validateSymptoms(symptoms?: SymptomScores, notes?: string): string[] {
  const errors: string[] = [];
  for (const type of SYMPTOM_TYPES) {
    const score = symptoms?.[type];
    if (score !== undefined && (score < MIN_SYMPTOM_SCORE || score > MAX_SYMPTOM_SCORE)) {
      errors.push(
        `Symptom score for "${type}" must be between ${MIN_SYMPTOM_SCORE} and ${MAX_SYMPTOM_SCORE}, got: ${score}`
      );
    }
  }
  if (notes !== undefined && notes.length > MAX_HEALTH_NOTES_LENGTH) {
    errors.push(`Notes must be ${MAX_HEALTH_NOTES_LENGTH} characters or less`);
  }
  return errors;
}

function daysWithField(type: SymptomType): string {
  return `daysWith${SYMPTOM_FLAGS[type].slice('had'.length)}`;
}

/**
 * Fields the check-in owns on the daily summary; absent scores clear their max
 */
export function dailySymptomFields(symptoms: SymptomScores | undefined, totals: SymptomTotals): DocumentData {
  const fields: DocumentData = {};
  for (const type of SYMPTOM_TYPES) {
    const score = symptoms?.[type] ?? 0;
    fields[SYMPTOM_FLAGS[type]] = score > 0;
    fields[`${type}MaxScore`] = score > 0 ? score : FieldValue.delete();
  }
  fields.hasSymptoms = totals.hasSymptoms;
  fields.symptomScoreTotal = totals.symptomScoreTotal ?? null;
  fields.symptomScoreAverage = totals.symptomScoreAverage ?? null;
  return fields;
}

/**
 * Weekly or monthly counter changes for one day going from `previous` to the new check-in
 * @param currentMax - the period's symptomScoreMax before this write
 */
export function periodSymptomDeltas(
  previous: DailySummary | null,
  symptoms: SymptomScores | undefined,
  totals: SymptomTotals,
  currentMax: number | undefined
): DocumentData {
  const deltas: DocumentData = {};

  const countChange = (field: string, before: boolean, after: boolean): void => {
    if (before !== after) {
      deltas[field] = FieldValue.increment(after ? 1 : -1);
    }
  };

  for (const type of SYMPTOM_TYPES) {
    countChange(daysWithField(type), previous?.[SYMPTOM_FLAGS[type]] ?? false, (symptoms?.[type] ?? 0) > 0);
  }
  countChange('daysWithAnySymptoms', previous?.hasSymptoms ?? false, totals.hasSymptoms);

  const totalChange = (totals.symptomScoreTotal ?? 0) - (previous?.symptomScoreTotal ?? 0);
  if (totalChange !== 0) {
    deltas.symptomScoreTotal = FieldValue.increment(totalChange);
  }

  const newTotal = totals.symptomScoreTotal;
  if (newTotal !== undefined && (currentMax === undefined || newTotal > currentMax)) {
    deltas.symptomScoreMax = newTotal;
  }
  return deltas;
}

function numberField(snapshot: DocumentSnapshot | undefined, field: string): number | undefined {
  const value: unknown = snapshot?.get(field);
  return typeof value === 'number' ? value : undefined;
}

export class SymptomsService {
  private readonly log = logger.child({ module: 'symptoms' });

  constructor(
    private readonly db: Firestore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Replace the day's check-in; the day's weight is kept, and so are its notes when none are given
   * @throws SymptomValidationException when a score or the notes are out of range
   */
  async saveSymptoms(params: SaveSymptomsParams): Promise<HealthParameter> {
    const { userId, petId, symptoms, notes } = params;
    const errors = validateSymptoms(symptoms, notes);
    if (errors.length > 0) {
      this.log.warn({ userId, errors }, 'Symptom check-in rejected');
      throw new SymptomValidationException(errors);
    }

    const day = startOfDay(params.date);
    const targets = summaryTargets(userId, petId, day);
    const parameterRef = this.parameterRef(userId, petId, day);

    let snapshots: DocumentSnapshot[];
    try {
      snapshots = await this.db.getAll(parameterRef, ...targets.map((target) => this.db.doc(target.path)));
    } catch (error) {
      this.log.error({ userId, petId, error: errorMessage(error) }, 'Symptom check-in read failed');
      throw new HealthServiceException(`Failed to save symptoms: ${errorMessage(error)}`, 'symptoms');
    }
    const [parameterSnapshot, dailySnapshot, ...periodSnapshots] = snapshots;

    const existing = parameterSnapshot?.exists ? HealthParameterSchema.parse(parameterSnapshot.data()) : null;
    const previousDaily = dailySnapshot?.exists ? DailySummarySchema.parse(dailySnapshot.data()) : null;
    const totals = computeSymptomTotals(symptoms);
    const now = this.now();

    const parameter: HealthParameter = {
      date: day,
      weight: existing?.weight,
      hasWeight: existing?.hasWeight,
      symptoms,
      hasSymptoms: totals.hasSymptoms,
      symptomScoreTotal: totals.symptomScoreTotal,
      symptomScoreAverage: totals.symptomScoreAverage,
      notes: notes ?? existing?.notes,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    const batch = this.db.batch();
    batch.set(parameterRef, healthParameterToFirestore(parameter));

    const [dailyTarget, ...periodTargets] = targets;
    this.setSummary(batch, dailyTarget, dailySnapshot, dailySymptomFields(symptoms, totals));
    periodTargets.forEach((target, index) => {
      const snapshot = periodSnapshots[index];
      const deltas = periodSymptomDeltas(previousDaily, symptoms, totals, numberField(snapshot, 'symptomScoreMax'));
      this.setSummary(batch, target, snapshot, deltas);
    });

    try {
      await batch.commit();
    } catch (error) {
      this.log.error({ userId, petId, error: errorMessage(error) }, 'Symptoms batch write failed');
      throw new HealthServiceException(`Failed to save symptoms: ${errorMessage(error)}`, 'symptoms');
    }

    this.log.info(
      {
        event: existing?.hasSymptoms ? 'symptoms_updated' : 'symptoms_logged',
        userId,
        petId,
        date: healthParameterDocId(day),
        symptomCount: symptomScoreValues(symptoms).filter((score) => score > 0).length,
        totalScore: totals.symptomScoreTotal,
      },
      'Symptom check-in saved'
    );
    return parameter;
  }

  /**
   * Save an empty check-in for the day
   */
  async clearSymptoms(userId: string, petId: string, date: Date): Promise<HealthParameter> {
    return this.saveSymptoms({ userId, petId, date });
  }

  async getDailyHealth(userId: string, petId: string, date: Date): Promise<HealthParameter | null> {
    try {
      const snapshot = await this.parameterRef(userId, petId, startOfDay(date)).get();
      return snapshot.exists ? HealthParameterSchema.parse(snapshot.data()) : null;
    } catch (error) {
      throw new HealthServiceException(`Failed to fetch health parameter: ${errorMessage(error)}`, 'symptoms');
    }
  }

  /**
   * Newest first
   */
  async getRecentHealth(
    userId: string,
    petId: string,
    options: RecentHealthOptions = {}
  ): Promise<HealthParameter[]> {
    try {
      const collection = getHealthParametersCollection(this.db, userId, petId);
      const filtered = options.symptomsOnly ? collection.where('hasSymptoms', '==', true) : collection;
      const snapshot = await filtered
        .orderBy('date', 'desc')
        .limit(options.limit ?? DEFAULT_RECENT_HEALTH_LIMIT)
        .get();
      return snapshot.docs.map((doc) => doc.data());
    } catch (error) {
      throw new HealthServiceException(`Failed to fetch recent health: ${errorMessage(error)}`, 'symptoms');
    }
  }

  // Creation fields only go on summaries that do not exist yet
  private setSummary(
    batch: WriteBatch,
    target: SummaryTarget,
    snapshot: DocumentSnapshot | undefined,
    fields: DocumentData
  ): void {
    const creation = snapshot?.exists
      ? {}
      : { ...target.initial, createdAt: FieldValue.serverTimestamp() };
    batch.set(
      this.db.doc(target.path),
      { ...target.header, ...creation, ...fields, updatedAt: FieldValue.serverTimestamp() },
      { merge: true }
    );
  }

  private parameterRef(userId: string, petId: string, date: Date) {
    return this.db.doc(
      `${petCollectionPath(userId, petId, HEALTH_PARAMETERS_COLLECTION)}/${healthParameterDocId(date)}`
    );
  }
}
