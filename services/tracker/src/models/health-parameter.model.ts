/**
 * Health Parameter Model
 * Schema for 'users/{userId}/pets/{petId}/healthParameters/{YYYY-MM-DD}' (one per day)
 *
 * A day's weight and symptom scores share the document; each feature writes
 * its own fields and keeps the other's.
 */

import { z } from 'zod';
import type { DocumentData, Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { HEALTH_PARAMETERS_COLLECTION, SYMPTOM_TYPES, petCollectionPath } from '../../../../shared';
import { formatDate } from '../utils/date-utils';
import { DateFieldSchema, toOptionalTimestamp, toTimestamp } from './date-field';

export const MAX_HEALTH_NOTES_LENGTH = 500;

// Range is checked by the symptoms service so the caller gets a readable error
export const SymptomScoresSchema = z.record(z.enum(SYMPTOM_TYPES), z.number().int());

export type SymptomScores = z.infer<typeof SymptomScoresSchema>;

export const HealthParameterSchema = z.object({
  date: DateFieldSchema,
  weight: z.number().optional(),
  hasWeight: z.boolean().optional(),
  symptoms: SymptomScoresSchema.optional(),
  hasSymptoms: z.boolean().optional(),
  symptomScoreTotal: z.number().int().optional(),
  symptomScoreAverage: z.number().optional(),
  notes: z.string().optional(),
  createdAt: DateFieldSchema.optional(),
  updatedAt: DateFieldSchema.optional(),
});

export type HealthParameter = z.infer<typeof HealthParameterSchema>;

export interface SymptomTotals {
  hasSymptoms: boolean;
  symptomScoreTotal?: number;
  symptomScoreAverage?: number;
}

export function symptomScoreValues(symptoms: SymptomScores | undefined): number[] {
  return SYMPTOM_TYPES.flatMap((type) => {
    const score = symptoms?.[type];
    return score === undefined ? [] : [score];
  });
}

/**
 * Derived fields stored beside the scores; no scores means no total or average
 */
export function computeSymptomTotals(symptoms: SymptomScores | undefined): SymptomTotals {
  const scores = symptomScoreValues(symptoms);
  if (scores.length === 0) {
    return { hasSymptoms: false };
  }

  const total = scores.reduce((sum, score) => sum + score, 0);
  return {
    hasSymptoms: scores.some((score) => score > 0),
    symptomScoreTotal: total,
    symptomScoreAverage: total / scores.length,
  };
}

export function healthParameterDocId(date: Date): string {
  return formatDate(date);
}

export function healthParameterToFirestore(parameter: HealthParameter): DocumentData {
  return {
    ...parameter,
    date: toTimestamp(parameter.date),
    createdAt: toOptionalTimestamp(parameter.createdAt),
    updatedAt: toOptionalTimestamp(parameter.updatedAt),
  };
}

export const healthParameterConverter = {
  toFirestore: (parameter: HealthParameter): DocumentData => healthParameterToFirestore(parameter),
  fromFirestore: (snapshot: QueryDocumentSnapshot): HealthParameter =>
    HealthParameterSchema.parse(snapshot.data()),
};

export function getHealthParametersCollection(db: Firestore, userId: string, petId: string) {
  return db
    .collection(petCollectionPath(userId, petId, HEALTH_PARAMETERS_COLLECTION))
    .withConverter(healthParameterConverter);
}
