/**
 * QoL Assessment Model
 * Schema for 'users/{userId}/pets/{petId}/qolAssessments/{YYYY-MM-DD}' (one per day)
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { DocumentData, Firestore, QueryDocumentSnapshot } from '@google-cloud/firestore';
import { QOL_ASSESSMENTS_COLLECTION, petCollectionPath } from '../../../../shared';
import { formatDate, startOfDay } from '../utils/date-utils';
import { DateFieldSchema, toOptionalTimestamp, toTimestamp } from './date-field';

export const QOL_QUESTION_COUNT = 14;

// Range is checked by validateQolAssessment so the caller gets a readable error
export const QolResponseSchema = z.object({
  questionId: z.string(),
  score: z.number().int().nullable(),
});

export type QolResponse = z.infer<typeof QolResponseSchema>;

export const QolAssessmentSchema = z.object({
  id: z.string(),
  userId: z.string(),
  petId: z.string(),
  date: DateFieldSchema,
  responses: z.array(QolResponseSchema).default([]),
  createdAt: DateFieldSchema,
  updatedAt: DateFieldSchema.optional(),
  completionDurationSeconds: z.number().int().nonnegative().optional(),
});

export type QolAssessment = z.infer<typeof QolAssessmentSchema>;

/**
 * Body accepted when a caller submits an assessment
 */
export const QolAssessmentInputSchema = z.object({
  date: DateFieldSchema.optional(),
  responses: z.array(QolResponseSchema),
  completionDurationSeconds: z.number().int().nonnegative().optional(),
});

export type QolAssessmentInput = z.infer<typeof QolAssessmentInputSchema>;

export function createQolAssessment(
  userId: string,
  petId: string,
  input: QolAssessmentInput,
  now: Date = new Date()
): QolAssessment {
  return {
    id: randomUUID(),
    userId,
    petId,
    date: startOfDay(input.date ?? now),
    responses: input.responses,
    createdAt: now,
    completionDurationSeconds: input.completionDurationSeconds,
  };
}

export function assessmentDocId(date: Date): string {
  return formatDate(date);
}

export function isAnswered(response: QolResponse): boolean {
  return response.score !== null;
}

export function answeredCount(assessment: QolAssessment): number {
  return assessment.responses.filter(isAnswered).length;
}

export function isAssessmentComplete(assessment: QolAssessment): boolean {
  return answeredCount(assessment) === QOL_QUESTION_COUNT;
}

export function qolAssessmentToFirestore(assessment: QolAssessment): DocumentData {
  return {
    ...assessment,
    date: toTimestamp(assessment.date),
    createdAt: toTimestamp(assessment.createdAt),
    updatedAt: toOptionalTimestamp(assessment.updatedAt),
  };
}

export const qolAssessmentConverter = {
  toFirestore: (assessment: QolAssessment): DocumentData => qolAssessmentToFirestore(assessment),
  fromFirestore: (snapshot: QueryDocumentSnapshot): QolAssessment =>
    QolAssessmentSchema.parse(snapshot.data()),
};

export function getQolAssessmentsCollection(db: Firestore, userId: string, petId: string) {
  return db
    .collection(petCollectionPath(userId, petId, QOL_ASSESSMENTS_COLLECTION))
    .withConverter(qolAssessmentConverter);
}
