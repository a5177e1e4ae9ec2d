/**
 * Daily Summary Model
 * Read side of 'treatmentSummaries/daily/summaries/{YYYY-MM-DD}'
 *
 * Counters are maintained with FieldValue.increment by the logging service;
 * QoL scores are denormalized here by the QoL service, symptom flags by the
 * symptoms service.
 */

import { z } from 'zod';
import type { QueryDocumentSnapshot } from '@google-cloud/firestore';

const nullableScore = z.number().nullable().default(null);

export const DailySummarySchema = z.object({
  date: z.string().optional(), // YYYY-MM-DD

  medicationTotalDoses: z.number().default(0),
  medicationScheduledDoses: z.number().default(0),
  medicationMissedCount: z.number().default(0),

  fluidTotalVolume: z.number().default(0),
  fluidSessionCount: z.number().default(0),
  fluidTreatmentDone: z.boolean().default(false),

  overallStreak: z.number().default(0),

  hasQolAssessment: z.boolean().default(false),
  qolOverallScore: nullableScore,
  qolVitalityScore: nullableScore,
  qolComfortScore: nullableScore,
  qolEmotionalScore: nullableScore,
  qolAppetiteScore: nullableScore,
  qolTreatmentBurdenScore: nullableScore,

  hadVomiting: z.boolean().default(false),
  hadDiarrhea: z.boolean().default(false),
  hadConstipation: z.boolean().default(false),
  hadLethargy: z.boolean().default(false),
  hadSuppressedAppetite: z.boolean().default(false),
  hadInjectionSiteReaction: z.boolean().default(false),
  hasSymptoms: z.boolean().default(false),
  symptomScoreTotal: nullableScore,
  symptomScoreAverage: nullableScore,
});

export type DailySummary = z.infer<typeof DailySummarySchema>;

/**
 * Whether any treatment was logged (given or missed) on the summary's day
 */
export function hasAnySessions(summary: DailySummary): boolean {
  return (
    summary.medicationTotalDoses + summary.medicationMissedCount > 0 ||
    summary.fluidSessionCount > 0
  );
}

export const dailySummaryConverter = {
  toFirestore: (summary: DailySummary) => summary,
  fromFirestore: (snapshot: QueryDocumentSnapshot): DailySummary =>
    DailySummarySchema.parse(snapshot.data()),
};
