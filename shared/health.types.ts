/**
 * Health Tracking Types
 */

export const SYMPTOM_TYPES = [
  'vomiting',
  'diarrhea',
  'constipation',
  'lethargy',
  'suppressedAppetite',
  'injectionSiteReaction',
] as const;
export type SymptomType = (typeof SYMPTOM_TYPES)[number];

export const MIN_SYMPTOM_SCORE = 0;
export const MAX_SYMPTOM_SCORE = 10;

export type WeightTrend = 'increasing' | 'decreasing' | 'stable';
