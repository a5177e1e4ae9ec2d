/**
 * Quality of Life Types
 */

export const QOL_DOMAINS = [
  'vitality',
  'comfort',
  'emotional',
  'appetite',
  'treatmentBurden',
] as const;
export type QolDomain = (typeof QOL_DOMAINS)[number];

export type QolScoreBand = 'veryGood' | 'good' | 'fair' | 'low';

export type TrendStability = 'stable' | 'improving' | 'declining';

export type QolInterpretation =
  | 'notableDropComfort'
  | 'notableDropAppetite'
  | 'notableDropVitality'
  | 'notableDropEmotional'
  | 'notableDropTreatmentBurden'
  | 'improving'
  | 'declining'
  | 'stable';
