/**
 * QoL scoring
 * Domain and overall scores on a 0-100 scale, score bands, validation and trend analysis.
 * Answers are 0-4; a domain needs at least half its questions answered to be scored.
 */

import type {
  QolDomain,
  QolInterpretation,
  QolScoreBand,
  TrendStability,
} from '../../../../../shared';
import type { QolAssessment, QolResponse } from '../../models/qol-assessment.model';
import { calendarDaysBetween } from '../../utils/date-utils';
import { getQuestionById, getQuestionsByDomain } from './qol-questions';

export const MIN_SCORE = 0;
export const MAX_SCORE = 4;
const MIN_DOMAIN_COVERAGE = 0.5;

const TREND_MIN_POINTS = 3;
const TREND_SLOPE_THRESHOLD = 5; // points per 30 days
const NOTABLE_DROP = 15;
const OVERALL_CHANGE = 10;

// Order matters: the first domain with a notable drop wins
const DROP_CHECKS: ReadonlyArray<[QolDomain, QolInterpretation]> = [
  ['comfort', 'notableDropComfort'],
  ['appetite', 'notableDropAppetite'],
  ['vitality', 'notableDropVitality'],
  ['emotional', 'notableDropEmotional'],
  ['treatmentBurden', 'notableDropTreatmentBurden'],
];

export type DomainScores = Record<QolDomain, number | null>;

/**
 * One point of a QoL trend
 */
export interface QolTrendSummary {
  date: Date;
  overallScore: number;
  domainScores: Partial<DomainScores>;
}

export function calculateDomainScore(domain: QolDomain, responses: QolResponse[]): number | null {
  const total = getQuestionsByDomain(domain).length;
  const scores = responses.flatMap((response) =>
    response.score !== null && getQuestionById(response.questionId)?.domain === domain
      ? [response.score]
      : []
  );

  if (scores.length === 0 || scores.length < total * MIN_DOMAIN_COVERAGE) {
    return null;
  }

  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return (mean / MAX_SCORE) * 100;
}

export function calculateDomainScores(responses: QolResponse[]): DomainScores {
  return {
    vitality: calculateDomainScore('vitality', responses),
    comfort: calculateDomainScore('comfort', responses),
    emotional: calculateDomainScore('emotional', responses),
    appetite: calculateDomainScore('appetite', responses),
    treatmentBurden: calculateDomainScore('treatmentBurden', responses),
  };
}

/**
 * Mean of the domain scores; null while any domain lacks enough answers
 */
export function calculateOverallScore(responses: QolResponse[]): number | null {
  const scores = Object.values(calculateDomainScores(responses));
  let sum = 0;
  for (const score of scores) {
    if (score === null) {
      return null;
    }
    sum += score;
  }
  return sum / scores.length;
}

export function scoreBand(score: number | null): QolScoreBand | null {
  if (score === null) return null;
  if (score >= 80) return 'veryGood';
  if (score >= 60) return 'good';
  if (score >= 40) return 'fair';
  return 'low';
}

/**
 * @returns human-readable errors; empty when the assessment can be saved
 */
export function validateQolAssessment(assessment: QolAssessment, now: Date = new Date()): string[] {
  const errors: string[] = [];

  if (assessment.date.getTime() > now.getTime()) {
    errors.push('Assessment date cannot be in the future');
  }

  for (const { questionId, score } of assessment.responses) {
    if (score !== null && (score < MIN_SCORE || score > MAX_SCORE)) {
      errors.push(`Invalid score ${score} for question ${questionId}`);
    }
  }

  for (const { questionId } of assessment.responses) {
    if (!getQuestionById(questionId)) {
      errors.push(`Invalid question ID: ${questionId}`);
    }
  }

  const ids = assessment.responses.map((response) => response.questionId);
  if (new Set(ids).size !== ids.length) {
    errors.push('Duplicate question responses found');
  }

  return errors;
}

/**
 * Trend summary of a scored assessment, or null when it has no overall score
 */
export function toTrendSummary(assessment: QolAssessment): QolTrendSummary | null {
  const overallScore = calculateOverallScore(assessment.responses);
  if (overallScore === null) {
    return null;
  }
  return {
    date: assessment.date,
    overallScore,
    domainScores: calculateDomainScores(assessment.responses),
  };
}

/**
 * Least-squares slope of the overall score, scaled to 30 days
 * @param trends - newest first
 */
export function calculateTrendStability(trends: QolTrendSummary[]): TrendStability {
  if (trends.length < TREND_MIN_POINTS) {
    return 'stable';
  }

  const first = trends[trends.length - 1].date;
  const points = trends.map((trend) => ({
    x: calendarDaysBetween(first, trend.date),
    y: trend.overallScore,
  }));

  const n = points.length;
  const sumX = points.reduce((sum, p) => sum + p.x, 0);
  const sumY = points.reduce((sum, p) => sum + p.y, 0);
  const sumXY = points.reduce((sum, p) => sum + p.x * p.y, 0);
  const sumXX = points.reduce((sum, p) => sum + p.x * p.x, 0);

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) {
    return 'stable';
  }

  const slopePerMonth = ((n * sumXY - sumX * sumY) / denominator) * 30;
  if (slopePerMonth > TREND_SLOPE_THRESHOLD) return 'improving';
  if (slopePerMonth < -TREND_SLOPE_THRESHOLD) return 'declining';
  return 'stable';
}

/**
 * Whether a domain dropped by at least 15 points between consecutive assessments.
 * A drop must also hold against the assessment before the previous one, unless
 * the previous one is the oldest.
 * @param trends - newest first
 */
export function hasNotableChange(trends: QolTrendSummary[], domain: QolDomain): boolean {
  const scores = trends.flatMap((trend) => {
    const score = trend.domainScores[domain];
    return score === null || score === undefined ? [] : [score];
  });

  if (scores.length < TREND_MIN_POINTS) {
    return false;
  }

  for (let i = 0; i < scores.length - 1; i++) {
    const current = scores[i];
    if (scores[i + 1] - current < NOTABLE_DROP) {
      continue;
    }
    if (i === scores.length - 2 || scores[i + 2] - current >= NOTABLE_DROP) {
      return true;
    }
  }
  return false;
}

function domainDelta(
  current: QolTrendSummary,
  previous: QolTrendSummary,
  domain: QolDomain
): number | null {
  const now = current.domainScores[domain];
  const before = previous.domainScores[domain];
  if (now === null || now === undefined || before === null || before === undefined) {
    return null;
  }
  return now - before;
}

/**
 * Interpretation of the latest assessment against the one before it
 * @returns null without a previous assessment
 */
export function generateInterpretation(
  current: QolTrendSummary,
  previous: QolTrendSummary | null | undefined
): QolInterpretation | null {
  if (!previous) {
    return null;
  }

  for (const [domain, interpretation] of DROP_CHECKS) {
    const delta = domainDelta(current, previous, domain);
    if (delta !== null && delta <= -NOTABLE_DROP) {
      return interpretation;
    }
  }

  const delta = current.overallScore - previous.overallScore;
  if (delta > OVERALL_CHANGE) return 'improving';
  if (delta < -OVERALL_CHANGE) return 'declining';
  return 'stable';
}
