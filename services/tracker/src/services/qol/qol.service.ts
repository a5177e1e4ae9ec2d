/**
 * QoL Service
 * Stores one assessment per pet per day and mirrors its scores onto the daily summary
 */

import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type { DocumentData, Firestore, WriteBatch } from '@google-cloud/firestore';
import { QOL_DOMAINS, summaryDocPath } from '../../../../../shared';
import type {
  QolDomain,
  QolInterpretation,
  SummaryPeriod,
  TrendStability,
} from '../../../../../shared';
import logger from '../../logger';
import {
  answeredCount,
  assessmentDocId,
  getQolAssessmentsCollection,
} from '../../models/qol-assessment.model';
import type { QolAssessment } from '../../models/qol-assessment.model';
import { formatDate, formatMonthId, formatWeekId } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import { QolServiceException, QolValidationException } from './qol-errors';
import {
  calculateDomainScores,
  calculateOverallScore,
  calculateTrendStability,
  generateInterpretation,
  hasNotableChange,
  scoreBand,
  toTrendSummary,
  validateQolAssessment,
} from './qol-scoring.service';
import type { QolTrendSummary } from './qol-scoring.service';

export const DEFAULT_RECENT_LIMIT = 20;

const PERIOD_IDS: Record<SummaryPeriod, (date: Date) => string> = {
  daily: formatDate,
  weekly: formatWeekId,
  monthly: formatMonthId,
};

export interface RecentAssessmentsOptions {
  limit?: number;
  startAfter?: Date;
}

export interface QolTrend {
  points: QolTrendSummary[];
  stability: TrendStability;
  interpretation: QolInterpretation | null;
  notableDrops: QolDomain[];
}

function dailyScoreFields(assessment: QolAssessment): DocumentData {
  const domains = calculateDomainScores(assessment.responses);
  return {
    qolOverallScore: calculateOverallScore(assessment.responses),
    qolVitalityScore: domains.vitality,
    qolComfortScore: domains.comfort,
    qolEmotionalScore: domains.emotional,
    qolAppetiteScore: domains.appetite,
    qolTreatmentBurdenScore: domains.treatmentBurden,
    hasQolAssessment: true,
    updatedAt: FieldValue.serverTimestamp(),
  };
}

const CLEARED_SCORE_FIELDS: DocumentData = {
  qolOverallScore: null,
  qolVitalityScore: null,
  qolComfortScore: null,
  qolEmotionalScore: null,
  qolAppetiteScore: null,
  qolTreatmentBurdenScore: null,
  hasQolAssessment: false,
};

export class QolService {
  private readonly log = logger.child({ module: 'qol' });

  constructor(
    private readonly db: Firestore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Write the assessment and its scores on the daily summary; touch the weekly and monthly ones
   * @throws QolValidationException when the assessment does not validate
   */
  async saveAssessment(assessment: QolAssessment): Promise<void> {
    this.assertValid(assessment);

    const { userId, petId, date } = assessment;
    const batch = this.db.batch();
    batch.set(this.assessmentRef(userId, petId, date), assessment);
    batch.set(this.summaryRef(userId, petId, 'daily', date), dailyScoreFields(assessment), {
      merge: true,
    });
    batch.set(
      this.summaryRef(userId, petId, 'weekly', date),
      { updatedAt: FieldValue.serverTimestamp() },
      { merge: true }
    );
    batch.set(
      this.summaryRef(userId, petId, 'monthly', date),
      { updatedAt: FieldValue.serverTimestamp() },
      { merge: true }
    );
    await this.commit(batch, 'save');

    const overallScore = calculateOverallScore(assessment.responses);
    this.log.info(
      {
        event: 'qol_assessment_completed',
        userId,
        petId,
        date: assessmentDocId(date),
        answeredCount: answeredCount(assessment),
        overallScore,
        scoreBand: scoreBand(overallScore),
        completionDurationSeconds: assessment.completionDurationSeconds,
      },
      'QoL assessment saved'
    );
  }

  async getAssessment(userId: string, petId: string, date: Date): Promise<QolAssessment | null> {
    try {
      const snapshot = await this.assessmentRef(userId, petId, date).get();
      return snapshot.data() ?? null;
    } catch (error) {
      throw new QolServiceException(`Failed to get QoL assessment: ${errorMessage(error)}`);
    }
  }

  /**
   * Newest first
   */
  async getRecentAssessments(
    userId: string,
    petId: string,
    options: RecentAssessmentsOptions = {}
  ): Promise<QolAssessment[]> {
    try {
      let query = getQolAssessmentsCollection(this.db, userId, petId)
        .orderBy('date', 'desc')
        .limit(options.limit ?? DEFAULT_RECENT_LIMIT);
      if (options.startAfter) {
        query = query.startAfter(Timestamp.fromDate(options.startAfter));
      }

      const snapshot = await query.get();
      return snapshot.docs.map((doc) => doc.data());
    } catch (error) {
      throw new QolServiceException(`Failed to get recent QoL assessments: ${errorMessage(error)}`);
    }
  }

  /**
   * Overwrite an assessment; an edited assessment no longer has a completion duration
   */
  async updateAssessment(assessment: QolAssessment): Promise<QolAssessment> {
    this.assertValid(assessment);

    const updated: QolAssessment = {
      ...assessment,
      updatedAt: this.now(),
      completionDurationSeconds: undefined,
    };
    const { userId, petId, date } = updated;

    const batch = this.db.batch();
    batch.set(this.assessmentRef(userId, petId, date), updated);
    batch.set(this.summaryRef(userId, petId, 'daily', date), dailyScoreFields(updated), {
      merge: true,
    });
    await this.commit(batch, 'update');

    this.log.info(
      { event: 'qol_assessment_updated', userId, petId, date: assessmentDocId(date) },
      'QoL assessment updated'
    );
    return updated;
  }

  async deleteAssessment(userId: string, petId: string, date: Date): Promise<void> {
    const batch = this.db.batch();
    batch.delete(this.assessmentRef(userId, petId, date));
    batch.set(
      this.summaryRef(userId, petId, 'daily', date),
      { ...CLEARED_SCORE_FIELDS, updatedAt: FieldValue.serverTimestamp() },
      { merge: true }
    );
    await this.commit(batch, 'delete');

    this.log.info(
      { event: 'qol_assessment_deleted', userId, petId, date: assessmentDocId(date) },
      'QoL assessment deleted'
    );
  }

  /**
   * Trend over the recent scored assessments, newest first
   */
  async getTrend(userId: string, petId: string, limit = DEFAULT_RECENT_LIMIT): Promise<QolTrend> {
    const assessments = await this.getRecentAssessments(userId, petId, { limit });
    const points = assessments.flatMap((assessment) => {
      const summary = toTrendSummary(assessment);
      return summary ? [summary] : [];
    });

    return {
      points,
      stability: calculateTrendStability(points),
      interpretation: points.length > 0 ? generateInterpretation(points[0], points[1]) : null,
      notableDrops: QOL_DOMAINS.filter((domain) => hasNotableChange(points, domain)),
    };
  }

  private assertValid(assessment: QolAssessment): void {
    const errors = validateQolAssessment(assessment, this.now());
    if (errors.length > 0) {
      this.log.warn({ userId: assessment.userId, errors }, 'QoL assessment rejected');
      throw new QolValidationException(errors);
    }
  }

  private assessmentRef(userId: string, petId: string, date: Date) {
    return getQolAssessmentsCollection(this.db, userId, petId).doc(assessmentDocId(date));
  }

  private summaryRef(userId: string, petId: string, period: SummaryPeriod, date: Date) {
    const periodId = PERIOD_IDS[period](date);
    return this.db.doc(summaryDocPath(userId, petId, period, periodId));
  }

  private async commit(batch: WriteBatch, operation: string): Promise<void> {
    try {
      await batch.commit();
    } catch (error) {
      this.log.error({ operation, error: errorMessage(error) }, 'QoL batch write failed');
      throw new QolServiceException(
        `Failed to ${operation} QoL assessment: ${errorMessage(error)}`
      );
    }
  }
}
