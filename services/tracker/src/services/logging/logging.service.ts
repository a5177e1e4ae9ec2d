/**
 * Logging Service
 * Writes treatment sessions and keeps the daily, weekly and monthly summaries in step.
 *
 * Every session is committed as one batch: the session document plus a merge-set
 * with increments on each of the three summary documents. Creation fields are
 * only part of the merge for summaries that do not exist yet.
 */

import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type {
  DocumentData,
  DocumentReference,
  Firestore,
  Query,
  WriteBatch,
} from '@google-cloud/firestore';
import {
  FLUID_SESSIONS_COLLECTION,
  MEDICATION_SESSIONS_COLLECTION,
  petCollectionPath,
  summaryDocPath,
} from '../../../../../shared';
import type { SummaryPeriod } from '../../../../../shared';
import logger from '../../logger';
import { dailySummaryConverter, hasAnySessions } from '../../models/daily-summary.model';
import {
  fluidSessionFromSchedule,
  fluidSessionToFirestore,
  getFluidSessionsCollection,
} from '../../models/fluid-session.model';
import type { FluidSession } from '../../models/fluid-session.model';
import {
  getMedicationSessionsCollection,
  medicationSessionFromSchedule,
  medicationSessionToFirestore,
} from '../../models/medication-session.model';
import type { MedicationSession } from '../../models/medication-session.model';
import { reminderTimesOnDate } from '../../models/schedule.model';
import type { Schedule } from '../../models/schedule.model';
import { formatDate, formatMonthId, formatWeekId, startOfDay } from '../../utils/date-utils';
import { errorMessage } from '../../utils/error-utils';
import { BatchWriteException, LoggingException } from './logging-errors';
import { LoggingValidationService } from './logging-validation.service';
import { SummaryUpdate } from './summary-update';
import type { ValidationResult } from './validation-result';

const MATCH_WINDOW_MS = 2 * 60 * 60 * 1000;
const TODAYS_SESSIONS_LIMIT = 10;

export interface ScheduleMatch {
  scheduleId?: string;
  scheduledTime?: Date;
}

export interface LogMedicationParams {
  userId: string;
  petId: string;
  session: MedicationSession;
  todaysSchedules: Schedule[];
  recentSessions: MedicationSession[];
}

export interface LogFluidParams {
  userId: string;
  petId: string;
  session: FluidSession;
  todaysSchedule?: Schedule;
}

export interface UpdateSessionParams<T> {
  userId: string;
  petId: string;
  oldSession: T;
  newSession: T;
}

function sessionDocPath(userId: string, petId: string, collection: string, id: string): string {
  return `${petCollectionPath(userId, petId, collection)}/${id}`;
}

/**
 * Closest reminder within two hours of `dateTime`, on the same calendar day
 */
export function matchSchedule(dateTime: Date, schedules: Schedule[]): ScheduleMatch {
  let match: ScheduleMatch = {};
  let smallestDiff = Number.POSITIVE_INFINITY;

  for (const schedule of schedules) {
    for (const reminder of schedule.reminderTimes) {
      const candidate = new Date(
        dateTime.getFullYear(),
        dateTime.getMonth(),
        dateTime.getDate(),
        reminder.getHours(),
        reminder.getMinutes()
      );
      const diff = Math.abs(dateTime.getTime() - candidate.getTime());
      if (diff <= MATCH_WINDOW_MS && diff < smallestDiff) {
        smallestDiff = diff;
        match = { scheduleId: schedule.id, scheduledTime: candidate };
      }
    }
  }

  return match;
}

export function matchMedicationSchedule(
  session: MedicationSession,
  schedules: Schedule[]
): ScheduleMatch {
  return matchSchedule(
    session.dateTime,
    schedules.filter(
      (s) => s.treatmentType === 'medication' && s.medicationName === session.medicationName
    )
  );
}

export function matchFluidSchedule(session: FluidSession, schedules: Schedule[]): ScheduleMatch {
  return matchSchedule(
    session.dateTime,
    schedules.filter((s) => s.treatmentType === 'fluid')
  );
}

export interface SummaryTarget {
  path: string;
  header: DocumentData;
  initial: DocumentData;
}

export function summaryTargets(userId: string, petId: string, dateTime: Date): SummaryTarget[] {
  const date = startOfDay(dateTime);
  const periods: Array<[SummaryPeriod, string, DocumentData, DocumentData]> = [
    ['daily', formatDate(date), { date: formatDate(date) }, { overallStreak: 0 }],
    ['weekly', formatWeekId(date), { weekId: formatWeekId(date) }, {}],
    ['monthly', formatMonthId(date), { monthId: formatMonthId(date) }, {}],
  ];

  return periods.map(([period, periodId, header, initial]) => ({
    path: summaryDocPath(userId, petId, period, periodId),
    header,
    initial,
  }));
}

export class LoggingService {
  private readonly log = logger.child({ module: 'logging' });
  private readonly validation: LoggingValidationService;

  constructor(
    private readonly db: Firestore,
    private readonly now: () => Date = () => new Date()
  ) {
    this.validation = new LoggingValidationService(now);
  }

  /**
   * Validate, reject duplicates, match to a schedule and commit
   * @returns the session id
   */
  async logMedicationSession(params: LogMedicationParams): Promise<string> {
    const { userId, petId, session } = params;
    const log = this.log.child({ userId, petId, sessionId: session.id });

    try {
      this.assertValid(this.validation.validateMedicationSession(session));

      const duplicate = this.validation.findDuplicateSession(session, params.recentSessions);
      if (duplicate) {
        log.info({ medicationName: duplicate.medicationName }, 'Duplicate medication detected');
        throw this.validation.toLoggingException(
          this.validation.validateForDuplicates(session, params.recentSessions),
          duplicate
        );
      }

      const match = matchMedicationSchedule(session, params.todaysSchedules);
      const matched: MedicationSession = { ...session, ...match };

      const created = await this.newSummaryPaths(userId, petId, [matched.dateTime], 'logMedicationSession');
      const batch = this.db.batch();
      this.addMedicationSessionToBatch(batch, userId, petId, matched, created);
      await this.commit(batch, 'logMedicationSession');

      log.info({ scheduleId: match.scheduleId ?? null }, 'Medication session logged');
      return session.id;
    } catch (error) {
      throw this.wrapError(error, 'logging medication');
    }
  }

  async logFluidSession(params: LogFluidParams): Promise<string> {
    const { userId, petId, session } = params;
    const log = this.log.child({ userId, petId, sessionId: session.id });

    try {
      this.assertValid(this.validation.validateFluidSession(session));

      const match = matchFluidSchedule(
        session,
        params.todaysSchedule ? [params.todaysSchedule] : []
      );
      const matched: FluidSession = { ...session, ...match };

      const created = await this.newSummaryPaths(userId, petId, [matched.dateTime], 'logFluidSession');
      const batch = this.db.batch();
      this.addFluidSessionToBatch(batch, userId, petId, matched, created);
      await this.commit(batch, 'logFluidSession');

      log.info({ scheduleId: match.scheduleId ?? null }, 'Fluid session logged');
      return session.id;
    } catch (error) {
      throw this.wrapError(error, 'logging fluid');
    }
  }

  async updateMedicationSession(params: UpdateSessionParams<MedicationSession>): Promise<void> {
    const { userId, petId, oldSession, newSession } = params;

    try {
      this.assertValid(this.validation.validateMedicationSession(newSession));

      const ref = this.db.doc(sessionDocPath(userId, petId, MEDICATION_SESSIONS_COLLECTION, newSession.id));
      const data = medicationSessionToFirestore({ ...newSession, updatedAt: this.now() });
      const update = SummaryUpdate.forMedicationSessionUpdate(oldSession, newSession);

      await this.writeUpdate(ref, data, update, userId, petId, newSession.dateTime, 'updateMedicationSession');
      this.log.info({ userId, petId, sessionId: newSession.id }, 'Medication session updated');
    } catch (error) {
      throw this.wrapError(error, 'updating medication');
    }
  }

  async updateFluidSession(params: UpdateSessionParams<FluidSession>): Promise<void> {
    const { userId, petId, oldSession, newSession } = params;

    try {
      this.assertValid(this.validation.validateFluidSession(newSession));

      const ref = this.db.doc(sessionDocPath(userId, petId, FLUID_SESSIONS_COLLECTION, newSession.id));
      const data = fluidSessionToFirestore({ ...newSession, updatedAt: this.now() });
      const update = SummaryUpdate.forFluidSessionUpdate(oldSession, newSession);

      await this.writeUpdate(ref, data, update, userId, petId, newSession.dateTime, 'updateFluidSession');
      this.log.info({ userId, petId, sessionId: newSession.id }, 'Fluid session updated');
    } catch (error) {
      throw this.wrapError(error, 'updating fluid');
    }
  }

  /**
   * Log every reminder of today's schedules as given, in one batch
   * Refuses when anything has already been logged today.
   * @returns number of sessions written
   */
  async quickLogAllTreatments(
    userId: string,
    petId: string,
    todaysSchedules: Schedule[]
  ): Promise<number> {
    const log = this.log.child({ userId, petId, function: 'quickLogAllTreatments' });

    try {
      if (todaysSchedules.length === 0) {
        throw new LoggingException('No active schedules found for today.');
      }

      const now = this.now();
      const summarySnap = await this.db
        .doc(summaryDocPath(userId, petId, 'daily', formatDate(now)))
        .withConverter(dailySummaryConverter)
        .get();
      const summary = summarySnap.data();
      if (summary && hasAnySessions(summary)) {
        throw new LoggingException(
          'Treatments already logged today. Use individual logging to add more sessions.'
        );
      }

      const activeSchedules = todaysSchedules.filter(
        (schedule) => schedule.isActive && reminderTimesOnDate(schedule, now).length > 0
      );
      if (activeSchedules.length === 0) {
        throw new LoggingException('No schedules have reminder times for today.');
      }

      const medicationSessions: MedicationSession[] = [];
      const fluidSessions: FluidSession[] = [];

      for (const schedule of activeSchedules) {
        for (const reminderTime of reminderTimesOnDate(schedule, now)) {
          const base = { schedule, scheduledTime: reminderTime, petId, userId, now };
          if (schedule.treatmentType === 'medication') {
            medicationSessions.push(medicationSessionFromSchedule({ ...base, wasCompleted: true }));
          } else {
            fluidSessions.push(fluidSessionFromSchedule(base));
          }
        }
      }

      const total = medicationSessions.length + fluidSessions.length;
      if (total === 0) {
        throw new LoggingException('No sessions to log. Please check schedule configuration.');
      }

      const created = await this.newSummaryPaths(
        userId,
        petId,
        [...medicationSessions, ...fluidSessions].map((session) => session.dateTime),
        'quickLogAllTreatments'
      );
      const batch = this.db.batch();
      for (const session of medicationSessions) {
        this.addMedicationSessionToBatch(batch, userId, petId, session, created);
      }
      for (const session of fluidSessions) {
        this.addFluidSessionToBatch(batch, userId, petId, session, created);
      }
      await this.commit(batch, 'quickLogAllTreatments');

      log.info(
        { medications: medicationSessions.length, fluids: fluidSessions.length },
        'Quick-log complete'
      );
      return total;
    } catch (error) {
      throw this.wrapError(error, 'in quick-log');
    }
  }

  async getMedicationSession(
    userId: string,
    petId: string,
    sessionId: string
  ): Promise<MedicationSession | null> {
    const snapshot = await getMedicationSessionsCollection(this.db, userId, petId).doc(sessionId).get();
    return snapshot.data() ?? null;
  }

  async getFluidSession(userId: string, petId: string, sessionId: string): Promise<FluidSession | null> {
    const snapshot = await getFluidSessionsCollection(this.db, userId, petId).doc(sessionId).get();
    return snapshot.data() ?? null;
  }

  /**
   * Today's medication sessions, newest first; empty on read failure
   */
  async getTodaysMedicationSessions(
    userId: string,
    petId: string,
    medicationName?: string
  ): Promise<MedicationSession[]> {
    const log = this.log.child({ userId, petId, medicationName, function: 'getTodaysMedicationSessions' });

    try {
      let query: Query<MedicationSession> = getMedicationSessionsCollection(this.db, userId, petId);
      if (medicationName !== undefined) {
        query = query.where('medicationName', '==', medicationName);
      }

      const snapshot = await query
        .where('dateTime', '>=', Timestamp.fromDate(startOfDay(this.now())))
        .orderBy('dateTime', 'desc')
        .limit(TODAYS_SESSIONS_LIMIT)
        .get();

      return snapshot.docs.map((doc) => doc.data());
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Failed to fetch today's medication sessions");
      return [];
    }
  }

  private assertValid(result: ValidationResult): void {
    if (!result.isValid) {
      throw this.validation.toLoggingException(result);
    }
  }

  private addMedicationSessionToBatch(
    batch: WriteBatch,
    userId: string,
    petId: string,
    session: MedicationSession,
    created: Set<string>
  ): void {
    batch.set(getMedicationSessionsCollection(this.db, userId, petId).doc(session.id), session);
    this.addSummariesToBatch(
      batch,
      userId,
      petId,
      session.dateTime,
      SummaryUpdate.fromMedicationSession(session),
      created
    );
  }

  private addFluidSessionToBatch(
    batch: WriteBatch,
    userId: string,
    petId: string,
    session: FluidSession,
    created: Set<string>
  ): void {
    batch.set(getFluidSessionsCollection(this.db, userId, petId).doc(session.id), session);
    this.addSummariesToBatch(
      batch,
      userId,
      petId,
      session.dateTime,
      SummaryUpdate.fromFluidSession(session),
      created
    );
  }

  private addSummariesToBatch(
    batch: WriteBatch,
    userId: string,
    petId: string,
    dateTime: Date,
    update: SummaryUpdate,
    created: Set<string>
  ): void {
    const increments = update.toFirestoreUpdate();

    for (const { path, header, initial } of summaryTargets(userId, petId, dateTime)) {
      const fields = created.has(path)
        ? { ...header, ...initial, createdAt: FieldValue.serverTimestamp() }
        : header;
      batch.set(this.db.doc(path), { ...fields, ...increments }, { merge: true });
    }
  }

  /**
   * Paths of the summary documents for `dates` that do not exist yet
   */
  private async newSummaryPaths(
    userId: string,
    petId: string,
    dates: Date[],
    operation: string
  ): Promise<Set<string>> {
    const paths = new Set(
      dates.flatMap((date) => summaryTargets(userId, petId, date).map((target) => target.path))
    );

    try {
      const snapshots = await this.db.getAll(...[...paths].map((path) => this.db.doc(path)));
      return new Set(snapshots.filter((snapshot) => !snapshot.exists).map((snapshot) => snapshot.ref.path));
    } catch (error) {
      this.log.error({ operation, error: errorMessage(error) }, 'Summary read failed');
      throw new BatchWriteException(operation, errorMessage(error));
    }
  }

  private async writeUpdate(
    ref: DocumentReference,
    data: DocumentData,
    update: SummaryUpdate,
    userId: string,
    petId: string,
    dateTime: Date,
    operation: string
  ): Promise<void> {
    if (!update.hasUpdates) {
      try {
        await ref.update(data);
      } catch (error) {
        throw new BatchWriteException(operation, errorMessage(error));
      }
      return;
    }

    const created = await this.newSummaryPaths(userId, petId, [dateTime], operation);
    const batch = this.db.batch();
    batch.update(ref, data);
    this.addSummariesToBatch(batch, userId, petId, dateTime, update, created);
    await this.commit(batch, operation);
  }

  private async commit(batch: WriteBatch, operation: string): Promise<void> {
    try {
      await batch.commit();
    } catch (error) {
      this.log.error({ operation, error: errorMessage(error) }, 'Batch write failed');
      throw new BatchWriteException(operation, errorMessage(error));
    }
  }

  private wrapError(error: unknown, context: string): LoggingException {
    if (error instanceof LoggingException) {
      return error;
    }
    this.log.error({ context, error: errorMessage(error) }, 'Unexpected logging error');
    return new LoggingException(`Unexpected error ${context}: ${errorMessage(error)}`);
  }
}
