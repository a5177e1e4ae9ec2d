/**
 * Logging Service Tests
 * Batch writes for sessions and their summary increments
 */

import type { Firestore } from '@google-cloud/firestore';
import { LoggingService, matchSchedule } from '../../src/services/logging/logging.service';
import {
  BatchWriteException,
  DuplicateSessionException,
  LoggingException,
  SessionValidationException,
} from '../../src/services/logging/logging-errors';
import { DailySummarySchema } from '../../src/models/daily-summary.model';
import {
  PET,
  USER,
  at,
  fluidSchedule,
  fluidSession,
  medicationSchedule,
  medicationSession,
} from '../helpers/fixtures';

jest.mock('@google-cloud/firestore', () => ({
  Firestore: jest.fn(),
  FieldValue: {
    serverTimestamp: jest.fn(() => 'SERVER_TIMESTAMP'),
    increment: jest.fn((n: number) => ({ _increment: n })),
  },
  Timestamp: {
    fromDate: jest.fn((date: Date) => ({ toDate: () => date, toMillis: () => date.getTime() })),
  },
}));

const NOW = new Date(2026, 9, 19, 10, 0);
const PET_PATH = 'users/user-1/pets/pet-1';
const DAILY_PATH = `${PET_PATH}/treatmentSummaries/daily/summaries/2026-10-19`;
const WEEKLY_PATH = `${PET_PATH}/treatmentSummaries/weekly/summaries/2026-W43`;
const MONTHLY_PATH = `${PET_PATH}/treatmentSummaries/monthly/summaries/2026-10`;

function createMockDb(dailySummary?: Record<string, unknown>, existingPaths: string[] = []) {
  const batch = {
    set: jest.fn(),
    update: jest.fn(),
    commit: jest.fn().mockResolvedValue(undefined),
  };

  const query = {
    where: jest.fn(),
    orderBy: jest.fn(),
    limit: jest.fn(),
    get: jest.fn().mockResolvedValue({ docs: [] }),
  };
  query.where.mockReturnValue(query);
  query.orderBy.mockReturnValue(query);
  query.limit.mockReturnValue(query);

  const docUpdate = jest.fn().mockResolvedValue(undefined);
  const parsedSummary = dailySummary ? DailySummarySchema.parse(dailySummary) : undefined;

  const getAll = jest.fn(async (...refs: Array<{ path: string }>) =>
    refs.map((ref) => ({ ref, exists: existingPaths.includes(ref.path) }))
  );

  const db = {
    batch: jest.fn(() => batch),
    getAll,
    doc: jest.fn((path: string) => ({
      path,
      update: docUpdate,
      withConverter: () => ({ get: async () => ({ data: () => parsedSummary }) }),
    })),
    collection: jest.fn((path: string) => ({
      withConverter: () => ({
        ...query,
        doc: (id: string) => ({ path: `${path}/${id}` }),
      }),
    })),
  };

  return { db: db as unknown as Firestore, batch, query, docUpdate, getAll };
}

function setPaths(batch: { set: jest.Mock }): string[] {
  return batch.set.mock.calls.map(([ref]) => ref.path);
}

describe('matchSchedule', () => {
  it('should pick the closest reminder within two hours', () => {
    const schedule = medicationSchedule({ reminderTimes: [at(8), at(9, 45)] });

    const match = matchSchedule(new Date(2026, 9, 19, 9, 0), [schedule]);

    expect(match).toEqual({
      scheduleId: 'sched-med',
      scheduledTime: new Date(2026, 9, 19, 9, 45),
    });
  });

  it('should return no match beyond two hours', () => {
    const schedule = medicationSchedule({ reminderTimes: [at(8)] });

    expect(matchSchedule(new Date(2026, 9, 19, 10, 1), [schedule])).toEqual({});
  });
});

describe('LoggingService', () => {
  describe('logMedicationSession', () => {
    it('should write the session and three summaries in one batch', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      const id = await service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [medicationSchedule()],
        recentSessions: [],
      });

      expect(id).toBe('med-1');
      expect(batch.commit).toHaveBeenCalledTimes(1);
      expect(setPaths(batch)).toEqual([
        `${PET_PATH}/medicationSessions/med-1`,
        DAILY_PATH,
        WEEKLY_PATH,
        MONTHLY_PATH,
      ]);

      const written = batch.set.mock.calls[0][1];
      expect(written.scheduleId).toBe('sched-med');
      expect(written.scheduledTime).toEqual(new Date(2026, 9, 19, 8, 0));

      const [, daily, options] = batch.set.mock.calls[1];
      expect(options).toEqual({ merge: true });
      expect(daily).toEqual({
        date: '2026-10-19',
        overallStreak: 0,
        createdAt: 'SERVER_TIMESTAMP',
        updatedAt: 'SERVER_TIMESTAMP',
        medicationTotalDoses: { _increment: 1 },
        medicationScheduledDoses: { _increment: 1 },
        medicationMissedCount: { _increment: 0 },
      });
      expect(batch.set.mock.calls[2][1].weekId).toBe('2026-W43');
      expect(batch.set.mock.calls[3][1].monthId).toBe('2026-10');
    });

    it('should log without a schedule when no reminder is close', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession({ dateTime: new Date(2026, 9, 19, 5, 0) }),
        todaysSchedules: [medicationSchedule({ reminderTimes: [at(8)] })],
        recentSessions: [],
      });

      expect(batch.set.mock.calls[0][1].scheduleId).toBeUndefined();
    });

    it('should reject a duplicate within fifteen minutes', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);
      const existing = medicationSession({ id: 'med-0', dateTime: new Date(2026, 9, 19, 8, 0) });

      const promise = service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [],
        recentSessions: [existing],
      });

      await expect(promise).rejects.toBeInstanceOf(DuplicateSessionException);
      await expect(promise).rejects.toMatchObject({ medicationName: 'Benazepril' });
      expect(batch.commit).not.toHaveBeenCalled();
    });

    it('should reject an invalid session before writing', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      const promise = service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession({ medicationName: 'B' }),
        todaysSchedules: [],
        recentSessions: [],
      });

      await expect(promise).rejects.toBeInstanceOf(SessionValidationException);
      await expect(promise).rejects.toMatchObject({
        errors: ['Medication name must be at least 2 characters'],
      });
      expect(db.batch).not.toHaveBeenCalled();
      expect(batch.commit).not.toHaveBeenCalled();
    });

    it('should keep the creation fields of summaries that already exist', async () => {
      const { db, batch, getAll } = createMockDb(undefined, [DAILY_PATH, WEEKLY_PATH, MONTHLY_PATH]);
      const service = new LoggingService(db, () => NOW);

      await service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [medicationSchedule()],
        recentSessions: [],
      });

      expect(getAll.mock.calls[0].map((ref) => ref.path)).toEqual([DAILY_PATH, WEEKLY_PATH, MONTHLY_PATH]);
      expect(batch.set.mock.calls[1][1]).toEqual({
        date: '2026-10-19',
        updatedAt: 'SERVER_TIMESTAMP',
        medicationTotalDoses: { _increment: 1 },
        medicationScheduledDoses: { _increment: 1 },
        medicationMissedCount: { _increment: 0 },
      });
      expect(batch.set.mock.calls[2][1]).not.toHaveProperty('createdAt');
      expect(batch.set.mock.calls[3][1]).not.toHaveProperty('createdAt');
    });

    it('should stamp only the summaries that are new', async () => {
      const { db, batch } = createMockDb(undefined, [MONTHLY_PATH]);
      const service = new LoggingService(db, () => NOW);

      await service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [],
        recentSessions: [],
      });

      expect(batch.set.mock.calls[1][1].createdAt).toBe('SERVER_TIMESTAMP');
      expect(batch.set.mock.calls[2][1].createdAt).toBe('SERVER_TIMESTAMP');
      expect(batch.set.mock.calls[3][1]).not.toHaveProperty('createdAt');
    });

    it('should fail without writing when the summaries cannot be read', async () => {
      const { db, batch, getAll } = createMockDb();
      getAll.mockRejectedValueOnce(new Error('unavailable'));
      const service = new LoggingService(db, () => NOW);

      const promise = service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [],
        recentSessions: [],
      });

      await expect(promise).rejects.toThrow(
        'Batch write failed during logMedicationSession: unavailable'
      );
      expect(batch.commit).not.toHaveBeenCalled();
    });

    it('should turn a commit failure into a BatchWriteException', async () => {
      const { db, batch } = createMockDb();
      batch.commit.mockRejectedValue(new Error('deadline exceeded'));
      const service = new LoggingService(db, () => NOW);

      const promise = service.logMedicationSession({
        userId: USER,
        petId: PET,
        session: medicationSession(),
        todaysSchedules: [],
        recentSessions: [],
      });

      await expect(promise).rejects.toBeInstanceOf(BatchWriteException);
      await expect(promise).rejects.toThrow(
        'Batch write failed during logMedicationSession: deadline exceeded'
      );
    });
  });

  describe('logFluidSession', () => {
    it('should match the fluid schedule and mark fluids done', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await service.logFluidSession({
        userId: USER,
        petId: PET,
        session: fluidSession(),
        todaysSchedule: fluidSchedule({ reminderTimes: [at(9)] }),
      });

      expect(setPaths(batch)[0]).toBe(`${PET_PATH}/fluidSessions/fluid-1`);
      expect(batch.set.mock.calls[0][1].scheduleId).toBe('sched-fluid');
      expect(batch.set.mock.calls[1][1]).toMatchObject({
        fluidTotalVolume: { _increment: 100 },
        fluidSessionCount: { _increment: 1 },
        fluidTreatmentDone: true,
      });
    });
  });

  describe('updateMedicationSession', () => {
    it('should move a missed dose to given across the summaries', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await service.updateMedicationSession({
        userId: USER,
        petId: PET,
        oldSession: medicationSession({ completed: false }),
        newSession: medicationSession({ completed: true }),
      });

      expect(batch.update).toHaveBeenCalledTimes(1);
      expect(batch.update.mock.calls[0][0].path).toBe(`${PET_PATH}/medicationSessions/med-1`);
      expect(batch.set.mock.calls[0][1]).toMatchObject({
        medicationTotalDoses: { _increment: 1 },
        medicationMissedCount: { _increment: -1 },
      });
      expect(batch.set.mock.calls[0][1]).not.toHaveProperty('medicationScheduledDoses');
    });

    it('should not reset the creation time of an existing summary', async () => {
      const { db, batch } = createMockDb(undefined, [DAILY_PATH, WEEKLY_PATH, MONTHLY_PATH]);
      const service = new LoggingService(db, () => NOW);

      await service.updateMedicationSession({
        userId: USER,
        petId: PET,
        oldSession: medicationSession({ completed: false }),
        newSession: medicationSession({ completed: true }),
      });

      for (const [, data] of batch.set.mock.calls) {
        expect(data).not.toHaveProperty('createdAt');
        expect(data).not.toHaveProperty('overallStreak');
      }
    });

    it('should update only the session when no counter changes', async () => {
      const { db, batch, docUpdate } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await service.updateMedicationSession({
        userId: USER,
        petId: PET,
        oldSession: medicationSession(),
        newSession: medicationSession({ notes: 'ate well' }),
      });

      expect(docUpdate).toHaveBeenCalledTimes(1);
      expect(docUpdate.mock.calls[0][0].notes).toBe('ate well');
      expect(batch.commit).not.toHaveBeenCalled();
    });
  });

  describe('updateFluidSession', () => {
    it('should carry only the volume difference', async () => {
      const { db, batch } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await service.updateFluidSession({
        userId: USER,
        petId: PET,
        oldSession: fluidSession({ volumeGiven: 100 }),
        newSession: fluidSession({ volumeGiven: 120 }),
      });

      expect(batch.set.mock.calls[0][1]).toMatchObject({ fluidTotalVolume: { _increment: 20 } });
      expect(batch.set.mock.calls[0][1]).not.toHaveProperty('fluidSessionCount');
    });
  });

  describe('quickLogAllTreatments', () => {
    it('should reject an empty schedule list', async () => {
      const { db } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await expect(service.quickLogAllTreatments(USER, PET, [])).rejects.toThrow(
        'No active schedules found for today.'
      );
    });

    it('should refuse when treatments were already logged today', async () => {
      const { db } = createMockDb({ fluidSessionCount: 1 });
      const service = new LoggingService(db, () => NOW);

      await expect(
        service.quickLogAllTreatments(USER, PET, [medicationSchedule()])
      ).rejects.toThrow(
        'Treatments already logged today. Use individual logging to add more sessions.'
      );
    });

    it('should refuse when no active schedule has a reminder today', async () => {
      const { db } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      await expect(
        service.quickLogAllTreatments(USER, PET, [medicationSchedule({ isActive: false })])
      ).rejects.toThrow('No schedules have reminder times for today.');
    });

    it('should log one session per reminder in a single batch', async () => {
      const { db, batch } = createMockDb({ fluidSessionCount: 0 });
      const service = new LoggingService(db, () => NOW);

      const count = await service.quickLogAllTreatments(USER, PET, [
        medicationSchedule({ reminderTimes: [at(8), at(20)] }),
        fluidSchedule(),
      ]);

      expect(count).toBe(3);
      expect(batch.set).toHaveBeenCalledTimes(12);
      expect(batch.commit).toHaveBeenCalledTimes(1);

      const sessions = batch.set.mock.calls.filter(([ref]) => ref.path.includes('Sessions/'));
      expect(sessions.map(([, data]) => data.dateTime)).toEqual([
        new Date(2026, 9, 19, 8, 0),
        new Date(2026, 9, 19, 20, 0),
        new Date(2026, 9, 19, 20, 0),
      ]);
      expect(sessions[0][1].completed).toBe(true);
    });

    it('should wrap unexpected failures', async () => {
      const { db } = createMockDb();
      const service = new LoggingService(db, () => NOW);

      const promise = service.quickLogAllTreatments(USER, PET, [
        fluidSchedule({ targetVolume: undefined }),
      ]);

      await expect(promise).rejects.toBeInstanceOf(LoggingException);
      await expect(promise).rejects.toThrow(
        'Unexpected error in quick-log: Schedule sched-fluid is missing a target volume'
      );
    });
  });

  describe('getTodaysMedicationSessions', () => {
    it('should query from the start of today, newest first', async () => {
      const { db, query } = createMockDb();
      const session = medicationSession();
      query.get.mockResolvedValue({ docs: [{ data: () => session }] });
      const service = new LoggingService(db, () => NOW);

      const result = await service.getTodaysMedicationSessions(USER, PET, 'Benazepril');

      expect(result).toEqual([session]);
      expect(query.where).toHaveBeenCalledWith('medicationName', '==', 'Benazepril');
      expect(query.where.mock.calls[1][0]).toBe('dateTime');
      expect(query.where.mock.calls[1][2].toDate()).toEqual(new Date(2026, 9, 19));
      expect(query.orderBy).toHaveBeenCalledWith('dateTime', 'desc');
      expect(query.limit).toHaveBeenCalledWith(10);
    });

    it('should return an empty list when the read fails', async () => {
      const { db, query } = createMockDb();
      query.get.mockRejectedValue(new Error('unavailable'));
      const service = new LoggingService(db, () => NOW);

      await expect(service.getTodaysMedicationSessions(USER, PET)).resolves.toEqual([]);
    });
  });
});
