/**
 * API integration tests
 * Routes, request validation and error mapping, over in-memory local stores
 */

import request from 'supertest';
import { StatusCodes } from 'http-status-codes';
import { QOL_INTERPRETATION_MESSAGES } from '../../src/constants/messages';
import {
  BatchWriteException,
  DuplicateSessionException,
} from '../../src/services/logging/logging-errors';
import { HealthServiceException, WeightNotFoundException } from '../../src/services/health/health-errors';
import {
  InventoryNotFoundException,
  InventoryServiceException,
} from '../../src/services/inventory/inventory-errors';
import { QolValidationException } from '../../src/services/qol/qol-errors';
import {
  PET,
  USER,
  fluidSchedule,
  fluidSession,
  medicationSchedule,
  medicationSession,
  qolResponses,
} from '../helpers/fixtures';
import { TEST_NOW, createTestContext } from '../helpers/test-app';

const PET_URL = `/users/${USER}/pets/${PET}`;
const SYNC_URL = `/users/${USER}/sync`;

const MEDICATION_BODY = {
  dateTime: '2026-10-19T08:10:00',
  medicationName: 'Benazepril',
  dosageGiven: 1,
  dosageScheduled: 1,
  medicationUnit: 'pills',
  completed: true,
};

const OFFLINE_MESSAGE =
  'Unable to save right now. Your data is saved offline and will sync automatically.';

describe('API', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('request validation', () => {
    it('should reject a body that does not match the schema', async () => {
      const { app } = createTestContext();

      const response = await request(app).post(`${PET_URL}/medication-sessions`).send({});

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.error).toBe('Invalid request body');
      expect(response.body.issues).toContainEqual({ path: 'medicationName', message: 'Required' });
    });

    it('should answer 400 for malformed JSON', async () => {
      const { app } = createTestContext();

      const response = await request(app)
        .post(`${PET_URL}/medication-sessions`)
        .set('Content-Type', 'application/json')
        .send('{"medicationName":');

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body).toEqual({ error: 'Malformed JSON body' });
    });
  });

  describe('schedules', () => {
    it('should list active schedules', async () => {
      const ctx = createTestContext();
      const list = jest
        .spyOn(ctx.schedules, 'listSchedules')
        .mockResolvedValue([medicationSchedule()]);

      const response = await request(ctx.app).get(`${PET_URL}/schedules?active=true`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body.schedules.map((s: { id: string }) => s.id)).toEqual(['sched-med']);
      expect(list).toHaveBeenCalledWith(USER, PET, { activeOnly: true });
    });

    it('should answer 404 when updating an unknown schedule', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'updateSchedule').mockResolvedValue(null);

      const response = await request(ctx.app)
        .put(`${PET_URL}/schedules/missing`)
        .send({ isActive: false });

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(response.body).toEqual({ error: 'Schedule not found' });
    });

    it('should cancel reminders when a schedule is deleted', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'deleteSchedule').mockResolvedValue(true);
      const cancel = jest.spyOn(ctx.reminders, 'cancelForSchedule');

      const response = await request(ctx.app).delete(`${PET_URL}/schedules/sched-med`);

      expect(response.status).toBe(StatusCodes.NO_CONTENT);
      expect(cancel).toHaveBeenCalledWith(USER, PET, 'sched-med', undefined);
    });

    it('should report unexpected failures as 500', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'listSchedules').mockRejectedValue(new Error('deadline exceeded'));

      const response = await request(ctx.app).get(`${PET_URL}/schedules`);

      expect(response.status).toBe(StatusCodes.INTERNAL_SERVER_ERROR);
      expect(response.body).toEqual({ error: 'Failed to list schedules: deadline exceeded' });
    });
  });

  describe('medication logging', () => {
    function stubReads(ctx: ReturnType<typeof createTestContext>) {
      jest.spyOn(ctx.schedules, 'getTodaysSchedules').mockResolvedValue([medicationSchedule()]);
      jest.spyOn(ctx.logging, 'getTodaysMedicationSessions').mockResolvedValue([]);
    }

    it('should log a dose, match it to the nearest reminder and clear that slot', async () => {
      const ctx = createTestContext();
      stubReads(ctx);
      const logSession = jest
        .spyOn(ctx.logging, 'logMedicationSession')
        .mockResolvedValue('med-new');
      const cancelSlot = jest.spyOn(ctx.reminders, 'cancelSlot');

      const response = await request(ctx.app)
        .post(`${PET_URL}/medication-sessions`)
        .send(MEDICATION_BODY);

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body).toEqual({
        id: 'med-new',
        scheduleId: 'sched-med',
        scheduledTime: new Date(2026, 9, 19, 8, 0).toISOString(),
      });
      expect(logSession.mock.calls[0][0].session).toMatchObject({
        userId: USER,
        petId: PET,
        medicationName: 'Benazepril',
        dateTime: new Date(2026, 9, 19, 8, 10),
        createdAt: TEST_NOW,
      });
      expect(cancelSlot).toHaveBeenCalledWith(USER, PET, 'sched-med', '08:00');
    });

    it('should answer 409 for a duplicate dose', async () => {
      const ctx = createTestContext();
      stubReads(ctx);
      jest.spyOn(ctx.logging, 'logMedicationSession').mockRejectedValue(
        new DuplicateSessionException({
          sessionType: 'medication',
          conflictingTime: new Date(2026, 9, 19, 8, 0),
          medicationName: 'Benazepril',
        })
      );

      const response = await request(ctx.app)
        .post(`${PET_URL}/medication-sessions`)
        .send(MEDICATION_BODY);

      expect(response.status).toBe(StatusCodes.CONFLICT);
      expect(response.body.sessionType).toBe('medication');
      expect(response.body.userMessage).toBe(
        "You've already logged this treatment today. Would you like to update it instead?"
      );
    });

    it('should queue the write offline when the batch fails, then sync it', async () => {
      const ctx = createTestContext();
      stubReads(ctx);
      const logSession = jest
        .spyOn(ctx.logging, 'logMedicationSession')
        .mockRejectedValueOnce(new BatchWriteException('logMedicationSession', 'unavailable'))
        .mockResolvedValueOnce('med-synced');

      const queued = await request(ctx.app)
        .post(`${PET_URL}/medication-sessions`)
        .send(MEDICATION_BODY);

      expect(queued.status).toBe(StatusCodes.ACCEPTED);
      expect(queued.body).toEqual({
        queued: true,
        operationId: expect.any(String),
        userMessage: OFFLINE_MESSAGE,
      });

      const queue = await request(ctx.app).get(`${SYNC_URL}/queue`);
      expect(queue.body).toMatchObject({ size: 1, pending: 1, failed: 0, warning: false });
      expect(queue.body.operations[0]).toMatchObject({
        id: queued.body.operationId,
        type: 'createMedication',
        status: 'pending',
        retryCount: 0,
      });

      const synced = await request(ctx.app).post(SYNC_URL);
      expect(synced.status).toBe(StatusCodes.OK);
      expect(synced.body).toEqual({ successCount: 1, failureCount: 0 });
      expect(logSession).toHaveBeenCalledTimes(2);

      const after = await request(ctx.app).get(`${SYNC_URL}/queue`);
      expect(after.body.size).toBe(0);
    });

    it('should queue the dose offline when schedules cannot be read', async () => {
      const ctx = createTestContext();
      jest
        .spyOn(ctx.schedules, 'getTodaysSchedules')
        .mockRejectedValue(new Error('14 UNAVAILABLE: no connection'));
      const logSession = jest.spyOn(ctx.logging, 'logMedicationSession');

      const queued = await request(ctx.app)
        .post(`${PET_URL}/medication-sessions`)
        .send(MEDICATION_BODY);

      expect(queued.status).toBe(StatusCodes.ACCEPTED);
      expect(queued.body).toEqual({
        queued: true,
        operationId: expect.any(String),
        userMessage: 'Logged successfully! Will sync when you are back online.',
      });
      expect(logSession).not.toHaveBeenCalled();

      const queue = await request(ctx.app).get(`${SYNC_URL}/queue`);
      expect(queue.body.operations[0]).toMatchObject({
        type: 'createMedication',
        todaysSchedules: [],
        schedulesUnavailable: true,
      });

      jest.spyOn(ctx.schedules, 'listSchedules').mockResolvedValue([medicationSchedule()]);
      logSession.mockResolvedValue('med-synced');

      const synced = await request(ctx.app).post(SYNC_URL);

      expect(synced.body).toEqual({ successCount: 1, failureCount: 0 });
      expect(logSession.mock.calls[0][0].todaysSchedules).toEqual([medicationSchedule()]);
    });

    it('should queue a quick-log offline when schedules cannot be read', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'getTodaysSchedules').mockRejectedValue(new Error('deadline'));

      const response = await request(ctx.app).post(`${PET_URL}/quick-log`);

      expect(response.status).toBe(StatusCodes.ACCEPTED);
      const queue = await request(ctx.app).get(`${SYNC_URL}/queue`);
      expect(queue.body.operations[0]).toMatchObject({
        type: 'quickLogAll',
        schedulesUnavailable: true,
      });
    });

    it('should answer 404 when updating an unknown session', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.logging, 'getMedicationSession').mockResolvedValue(null);

      const response = await request(ctx.app)
        .put(`${PET_URL}/medication-sessions/missing`)
        .send({ notes: 'Given with food' });

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(response.body).toEqual({ error: 'Medication session not found' });
    });

    it('should reject fields an update cannot change', async () => {
      const { app } = createTestContext();

      const response = await request(app)
        .put(`${PET_URL}/medication-sessions/med-1`)
        .send({ userId: 'someone-else' });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.error).toBe('Invalid request body');
    });

    it('should merge an update over the stored session', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.logging, 'getMedicationSession').mockResolvedValue(medicationSession());
      const update = jest
        .spyOn(ctx.logging, 'updateMedicationSession')
        .mockResolvedValue(undefined);

      const response = await request(ctx.app)
        .put(`${PET_URL}/medication-sessions/med-1`)
        .send({ dosageGiven: 0.5 });

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body.session).toMatchObject({ id: 'med-1', dosageGiven: 0.5 });
      expect(update.mock.calls[0][0].oldSession.dosageGiven).toBe(1);
      expect(update.mock.calls[0][0].newSession.dosageGiven).toBe(0.5);
    });
  });

  describe('progress', () => {
    it('should default to the current week', async () => {
      const ctx = createTestContext();
      const days = { '2026-10-19': 'today' as const };
      const getWeek = jest.spyOn(ctx.progress, 'getWeekStatuses').mockResolvedValue(days);

      const response = await request(ctx.app).get(`${PET_URL}/progress/week`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toEqual({ weekStart: '2026-10-19', days });
      expect(getWeek).toHaveBeenCalledWith(USER, PET, new Date(2026, 9, 19), undefined);
    });

    it('should reject a week start that is not a calendar date', async () => {
      const { app } = createTestContext();

      const response = await request(app).get(`${PET_URL}/progress/week?weekStart=monday`);

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.issues).toEqual([
        { path: 'weekStart', message: 'Expected a date as YYYY-MM-DD' },
      ]);
    });
  });

  describe('quality of life', () => {
    it('should create a check-in with its scores', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.qol, 'getAssessment').mockResolvedValue(null);
      const save = jest.spyOn(ctx.qol, 'saveAssessment').mockResolvedValue(undefined);

      const response = await request(ctx.app)
        .post(`${PET_URL}/qol-assessments`)
        .send({ responses: qolResponses(3) });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body).toMatchObject({
        userId: USER,
        petId: PET,
        date: new Date(2026, 9, 19).toISOString(),
        overallScore: 75,
        scoreBand: 'good',
        isComplete: true,
      });
      expect(save).toHaveBeenCalledTimes(1);
    });

    it('should answer 400 with every validation error', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.qol, 'getAssessment').mockResolvedValue(null);
      jest
        .spyOn(ctx.qol, 'saveAssessment')
        .mockRejectedValue(new QolValidationException(['Invalid question ID: mood_9']));

      const response = await request(ctx.app)
        .post(`${PET_URL}/qol-assessments`)
        .send({ responses: [{ questionId: 'mood_9', score: 2 }] });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.errors).toEqual(['Invalid question ID: mood_9']);
      expect(response.body.userMessage).toBe('Invalid question ID: mood_9');
    });

    it('should attach a message to the trend interpretation', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.qol, 'getTrend').mockResolvedValue({
        points: [],
        stability: 'stable',
        interpretation: 'improving',
        notableDrops: [],
      });

      const response = await request(ctx.app).get(`${PET_URL}/qol-assessments/trend`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body.message).toBe(QOL_INTERPRETATION_MESSAGES.improving);
    });

    it('should answer 404 for a day without a check-in', async () => {
      const ctx = createTestContext();
      const get = jest.spyOn(ctx.qol, 'getAssessment').mockResolvedValue(null);

      const response = await request(ctx.app).get(`${PET_URL}/qol-assessments/2026-10-12`);

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(get).toHaveBeenCalledWith(USER, PET, new Date(2026, 9, 12));
    });

    it('should reject a date in the wrong format', async () => {
      const { app } = createTestContext();

      const response = await request(app).get(`${PET_URL}/qol-assessments/12-10-2026`);

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.error).toBe('Invalid path parameters');
    });
  });

  describe('weight', () => {
    it('should log a weight for today when no date is given', async () => {
      const ctx = createTestContext();
      const logWeight = jest
        .spyOn(ctx.weight, 'logWeight')
        .mockResolvedValue({ date: new Date(2026, 9, 19), weightKg: 4.2 });

      const response = await request(ctx.app).post(`${PET_URL}/weights`).send({ weightKg: 4.2 });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body).toEqual({ date: new Date(2026, 9, 19).toISOString(), weightKg: 4.2 });
      expect(logWeight).toHaveBeenCalledWith({
        userId: USER,
        petId: PET,
        date: TEST_NOW,
        weightKg: 4.2,
        notes: undefined,
      });
    });

    it('should answer 400 for an implausible weight', async () => {
      const { app } = createTestContext();

      const response = await request(app).post(`${PET_URL}/weights`).send({ weightKg: 16 });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.userMessage).toBe(
        'Weight of 16.0kg is extremely high for a cat. Please verify this is correct'
      );
    });

    it('should move an entry to the day given in the body', async () => {
      const ctx = createTestContext();
      const update = jest
        .spyOn(ctx.weight, 'updateWeight')
        .mockResolvedValue({ date: new Date(2026, 9, 19), weightKg: 4.3 });

      const response = await request(ctx.app)
        .put(`${PET_URL}/weights/2026-10-12`)
        .send({ date: '2026-10-19', weightKg: 4.3 });

      expect(response.status).toBe(StatusCodes.OK);
      expect(update).toHaveBeenCalledWith({
        userId: USER,
        petId: PET,
        oldDate: new Date(2026, 9, 12),
        date: new Date(2026, 9, 19),
        weightKg: 4.3,
        notes: undefined,
      });
    });

    it('should answer 404 when deleting a day without a weight', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.weight, 'deleteWeight').mockRejectedValue(new WeightNotFoundException('2026-10-12'));

      const response = await request(ctx.app).delete(`${PET_URL}/weights/2026-10-12`);

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(response.body).toEqual({ error: 'No weight entry on 2026-10-12', date: '2026-10-12' });
    });

    it('should answer null when nothing has been weighed', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.weight, 'getLatestWeight').mockResolvedValue(null);

      const response = await request(ctx.app).get(`${PET_URL}/weights/latest`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toEqual({ entry: null });
    });

    it('should pass the history page on to the service', async () => {
      const ctx = createTestContext();
      const history = jest.spyOn(ctx.weight, 'getWeightHistory').mockResolvedValue([]);

      const response = await request(ctx.app).get(`${PET_URL}/weights?limit=10&startAfter=2026-10-01`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toEqual({ entries: [] });
      expect(history).toHaveBeenCalledWith(USER, PET, { limit: 10, startAfter: new Date(2026, 9, 1) });
    });

    it('should carry the user message of a failed write', async () => {
      const ctx = createTestContext();
      jest
        .spyOn(ctx.weight, 'logWeight')
        .mockRejectedValue(new HealthServiceException('batch rejected', 'weight'));

      const response = await request(ctx.app).post(`${PET_URL}/weights`).send({ weightKg: 4.2 });

      expect(response.status).toBe(StatusCodes.INTERNAL_SERVER_ERROR);
      expect(response.body).toEqual({
        error: 'Failed to log weight: batch rejected',
        userMessage: 'Could not save the weight entry. Please try again.',
      });
    });
  });

  describe('symptoms', () => {
    it('should save the check-in for the day in the path', async () => {
      const ctx = createTestContext();
      const save = jest.spyOn(ctx.symptoms, 'saveSymptoms').mockResolvedValue({
        date: new Date(2026, 9, 19),
        symptoms: { vomiting: 2 },
        hasSymptoms: true,
        symptomScoreTotal: 2,
        symptomScoreAverage: 2,
      });

      const response = await request(ctx.app)
        .put(`${PET_URL}/symptoms/2026-10-19`)
        .send({ symptoms: { vomiting: 2 } });

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toMatchObject({ symptoms: { vomiting: 2 }, hasSymptoms: true });
      expect(save).toHaveBeenCalledWith({
        userId: USER,
        petId: PET,
        date: new Date(2026, 9, 19),
        symptoms: { vomiting: 2 },
      });
    });

    it('should answer 400 for a score out of range', async () => {
      const { app } = createTestContext();

      const response = await request(app)
        .put(`${PET_URL}/symptoms/2026-10-19`)
        .send({ symptoms: { lethargy: 12 } });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.errors).toEqual(['Symptom score for "lethargy" must be between 0 and 10, got: 12']);
    });

    it('should reject a symptom it does not track', async () => {
      const { app } = createTestContext();

      const response = await request(app)
        .put(`${PET_URL}/symptoms/2026-10-19`)
        .send({ symptoms: { sneezing: 1 } });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body.error).toBe('Invalid request body');
    });

    it('should answer 404 for a day without an entry', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.symptoms, 'getDailyHealth').mockResolvedValue(null);

      const response = await request(ctx.app).get(`${PET_URL}/symptoms/2026-10-18`);

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
    });

    it('should read the symptoms-only flag from the query', async () => {
      const ctx = createTestContext();
      const recent = jest.spyOn(ctx.symptoms, 'getRecentHealth').mockResolvedValue([]);

      const response = await request(ctx.app).get(`${PET_URL}/symptoms?symptomsOnly=true`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(recent).toHaveBeenCalledWith(USER, PET, { symptomsOnly: true });
    });

    it('should clear the day', async () => {
      const ctx = createTestContext();
      const clear = jest
        .spyOn(ctx.symptoms, 'clearSymptoms')
        .mockResolvedValue({ date: new Date(2026, 9, 19), hasSymptoms: false });

      const response = await request(ctx.app).delete(`${PET_URL}/symptoms/2026-10-19`);

      expect(response.status).toBe(StatusCodes.NO_CONTENT);
      expect(clear).toHaveBeenCalledWith(USER, PET, new Date(2026, 9, 19));
    });
  });

  describe('fluid inventory', () => {
    const INVENTORY_URL = `/users/${USER}/inventory`;
    const LOW_STOCK = {
      remainingVolume: 250,
      initialVolume: 1000,
      reminderSessionsLeft: 3,
      refillCount: 2,
      inventoryEnabledAt: new Date(2026, 9, 1),
      lastThresholdNotificationSentAt: null,
    };

    it('should answer 404 before tracking starts', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.inventory, 'getInventory').mockResolvedValue(null);

      const response = await request(ctx.app).get(INVENTORY_URL);

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(response.body).toEqual({ error: 'Inventory not found' });
    });

    it('should start tracking with the first refill', async () => {
      const ctx = createTestContext();
      const create = jest.spyOn(ctx.inventory, 'createInventory').mockResolvedValue();

      const response = await request(ctx.app)
        .post(INVENTORY_URL)
        .send({ volumeAdded: 1000, reminderSessionsLeft: 3 });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body).toEqual({ remainingVolume: 1000, reminderSessionsLeft: 3 });
      expect(create).toHaveBeenCalledWith({ userId: USER, volumeAdded: 1000, reminderSessionsLeft: 3 });
    });

    it('should add a refill to the stock unless it is a reset', async () => {
      const ctx = createTestContext();
      const refill = jest.spyOn(ctx.inventory, 'addRefill').mockResolvedValue(1250);

      const response = await request(ctx.app)
        .post(`${INVENTORY_URL}/refills`)
        .send({ volumeAdded: 1000, reminderSessionsLeft: 3 });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body).toEqual({ remainingVolume: 1250 });
      expect(refill).toHaveBeenCalledWith({
        userId: USER,
        volumeAdded: 1000,
        reminderSessionsLeft: 3,
        isReset: false,
      });
    });

    it('should answer 404 for a refill before tracking starts', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.inventory, 'addRefill').mockRejectedValue(new InventoryNotFoundException(USER));

      const response = await request(ctx.app)
        .post(`${INVENTORY_URL}/refills`)
        .send({ volumeAdded: 500, reminderSessionsLeft: 3 });

      expect(response.status).toBe(StatusCodes.NOT_FOUND);
      expect(response.body).toEqual({ error: 'No fluid inventory for user user-1' });
    });

    it('should answer 400 for a negative volume', async () => {
      const { app } = createTestContext();

      const response = await request(app).put(`${INVENTORY_URL}/volume`).send({ newVolume: -5 });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body).toEqual({
        error: 'Volume must not be negative',
        errors: ['Volume must not be negative'],
        userMessage: 'Volume must not be negative',
      });
    });

    it("should measure the stock against the pet's schedules", async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.inventory, 'getInventory').mockResolvedValue(LOW_STOCK);
      const list = jest.spyOn(ctx.schedules, 'listSchedules').mockResolvedValue([fluidSchedule()]);

      const response = await request(ctx.app).get(`${PET_URL}/inventory`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toMatchObject({
        sessionsLeft: 2,
        daysRemaining: 2,
        estimatedEndDate: new Date(2026, 9, 21, 10, 0).toISOString(),
        averageVolumePerSession: 100,
        totalDailyVolume: 100,
        thresholdVolume: 300,
        isLow: true,
      });
      expect(list).toHaveBeenCalledWith(USER, PET, { activeOnly: true });
    });

    it('should draw a logged fluid session from the stock', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'getTodaysSchedules').mockResolvedValue([fluidSchedule()]);
      jest.spyOn(ctx.logging, 'logFluidSession').mockResolvedValue('fluid-new');
      const deduct = jest.spyOn(ctx.inventory, 'deductForSession').mockResolvedValue(LOW_STOCK);
      const check = jest.spyOn(ctx.inventory, 'checkThresholdAndNotify').mockResolvedValue('notified');

      const response = await request(ctx.app)
        .post(`${PET_URL}/fluid-sessions`)
        .send({ dateTime: '2026-10-19T09:30:00', volumeGiven: 100 });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(response.body.id).toBe('fluid-new');
      expect(deduct.mock.calls[0][1]).toMatchObject({ volumeGiven: 100, dateTime: new Date(2026, 9, 19, 9, 30) });
      expect(check).toHaveBeenCalledWith({
        userId: USER,
        petId: PET,
        inventory: LOW_STOCK,
        schedules: [fluidSchedule()],
      });
    });

    it('should draw only the change when a fluid session is edited', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.logging, 'getFluidSession').mockResolvedValue(fluidSession());
      jest.spyOn(ctx.logging, 'updateFluidSession').mockResolvedValue();
      const deduct = jest.spyOn(ctx.inventory, 'deductForSession').mockResolvedValue(null);

      const response = await request(ctx.app)
        .put(`${PET_URL}/fluid-sessions/fluid-1`)
        .send({ volumeGiven: 120 });

      expect(response.status).toBe(StatusCodes.OK);
      expect(deduct).toHaveBeenCalledWith(USER, fluidSession({ volumeGiven: 120 }), fluidSession());
    });

    it('should keep the logged session when the stock cannot be updated', async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'getTodaysSchedules').mockResolvedValue([fluidSchedule()]);
      jest.spyOn(ctx.logging, 'logFluidSession').mockResolvedValue('fluid-new');
      jest
        .spyOn(ctx.inventory, 'deductForSession')
        .mockRejectedValue(new InventoryServiceException('Failed to deduct session: unavailable'));
      const check = jest.spyOn(ctx.inventory, 'checkThresholdAndNotify');

      const response = await request(ctx.app)
        .post(`${PET_URL}/fluid-sessions`)
        .send({ dateTime: '2026-10-19T09:30:00', volumeGiven: 100 });

      expect(response.status).toBe(StatusCodes.CREATED);
      expect(check).not.toHaveBeenCalled();
    });
  });

  describe('reminders', () => {
    it('should list no reminders before any are scheduled', async () => {
      const { app } = createTestContext();

      const response = await request(app).get(`${PET_URL}/reminders/today`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toEqual({ reminders: [] });
    });

    it('should reject a snooze payload that is not JSON', async () => {
      const { app } = createTestContext();

      const response = await request(app).post('/reminders/snooze').send({ payload: 'not-json' });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
      expect(response.body).toEqual({ success: false, reason: 'invalid_payload' });
    });

    it('should refuse to snooze when the user turned snoozing off', async () => {
      const { app } = createTestContext();
      await request(app)
        .put(`/users/${USER}/notification-settings`)
        .send({ snoozeEnabled: false });

      const payload = JSON.stringify({
        userId: USER,
        petId: PET,
        scheduleId: 'sched-med',
        timeSlot: '08:00',
        kind: 'initial',
        treatmentType: 'medication',
      });
      const response = await request(app).post('/reminders/snooze').send({ payload });

      expect(response.status).toBe(StatusCodes.CONFLICT);
      expect(response.body).toEqual({ success: false, reason: 'snooze_disabled' });
    });
  });

  describe('notification settings', () => {
    it('should return the defaults, then the saved settings', async () => {
      const { app } = createTestContext();

      const initial = await request(app).get(`/users/${USER}/notification-settings`);
      expect(initial.body).toEqual({
        enableNotifications: true,
        snoozeEnabled: true,
        weeklySummaryEnabled: true,
      });

      const updated = await request(app)
        .put(`/users/${USER}/notification-settings`)
        .send({ weeklySummaryEnabled: false });
      expect(updated.status).toBe(StatusCodes.OK);
      expect(updated.body).toEqual({
        enableNotifications: true,
        snoozeEnabled: true,
        weeklySummaryEnabled: false,
      });
    });

    it('should reject unknown settings', async () => {
      const { app } = createTestContext();

      const response = await request(app)
        .put(`/users/${USER}/notification-settings`)
        .send({ quietHours: true });

      expect(response.status).toBe(StatusCodes.BAD_REQUEST);
    });
  });

  describe('offline queue', () => {
    it('should report an unknown operation as not retried', async () => {
      const { app } = createTestContext();

      const response = await request(app).post(`${SYNC_URL}/operations/missing/retry`);

      expect(response.status).toBe(StatusCodes.OK);
      expect(response.body).toEqual({ success: false });
    });

    it("should not show one user's queued operations to another", async () => {
      const ctx = createTestContext();
      jest.spyOn(ctx.schedules, 'getTodaysSchedules').mockRejectedValue(new Error('offline'));
      await request(ctx.app).post(`${PET_URL}/quick-log`);

      const own = await request(ctx.app).get(`${SYNC_URL}/queue`);
      const other = await request(ctx.app).get('/users/user-2/sync/queue');

      expect(own.body.size).toBe(1);
      expect(other.body).toEqual({ size: 0, pending: 0, failed: 0, warning: false, operations: [] });
    });

    it('should clear the queue', async () => {
      const { app } = createTestContext();

      const response = await request(app).delete(`${SYNC_URL}/queue`);

      expect(response.status).toBe(StatusCodes.NO_CONTENT);
    });
  });
});
