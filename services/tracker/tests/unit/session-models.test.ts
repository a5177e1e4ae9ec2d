/**
 * Session model tests
 */

import { validateFluidSession } from '../../src/models/fluid-session.model';
import {
  MedicationSessionInputSchema,
  MedicationSessionUpdateSchema,
  adherencePercentage,
  isFullDose,
  isMissed,
  isPartialDose,
  medicationSessionFromSchedule,
  validateMedicationSession,
} from '../../src/models/medication-session.model';
import {
  PET,
  USER,
  fluidSchedule,
  fluidSession,
  medicationSchedule,
  medicationSession,
} from '../helpers/fixtures';

const NOW = new Date(2026, 9, 19, 10, 0);

describe('medication session', () => {
  describe('validateMedicationSession', () => {
    it('should accept a complete dose', () => {
      expect(validateMedicationSession(medicationSession(), NOW)).toEqual([]);
    });

    it('should report dosage and time problems in order', () => {
      const session = medicationSession({
        dosageGiven: 150,
        dateTime: new Date(2026, 9, 19, 11, 0),
      });

      expect(validateMedicationSession(session, NOW)).toEqual([
        'Dosage given seems unrealistically high (over 100)',
        'Treatment time cannot be in the future',
      ]);
    });

    it('should require a custom unit when the strength unit is "other"', () => {
      const session = medicationSession({ medicationStrengthUnit: 'other' });

      expect(validateMedicationSession(session, NOW)).toEqual([
        'Custom strength unit is required when strength unit is "other"',
      ]);
    });
  });

  describe('dose helpers', () => {
    it('should classify a half dose', () => {
      const session = medicationSession({ dosageGiven: 0.5 });

      expect(adherencePercentage(session)).toBe(50);
      expect(isPartialDose(session)).toBe(true);
      expect(isFullDose(session)).toBe(false);
      expect(isMissed(session)).toBe(false);
    });

    it('should treat an incomplete session as missed', () => {
      expect(isMissed(medicationSession({ completed: false }))).toBe(true);
    });
  });

  describe('medicationSessionFromSchedule', () => {
    it('should prefill the dose from the schedule', () => {
      const scheduledTime = new Date(2026, 9, 19, 8, 0);

      const session = medicationSessionFromSchedule({
        schedule: medicationSchedule(),
        scheduledTime,
        petId: PET,
        userId: USER,
        now: NOW,
      });

      expect(session).toMatchObject({
        dateTime: scheduledTime,
        medicationName: 'Benazepril',
        dosageGiven: 1,
        dosageScheduled: 1,
        medicationUnit: 'pills',
        completed: true,
        scheduleId: 'sched-med',
        scheduledTime,
        createdAt: NOW,
      });
    });

    it('should refuse a schedule without medication details', () => {
      expect(() =>
        medicationSessionFromSchedule({
          schedule: fluidSchedule(),
          scheduledTime: NOW,
          petId: PET,
          userId: USER,
        })
      ).toThrow('Schedule sched-fluid is missing medication details');
    });
  });

  describe('request schemas', () => {
    it('should read dates sent as ISO strings', () => {
      const input = MedicationSessionInputSchema.parse({
        dateTime: '2026-10-19T08:10:00',
        medicationName: 'Benazepril',
        dosageGiven: 1,
        dosageScheduled: 1,
        medicationUnit: 'pills',
        completed: true,
      });

      expect(input.dateTime).toEqual(new Date(2026, 9, 19, 8, 10));
    });

    it('should not let an update change the owner', () => {
      expect(MedicationSessionUpdateSchema.safeParse({ userId: 'someone-else' }).success).toBe(false);
      expect(MedicationSessionUpdateSchema.safeParse({ notes: 'With food' }).success).toBe(true);
    });
  });
});

describe('fluid session', () => {
  it.each([
    [0, 'Volume must be greater than 0'],
    [0.5, 'Volume must be at least 1ml'],
    [600, 'Volume must be 500ml or less'],
  ])('should reject a volume of %p ml', (volumeGiven, message) => {
    expect(validateFluidSession(fluidSession({ volumeGiven }), NOW)).toEqual([message]);
  });

  it('should accept a typical session', () => {
    expect(validateFluidSession(fluidSession(), NOW)).toEqual([]);
  });
});
