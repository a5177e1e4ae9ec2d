/**
 * Test fixtures: schedules, sessions, QoL assessments and health days for user-1 / pet-1
 */

import type { QolDomain } from '../../../../shared';
import type { FluidSession } from '../../src/models/fluid-session.model';
import type { HealthParameter } from '../../src/models/health-parameter.model';
import type { MedicationSession } from '../../src/models/medication-session.model';
import type { QolAssessment, QolResponse } from '../../src/models/qol-assessment.model';
import type { Schedule } from '../../src/models/schedule.model';
import { QOL_QUESTIONS } from '../../src/services/qol/qol-questions';

export const USER = 'user-1';
export const PET = 'pet-1';

/**
 * Time of day carried by a reminder; only hours and minutes matter
 */
export function at(hour: number, minute = 0): Date {
  return new Date(2026, 0, 1, hour, minute);
}

export function medicationSchedule(overrides: Partial<Schedule> = {}): Schedule {
  return {
    id: 'sched-med',
    treatmentType: 'medication',
    frequency: 'thriceDaily',
    reminderTimes: [at(8), at(9, 45), at(18)],
    isActive: true,
    createdAt: new Date(2026, 8, 1),
    updatedAt: new Date(2026, 8, 1),
    medicationName: 'Benazepril',
    targetDosage: 1,
    medicationUnit: 'pills',
    ...overrides,
  };
}

export function fluidSchedule(overrides: Partial<Schedule> = {}): Schedule {
  return {
    id: 'sched-fluid',
    treatmentType: 'fluid',
    frequency: 'onceDaily',
    reminderTimes: [at(20)],
    isActive: true,
    createdAt: new Date(2026, 8, 1),
    updatedAt: new Date(2026, 8, 1),
    targetVolume: 100,
    preferredLocation: 'shoulderBladeLeft',
    needleGauge: '20G',
    ...overrides,
  };
}

export function medicationSession(overrides: Partial<MedicationSession> = {}): MedicationSession {
  return {
    id: 'med-1',
    petId: PET,
    userId: USER,
    dateTime: new Date(2026, 9, 19, 8, 10),
    medicationName: 'Benazepril',
    dosageGiven: 1,
    dosageScheduled: 1,
    medicationUnit: 'pills',
    completed: true,
    createdAt: new Date(2026, 9, 19, 8, 10),
    ...overrides,
  };
}

export function fluidSession(overrides: Partial<FluidSession> = {}): FluidSession {
  return {
    id: 'fluid-1',
    petId: PET,
    userId: USER,
    dateTime: new Date(2026, 9, 19, 9, 30),
    volumeGiven: 100,
    injectionSite: 'shoulderBladeLeft',
    createdAt: new Date(2026, 9, 19, 9, 30),
    ...overrides,
  };
}

/**
 * One response per question; each domain answered with a single score
 */
export function qolResponses(
  scores: Partial<Record<QolDomain, number | null>> | number
): QolResponse[] {
  return QOL_QUESTIONS.map((question) => ({
    questionId: question.id,
    score: typeof scores === 'number' ? scores : scores[question.domain] ?? null,
  }));
}

export function qolAssessment(overrides: Partial<QolAssessment> = {}): QolAssessment {
  return {
    id: 'qol-1',
    userId: USER,
    petId: PET,
    date: new Date(2026, 9, 19),
    responses: qolResponses(3),
    createdAt: new Date(2026, 9, 19, 9, 0),
    ...overrides,
  };
}

export function weightDay(date: Date, weight: number, overrides: Partial<HealthParameter> = {}): HealthParameter {
  return { date, weight, hasWeight: true, createdAt: date, updatedAt: date, ...overrides };
}
