/**
 * Centralized user-facing messages
 * Reminder content, group summaries and QoL interpretations
 */

import type { QolInterpretation } from '../../../../shared';

export const DEFAULT_PET_NAME = 'your pet';

export const REMINDER_MESSAGES = {
  medicationTitle: (petName: string) => `Treatment reminder: Medication for ${petName}`,
  medicationBody: (petName: string) => `It's time to give ${petName} their medication.`,
  fluidTitle: (petName: string) => `Treatment reminder: Fluid therapy for ${petName}`,
  fluidBody: (petName: string) => `It's time to give ${petName} their fluid therapy.`,
  followupTitle: (petName: string) => `Treatment reminder for ${petName}`,
  followupBody: (petName: string) => `${petName} may still need their treatment.`,
  snoozeTitle: (petName: string) => `Snoozed reminder for ${petName}`,
  snoozeBody: (petName: string) => `${petName} is still waiting for their treatment.`,
  weeklySummaryTitle: 'Your weekly summary is ready!',
  weeklySummaryBody: 'Tap to see your progress and treatment adherence.',
} as const;

function plural(count: number, one: string, other: string): string {
  return count === 1 ? one : other;
}

/**
 * Group summary title, e.g. "Luna's Reminders"
 */
export function groupSummaryTitle(petName: string): string {
  return `${petName}'s Reminders`;
}

/**
 * Group summary body
 * "2 medication reminders", "1 fluid therapy reminder", "2 medications, 1 fluid therapy"
 */
export function groupSummaryBody(medicationCount: number, fluidCount: number): string {
  if (medicationCount > 0 && fluidCount > 0) {
    const meds = plural(medicationCount, '1 medication', `${medicationCount} medications`);
    const fluids = plural(fluidCount, '1 fluid therapy', `${fluidCount} fluid therapies`);
    return `${meds}, ${fluids}`;
  }
  if (medicationCount > 0) {
    return plural(medicationCount, '1 medication reminder', `${medicationCount} medication reminders`);
  }
  return plural(fluidCount, '1 fluid therapy reminder', `${fluidCount} fluid therapy reminders`);
}

export const QOL_INTERPRETATION_MESSAGES: Record<QolInterpretation, string> = {
  notableDropComfort: 'Comfort scores dropped noticeably since the last check-in.',
  notableDropAppetite: 'Appetite scores dropped noticeably since the last check-in.',
  notableDropVitality: 'Energy and activity scores dropped noticeably since the last check-in.',
  notableDropEmotional: 'Mood scores dropped noticeably since the last check-in.',
  notableDropTreatmentBurden:
    'Treatments seem harder to tolerate than at the last check-in.',
  improving: 'Quality of life is improving compared to the last check-in.',
  declining: 'Quality of life is lower than at the last check-in.',
  stable: 'Quality of life is stable compared to the last check-in.',
};
