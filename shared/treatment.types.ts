/**
 * Treatment Types
 * Type definitions shared by schedules, sessions and summaries
 */

export const TREATMENT_TYPES = ['medication', 'fluid'] as const;
export type TreatmentType = (typeof TREATMENT_TYPES)[number];

/**
 * Schedule frequencies
 * - daily variants repeat every day at each reminder time
 * - everyOtherDay / every3Days repeat on an interval counted from the schedule's creation day
 */
export const TREATMENT_FREQUENCIES = [
  'onceDaily',
  'twiceDaily',
  'thriceDaily',
  'everyOtherDay',
  'every3Days',
] as const;
export type TreatmentFrequency = (typeof TREATMENT_FREQUENCIES)[number];

/**
 * Subcutaneous fluid injection sites
 */
export const FLUID_LOCATIONS = [
  'shoulderBladeLeft',
  'shoulderBladeRight',
  'hipBonesLeft',
  'hipBonesRight',
] as const;
export type FluidLocation = (typeof FLUID_LOCATIONS)[number];

export const STRESS_LEVELS = ['low', 'medium', 'high'] as const;
export type StressLevel = (typeof STRESS_LEVELS)[number];

/**
 * Day dot status shown on the weekly progress calendar
 */
export type DayDotStatus = 'none' | 'today' | 'complete' | 'missed';
