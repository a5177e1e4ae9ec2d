/**
 * Shared Types - Barrel Export
 *
 * @example
 * import { TreatmentType, NotificationKind, QolDomain, SymptomType } from '../shared';
 */

export * from './treatment.types';
export * from './notification.types';
export * from './qol.types';
export * from './health.types';
export * from './collections';
