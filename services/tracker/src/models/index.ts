/**
 * Firestore Models
 * Zod schemas, converters and collection helpers for every document the tracker reads or writes.
 * Local-only records (offline queue operations, notification index entries, settings) live here too.
 */

export * from './date-field';
export * from './schedule.model';
export * from './medication-session.model';
export * from './fluid-session.model';
export * from './daily-summary.model';
export * from './qol-assessment.model';
export * from './health-parameter.model';
export * from './fluid-inventory.model';
export * from './logging-operation.model';
export * from './scheduled-notification-entry.model';
export * from './notification-settings.model';
