/**
 * Firestore collection names and document paths
 * Centralized constants to avoid hardcoding paths across services
 */

// Root collections
export const USERS_COLLECTION = 'users';
export const PETS_COLLECTION = 'pets';

// Per-pet subcollections
export const SCHEDULES_COLLECTION = 'schedules';
export const MEDICATION_SESSIONS_COLLECTION = 'medicationSessions';
export const FLUID_SESSIONS_COLLECTION = 'fluidSessions';
export const QOL_ASSESSMENTS_COLLECTION = 'qolAssessments';
export const HEALTH_PARAMETERS_COLLECTION = 'healthParameters';

// Per-user fluid stock: fluidInventory/main, with its refills below it
export const FLUID_INVENTORY_COLLECTION = 'fluidInventory';
export const FLUID_INVENTORY_DOC_ID = 'main';
export const REFILLS_SUBCOLLECTION = 'refills';

// Summaries: treatmentSummaries/{period}/summaries/{periodId}
export const TREATMENT_SUMMARIES_COLLECTION = 'treatmentSummaries';
export const SUMMARIES_SUBCOLLECTION = 'summaries';

export type SummaryPeriod = 'daily' | 'weekly' | 'monthly';

/**
 * Path of a pet document: users/{userId}/pets/{petId}
 */
export function petPath(userId: string, petId: string): string {
  return `${USERS_COLLECTION}/${userId}/${PETS_COLLECTION}/${petId}`;
}

/**
 * Path of a user's fluid inventory document: users/{userId}/fluidInventory/main
 */
export function fluidInventoryDocPath(userId: string): string {
  return `${USERS_COLLECTION}/${userId}/${FLUID_INVENTORY_COLLECTION}/${FLUID_INVENTORY_DOC_ID}`;
}

/**
 * Path of a per-pet subcollection
 */
export function petCollectionPath(userId: string, petId: string, collection: string): string {
  return `${petPath(userId, petId)}/${collection}`;
}

/**
 * Path of a summary document
 * Format: users/{userId}/pets/{petId}/treatmentSummaries/{period}/summaries/{periodId}
 * (e.g. ".../daily/summaries/2026-03-09", ".../weekly/summaries/2026-W11", ".../monthly/summaries/2026-03")
 */
export function summaryDocPath(
  userId: string,
  petId: string,
  period: SummaryPeriod,
  periodId: string
): string {
  return `${petPath(userId, petId)}/${TREATMENT_SUMMARIES_COLLECTION}/${period}/${SUMMARIES_SUBCOLLECTION}/${periodId}`;
}
