/**
 * Summary update
 * Counter deltas applied to the daily, weekly and monthly summary documents.
 * Deltas left undefined are not written at all.
 */

import { FieldValue } from '@google-cloud/firestore';
import type { DocumentData } from '@google-cloud/firestore';
import type { FluidSession } from '../../models/fluid-session.model';
import type { MedicationSession } from '../../models/medication-session.model';

export interface SummaryDeltas {
  medicationDosesDelta?: number;
  medicationScheduledDelta?: number;
  medicationMissedDelta?: number;
  fluidVolumeDelta?: number;
  fluidSessionDelta?: number;
  overallStreakDelta?: number;
  fluidTreatmentDone?: boolean;
  overallTreatmentDone?: boolean;
}

const INCREMENT_FIELDS = [
  ['medicationDosesDelta', 'medicationTotalDoses'],
  ['medicationScheduledDelta', 'medicationScheduledDoses'],
  ['medicationMissedDelta', 'medicationMissedCount'],
  ['fluidVolumeDelta', 'fluidTotalVolume'],
  ['fluidSessionDelta', 'fluidSessionCount'],
  ['overallStreakDelta', 'overallStreak'],
] as const;

function nonZero(delta: number): number | undefined {
  return delta !== 0 ? delta : undefined;
}

export class SummaryUpdate {
  constructor(readonly deltas: Readonly<SummaryDeltas> = {}) {}

  /**
   * A new session counts as scheduled; an update does not count it again
   */
  static fromMedicationSession(session: MedicationSession, isUpdate = false): SummaryUpdate {
    return new SummaryUpdate({
      medicationDosesDelta: session.completed ? 1 : 0,
      medicationScheduledDelta: isUpdate ? 0 : 1,
      medicationMissedDelta: session.completed ? 0 : 1,
    });
  }

  static fromFluidSession(session: FluidSession, isUpdate = false): SummaryUpdate {
    return new SummaryUpdate({
      fluidVolumeDelta: session.volumeGiven,
      fluidSessionDelta: isUpdate ? 0 : 1,
      fluidTreatmentDone: true,
    });
  }

  static forMedicationSessionUpdate(
    oldSession: MedicationSession,
    newSession: MedicationSession
  ): SummaryUpdate {
    const completedDelta = Number(newSession.completed) - Number(oldSession.completed);
    return new SummaryUpdate({
      medicationDosesDelta: nonZero(completedDelta),
      medicationMissedDelta: nonZero(-completedDelta),
    });
  }

  static forFluidSessionUpdate(oldSession: FluidSession, newSession: FluidSession): SummaryUpdate {
    return new SummaryUpdate({
      fluidVolumeDelta: nonZero(newSession.volumeGiven - oldSession.volumeGiven),
    });
  }

  get hasUpdates(): boolean {
    return Object.values(this.deltas).some((value) => value !== undefined);
  }

  /**
   * Merge payload: increments for deltas, plain values for flags, and a server timestamp
   */
  toFirestoreUpdate(): DocumentData {
    const update: DocumentData = {};

    for (const [deltaKey, field] of INCREMENT_FIELDS) {
      const delta = this.deltas[deltaKey];
      if (delta !== undefined) {
        update[field] = FieldValue.increment(delta);
      }
    }

    if (this.deltas.fluidTreatmentDone !== undefined) {
      update.fluidTreatmentDone = this.deltas.fluidTreatmentDone;
    }
    if (this.deltas.overallTreatmentDone !== undefined) {
      update.overallTreatmentDone = this.deltas.overallTreatmentDone;
    }

    update.updatedAt = FieldValue.serverTimestamp();
    return update;
  }
}
