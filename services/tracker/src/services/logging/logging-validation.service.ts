/**
 * Logging Validation Service
 * Business rules layered on top of the session models' structural checks
 */

import { validateFluidSession as validateFluidModel } from '../../models/fluid-session.model';
import type { FluidSession } from '../../models/fluid-session.model';
import { validateMedicationSession as validateMedicationModel } from '../../models/medication-session.model';
import type { MedicationSession } from '../../models/medication-session.model';
import { DuplicateSessionException, SessionValidationException } from './logging-errors';
import type { LoggingException } from './logging-errors';
import {
  errorsByType,
  validationFailure,
  validationSuccess,
  validationWarnings,
} from './validation-result';
import type { ValidationError, ValidationResult } from './validation-result';

const DUPLICATE_WINDOW_MINUTES = 15;
const MAX_SCHEDULE_DRIFT_HOURS = 2;
const MS_PER_HOUR = 60 * 60 * 1000;

export class LoggingValidationService {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Same medication logged within the window, if any
   */
  findDuplicateSession(
    newSession: MedicationSession,
    recentSessions: MedicationSession[],
    windowMinutes: number = DUPLICATE_WINDOW_MINUTES
  ): MedicationSession | null {
    const windowMs = windowMinutes * 60 * 1000;
    for (const existing of recentSessions) {
      if (existing.medicationName !== newSession.medicationName) {
        continue;
      }
      const diff = Math.abs(existing.dateTime.getTime() - newSession.dateTime.getTime());
      if (diff <= windowMs) {
        return existing;
      }
    }
    return null;
  }

  validateForDuplicates(
    newSession: MedicationSession,
    recentSessions: MedicationSession[],
    windowMinutes: number = DUPLICATE_WINDOW_MINUTES
  ): ValidationResult {
    if (this.findDuplicateSession(newSession, recentSessions, windowMinutes)) {
      return validationFailure([
        {
          message: `You've already logged ${newSession.medicationName} today. Would you like to update it instead?`,
          fieldName: 'medication',
          type: 'duplicate',
        },
      ]);
    }
    return validationSuccess();
  }

  validateMedicationSession(session: MedicationSession): ValidationResult {
    const now = this.now();
    const errors = validateMedicationModel(session, now).map(
      (message): ValidationError => ({ message, fieldName: 'session', type: 'invalid' })
    );

    if (session.medicationName.trim().length < 2) {
      errors.push({
        message: 'Medication name must be at least 2 characters',
        fieldName: 'medicationName',
        type: 'invalid',
      });
    }
    if (session.dateTime.getTime() > now.getTime()) {
      errors.push({
        message: 'Cannot log medication for future time',
        fieldName: 'dateTime',
        type: 'invalid',
      });
    }

    return errors.length > 0 ? validationFailure(errors) : validationSuccess();
  }

  validateFluidSession(session: FluidSession): ValidationResult {
    const now = this.now();
    const errors = validateFluidModel(session, now).map(
      (message): ValidationError => ({ message, fieldName: 'session', type: 'invalid' })
    );

    if (session.dateTime.getTime() > now.getTime()) {
      errors.push({
        message: 'Cannot log fluid therapy for future time',
        fieldName: 'dateTime',
        type: 'invalid',
      });
    }

    return errors.length > 0 ? validationFailure(errors) : validationSuccess();
  }

  validateFluidVolume(volumeGiven: number, scheduledVolume?: number): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: string[] = [];

    if (volumeGiven < 1 || volumeGiven > 500) {
      errors.push({
        message: "Please enter a volume between 1-500ml to keep your cat's data accurate",
        fieldName: 'volume',
        type: 'invalid',
      });
    }

    if (volumeGiven > 0 && volumeGiven < 50) {
      warnings.push('Volume under 50ml is quite low. Is this correct?');
    } else if (volumeGiven > 300) {
      warnings.push('Volume over 300ml is high. Please verify this amount.');
    }

    if (scheduledVolume !== undefined && scheduledVolume > 0) {
      if (Math.abs(volumeGiven - scheduledVolume) > scheduledVolume * 0.5) {
        warnings.push(
          `Volume differs significantly from scheduled ${Math.trunc(scheduledVolume)}ml. This is fine if intentional.`
        );
      }
    }

    if (errors.length > 0) {
      return validationFailure(errors);
    }
    return warnings.length > 0 ? validationWarnings(warnings) : validationSuccess();
  }

  validateMedicationDosage(
    dosageGiven: number,
    dosageScheduled: number,
    medicationUnit: string
  ): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: string[] = [];

    if (dosageGiven < 0) {
      errors.push({ message: 'Dosage cannot be negative', fieldName: 'dosage', type: 'invalid' });
    }
    if (dosageGiven > 100) {
      errors.push({
        message: `Dosage of ${dosageGiven} ${medicationUnit} seems unrealistically high. Please verify this amount.`,
        fieldName: 'dosage',
        type: 'invalid',
      });
    }

    if (dosageScheduled > 0 && Math.abs(dosageGiven - dosageScheduled) > dosageScheduled * 0.5) {
      warnings.push(
        `Dosage differs significantly from scheduled ${dosageScheduled} ${medicationUnit}. This is fine if intentional.`
      );
    }
    if (dosageGiven === 0) {
      warnings.push('Dosage is 0 - consider marking this treatment as missed instead.');
    }

    if (errors.length > 0) {
      return validationFailure(errors);
    }
    return warnings.length > 0 ? validationWarnings(warnings) : validationSuccess();
  }

  /**
   * Warn when the treatment was given far from its scheduled time
   * Manual logs (no scheduled time) always pass.
   */
  validateScheduleConsistency(sessionTime: Date, scheduledTime?: Date): ValidationResult {
    if (!scheduledTime) {
      return validationSuccess();
    }

    const driftMs = Math.abs(sessionTime.getTime() - scheduledTime.getTime());
    if (driftMs > MAX_SCHEDULE_DRIFT_HOURS * MS_PER_HOUR) {
      const hours = Math.floor(driftMs / MS_PER_HOUR);
      return validationWarnings([
        `Treatment time is ${hours}h different from scheduled. This may affect adherence tracking.`,
      ]);
    }
    return validationSuccess();
  }

  toLoggingException(result: ValidationResult, duplicateSession?: MedicationSession): LoggingException {
    if (result.isValid) {
      throw new Error('Cannot create exception from valid result');
    }

    if (errorsByType(result, 'duplicate').length > 0) {
      return new DuplicateSessionException({
        sessionType: 'medication',
        conflictingTime: duplicateSession?.dateTime ?? this.now(),
        medicationName: duplicateSession?.medicationName,
        existingSession: duplicateSession,
      });
    }

    return new SessionValidationException(result.errors.map((e) => e.message));
  }
}
