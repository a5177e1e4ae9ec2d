/**
 * Validation result
 * Errors block a save; warnings are shown to the user but do not
 */

export type ValidationErrorType = 'missing' | 'invalid' | 'incomplete' | 'inconsistent' | 'duplicate';

export interface ValidationError {
  message: string;
  fieldName?: string;
  type: ValidationErrorType;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: string[];
  missingFields: string[];
}

export function validationSuccess(): ValidationResult {
  return { isValid: true, errors: [], warnings: [], missingFields: [] };
}

export function validationFailure(errors: ValidationError[]): ValidationResult {
  return {
    isValid: false,
    errors,
    warnings: [],
    missingFields: errors.flatMap((e) => (e.fieldName !== undefined ? [e.fieldName] : [])),
  };
}

export function validationWarnings(warnings: string[]): ValidationResult {
  return { isValid: true, errors: [], warnings, missingFields: [] };
}

export function errorsByType(result: ValidationResult, type: ValidationErrorType): ValidationError[] {
  return result.errors.filter((e) => e.type === type);
}
