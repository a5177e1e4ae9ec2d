/**
 * Health tracking errors
 */

export class HealthValidationException extends Error {
  constructor(readonly errors: string[]) {
    super(errors.join(', '));
    this.name = 'HealthValidationException';
  }

  get userMessage(): string {
    return this.errors[0] ?? 'Please check the values and try again.';
  }
}

export class WeightValidationException extends HealthValidationException {
  constructor(errors: string[]) {
    super(errors);
    this.name = 'WeightValidationException';
  }
}

export class SymptomValidationException extends HealthValidationException {
  constructor(errors: string[]) {
    super(errors);
    this.name = 'SymptomValidationException';
  }
}

export class HealthServiceException extends Error {
  constructor(
    message: string,
    private readonly feature: 'weight' | 'symptoms'
  ) {
    super(message);
    this.name = 'HealthServiceException';
  }

  get userMessage(): string {
    return this.feature === 'weight'
      ? 'Could not save the weight entry. Please try again.'
      : 'Could not save the symptom check-in. Please try again.';
  }
}

export class WeightNotFoundException extends Error {
  constructor(readonly date: string) {
    super(`No weight entry on ${date}`);
    this.name = 'WeightNotFoundException';
  }
}
