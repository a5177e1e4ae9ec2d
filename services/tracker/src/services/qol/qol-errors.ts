/**
 * QoL errors
 */

export class QolValidationException extends Error {
  constructor(readonly errors: string[]) {
    super(errors.join(', '));
    this.name = 'QolValidationException';
  }

  get userMessage(): string {
    return this.errors[0] ?? 'Please check your answers and try again.';
  }
}

export class QolServiceException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QolServiceException';
  }

  get userMessage(): string {
    return 'Could not save the quality of life check-in. Please try again.';
  }
}
