/**
 * Fluid inventory errors
 */

export class InventoryValidationException extends Error {
  constructor(readonly errors: string[]) {
    super(errors.join(', '));
    this.name = 'InventoryValidationException';
  }

  get userMessage(): string {
    return this.errors[0] ?? 'Please check the amounts and try again.';
  }
}

export class InventoryNotFoundException extends Error {
  constructor(readonly userId: string) {
    super(`No fluid inventory for user ${userId}`);
    this.name = 'InventoryNotFoundException';
  }
}

export class InventoryServiceException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InventoryServiceException';
  }

  get userMessage(): string {
    return 'Could not update your fluid inventory. Please try again.';
  }
}
