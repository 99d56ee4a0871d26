/**
 * ValidationError
 * Thrown when a field value (phone, birthday) is malformed
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = 'ValidationError';
  }
}

/**
 * NotFoundError
 * Thrown when a phone or record lookup has no match
 */
export class NotFoundError extends Error {
  constructor(message: string, readonly key?: string) {
    super(message);
    Object.setPrototypeOf(this, NotFoundError.prototype);
    this.name = 'NotFoundError';
  }
}

/**
 * AlreadyExistsError
 * Thrown by AddressBook.addRecord when failIfExists is set and the name is taken
 */
export class AlreadyExistsError extends Error {
  constructor(message: string, readonly key?: string) {
    super(message);
    Object.setPrototypeOf(this, AlreadyExistsError.prototype);
    this.name = 'AlreadyExistsError';
  }
}

export type ContactsError = ValidationError | NotFoundError | AlreadyExistsError;

export function isContactsError(err: unknown): err is ContactsError {
  return err instanceof ValidationError || err instanceof NotFoundError || err instanceof AlreadyExistsError;
}
