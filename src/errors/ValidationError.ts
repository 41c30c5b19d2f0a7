import { AppError } from './AppError';

/**
 * Validation Error (422 Unprocessable Entity)
 * Thrown when request payload, params or query fail schema validation
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, 422);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Invalid email confirmation token (422)
 * Bad signature, tampered payload, expired link or missing subject
 */
export class InvalidConfirmationTokenError extends AppError {
  constructor() {
    super('Invalid token for email verification', 422);
    Object.setPrototypeOf(this, InvalidConfirmationTokenError.prototype);
  }
}
