import { AppError } from './AppError';

/**
 * Conflict (409)
 * Thrown when a write collides with an existing record (duplicate email,
 * channel name or channel value) or is blocked by a reference to it
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
