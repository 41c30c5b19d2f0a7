import { AppError } from './AppError';

/**
 * Unauthorized (401)
 * Clients should add `WWW-Authenticate: Bearer` (errorHandler does)
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Invalid user authorization credentials or token is expired') {
    super(message, 401);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Invalid email');
    Object.setPrototypeOf(this, InvalidCredentialsError.prototype);
  }
}

export class InvalidPasswordError extends UnauthorizedError {
  constructor() {
    super('Invalid password');
    Object.setPrototypeOf(this, InvalidPasswordError.prototype);
  }
}

export class EmailNotConfirmedError extends UnauthorizedError {
  constructor() {
    super('Email not confirmed');
    Object.setPrototypeOf(this, EmailNotConfirmedError.prototype);
  }
}

export class InvalidOrExpiredTokenError extends UnauthorizedError {
  constructor() {
    super('Invalid or expired refresh token');
    Object.setPrototypeOf(this, InvalidOrExpiredTokenError.prototype);
  }
}

export class MissingTokenError extends UnauthorizedError {
  constructor() {
    super("Authorization token wasn't sent");
    Object.setPrototypeOf(this, MissingTokenError.prototype);
  }
}
