import { AppError } from './AppError';

/**
 * Too Many Requests (429)
 */
export class RateLimitExceededError extends AppError {
  constructor(limit: number) {
    super(`Too many requests. Limit: ${limit} requests per minute.`, 429);
    Object.setPrototypeOf(this, RateLimitExceededError.prototype);
  }
}
