import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError, UnauthorizedError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

const REDACTED = '[REDACTED]';

/**
 * Credentials never reach the logs: passwords and tokens are redacted at any depth
 */
const SENSITIVE_FIELDS = new Set(['password', 'access_token', 'refresh_token', 'token']);

function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }

  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? REDACTED : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * Sanitize error messages for production
 *
 * Messages that look like infrastructure detail (SQL, schema, file paths)
 * are replaced with a generic message outside development and test.
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query|redis/i,
    /file|path|directory/i,
    /internal|implementation/i,
    /column|table|constraint/i,
  ];

  if (sensitivePatterns.some((pattern) => pattern.test(message))) {
    return 'An error occurred while processing your request';
  }

  return message;
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    details?: unknown;
  };
}

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

function statusOf(err: Error): number {
  if (err instanceof AppError) return err.statusCode;
  if (err instanceof MulterError) return err.code === 'LIMIT_FILE_SIZE' ? 413 : 422;
  if (isMalformedJson(err)) return 400;
  return 500;
}

/**
 * Global error handler middleware
 * Handles all errors thrown in the application
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = statusOf(err);

  const logEntry = {
    error: {
      name: err.name,
      message: err.message,
      stack: statusCode >= 500 ? err.stack : undefined,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      body: sanitizeRequestBody(req.body),
    },
  };

  if (statusCode >= 500) {
    logger.error(logEntry, 'Error occurred');
  } else {
    logger.warn(logEntry, 'Request rejected');
  }

  if (err instanceof MulterError) {
    const body: ErrorBody = { success: false, error: { message: err.message } };
    res.status(statusCode).json(body);
    return;
  }

  if (err instanceof AppError) {
    const body: ErrorBody = {
      success: false,
      error: {
        message: sanitizeErrorMessage(err.message),
      },
    };

    if (err instanceof ValidationError && err.errors) {
      body.error.details = err.errors;
    }

    if (err instanceof UnauthorizedError) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }

    res.status(err.statusCode).json(body);
    return;
  }

  // Malformed JSON bodies (body-parser sets status 400)
  if (isMalformedJson(err)) {
    const body: ErrorBody = { success: false, error: { message: 'Malformed JSON body' } };
    res.status(400).json(body);
    return;
  }

  const body: ErrorBody = { success: false, error: { message: 'Internal server error' } };
  res.status(500).json(body);
}
