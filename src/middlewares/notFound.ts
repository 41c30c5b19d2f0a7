import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * Catch-all for unmatched routes, mounted after every router
 */
export function notFound(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl.split('?')[0]} not found`));
}
