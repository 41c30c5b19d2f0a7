import { Request, Response, NextFunction, RequestHandler } from 'express';
import { User } from '@/models';
import { MissingTokenError, UnauthorizedError } from '@/errors';
import { AuthService } from '@/services/auth.service';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuth */
      user?: User;
    }
  }
}

/**
 * Token from "Authorization: Bearer <token>"
 * @returns null when the header is absent or not a bearer credential
 */
export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) return null;

  return token;
}

/**
 * Resolve the caller from the access token and attach it as req.user
 */
export function requireAuth(authService: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.headers.authorization) {
        throw new MissingTokenError();
      }

      const token = bearerToken(req);
      if (!token) {
        throw new UnauthorizedError();
      }

      req.user = await authService.requireAccess(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * The authenticated caller of a route mounted behind requireAuth
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
