import { Request, Response, NextFunction } from 'express';
import { AuthService } from '@/services/auth.service';
import { credentialsSchema, emailParamSchema } from '@/validators/auth.validator';
import { validate } from '@/validators/validate';
import { InvalidOrExpiredTokenError, ValidationError } from '@/errors';
import { bearerToken, currentUser } from '@/middlewares/requireAuth';
import { uploadedFile } from '@/middlewares/upload';

/**
 * Auth Controller
 * Handles HTTP requests for signup, sessions and account endpoints
 */
export function createAuthController(authService: AuthService) {
  /**
   * POST /api/auth/users
   */
  async function signup(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const credentials = validate(credentialsSchema, req.body, 'Invalid signup data');
      const response = await authService.signup(credentials);

      res.status(201).json(response);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/auth/users/:email
   */
  async function removeUser(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const email = validate(emailParamSchema, req.params.email, 'Invalid email');
      const response = await authService.removeUser(currentUser(req), email);

      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/auth/access_token
   */
  async function login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const credentials = validate(credentialsSchema, req.body, 'Invalid login data');
      const tokens = await authService.authenticate(credentials);

      res.json(tokens);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/auth/refresh_token
   * Authorization: Bearer <refresh token>
   */
  async function refreshToken(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const token = bearerToken(req);
      if (!token) {
        throw new InvalidOrExpiredTokenError();
      }

      const tokens = await authService.refresh(token);

      res.json(tokens);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/auth/confirmed_email/:token
   */
  async function confirmEmail(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const response = await authService.confirmEmail(req.params.token ?? '');

      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /api/auth/avatar
   * multipart/form-data, image in field "file"
   */
  async function updateAvatar(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const file = uploadedFile(req);
      if (!file) {
        throw new ValidationError('Avatar file is required', { fieldErrors: { file: ['Required'] } });
      }

      const user = await authService.updateAvatar(currentUser(req), file);

      res.json(user);
    } catch (error) {
      next(error);
    }
  }

  return { signup, removeUser, login, refreshToken, confirmEmail, updateAvatar };
}

export type AuthController = ReturnType<typeof createAuthController>;
