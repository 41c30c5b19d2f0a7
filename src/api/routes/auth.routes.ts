import { RequestHandler, Router } from 'express';
import { createAuthController } from '@/controllers/auth.controller';
import { AuthService } from '@/services/auth.service';
import { requireAuth } from '@/middlewares/requireAuth';
import { avatarUpload } from '@/middlewares/upload';

/**
 * Auth routes (/api/auth)
 * The gate (route label, then limiter) runs first on every route, before authentication and upload parsing.
 */
export function createAuthRoutes(authService: AuthService, gate: RequestHandler[]): Router {
  const router = Router();
  const controller = createAuthController(authService);
  const auth = requireAuth(authService);

  /**
   * POST /api/auth/users
   * Sign up; a confirmation link is emailed in the background
   */
  router.post('/users', gate, controller.signup);

  /**
   * DELETE /api/auth/users/:email
   * Remove the caller's own account
   */
  router.delete('/users/:email', gate, auth, controller.removeUser);

  /**
   * POST /api/auth/access_token
   * Log in with email and password
   */
  router.post('/access_token', gate, controller.login);

  /**
   * GET /api/auth/refresh_token
   * Rotate the session with the refresh token as bearer
   */
  router.get('/refresh_token', gate, controller.refreshToken);

  router.get('/confirmed_email/:token', gate, controller.confirmEmail);

  router.patch('/avatar', gate, auth, avatarUpload, controller.updateAvatar);

  return router;
}
