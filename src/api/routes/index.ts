import { Router } from 'express';
import { AppDependencies } from '@/config/dependencies';
import { HttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { createMetricsController } from '@/api/controllers/metrics.controller';
import { requireAuth } from '@/middlewares/requireAuth';
import { createAuthRoutes } from './auth.routes';
import { createContactsRoutes } from './contacts.routes';
import { createChannelsRoutes } from './channels.routes';
import { createContactsChannelsRoutes } from './contactsChannels.routes';

/**
 * API Routes
 * Base path: /api
 *
 * Health and metrics are infrastructure endpoints: no rate limit, no auth.
 */
export function createApiRouter(deps: AppDependencies, httpMetrics: HttpMetrics): Router {
  const router = Router();
  // Label the route while it is matched, then admit or reject
  const gate = [httpMetrics.labelRoute(), deps.rateLimiter];
  const auth = requireAuth(deps.authService);

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'contacts-api',
      version: 'v1',
    });
  });

  router.get('/metrics', createMetricsController(httpMetrics).getMetrics);

  router.use('/auth', createAuthRoutes(deps.authService, gate));
  router.use('/contacts', createContactsRoutes(deps.contactService, gate, auth));
  router.use('/channels', createChannelsRoutes(deps.channelService, gate, auth));
  router.use('/contactsChannels', createContactsChannelsRoutes(deps.contactChannelService, gate, auth));

  return router;
}
