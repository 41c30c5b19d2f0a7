import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi, { JsonObject } from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { parseTrustProxy } from '@/config/proxy';
import { AppDependencies } from '@/config/dependencies';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFound } from '@/middlewares/notFound';
import { HttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { createApiRouter } from '@/api/routes';

function loadOpenApiDocument(): JsonObject | null {
  try {
    const openapiPath = join(__dirname, '../docs/openapi.yaml');
    const document: unknown = yaml.load(readFileSync(openapiPath, 'utf8'));
    if (document && typeof document === 'object' && !Array.isArray(document)) {
      return { ...document };
    }
    logger.warn('OpenAPI document is not a YAML mapping');
  } catch (error) {
    logger.warn({ error }, 'Could not load OpenAPI documentation');
  }
  return null;
}

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers around the given dependencies
 */
export function createApp(deps: AppDependencies): Application {
  const app: Application = express();
  const httpMetrics = new HttpMetrics();

  // ============================================
  // Middleware Configuration
  // ============================================

  // req.ip (rate limiter key) reads X-Forwarded-For only from configured proxies
  app.set('trust proxy', parseTrustProxy(env.TRUST_PROXY));

  // Security headers
  app.use(helmet());

  app.use(
    cors({
      origin: env.NODE_ENV === 'production' ? false : '*',
      credentials: false,
    })
  );

  // Body parsers with size limits (avatars arrive as multipart and bypass these)
  app.use(express.json({ limit: '10kb' }));
  app.use(express.urlencoded({ extended: true, limit: '10kb' }));

  app.use(httpMetrics.middleware());

  // Request logging (pino-http)
  app.use(requestLogger);

  // ============================================
  // Routes
  // ============================================

  const openapiDocument = loadOpenApiDocument();
  if (openapiDocument) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  }

  // API routes (mounted at /api); each route carries its own rate limiter
  app.use('/api', createApiRouter(deps, httpMetrics));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Contacts API',
      version: '1.0.0',
      description: 'Personal contacts management API',
      documentation: '/api-docs',
      endpoints: {
        health: '/api/health',
        auth: '/api/auth',
        contacts: '/api/contacts',
        birthdays: '/api/contacts/birthdays?daysForward=7',
        channels: '/api/channels',
        contactsChannels: '/api/contactsChannels',
      },
    });
  });

  // ============================================
  // Error Handlers
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFound);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
