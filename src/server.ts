import { Server } from 'http';
import { Store } from 'express-rate-limit';
import { RedisStore } from 'rate-limit-redis';
import { createApp } from './app';
import { env } from '@/config/env';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';
import { Database } from '@/config/database';
import { ICacheStore } from '@/interfaces/ICacheStore';
import { RedisClient, closeRedis, connectRedis } from '@/config/redis';
import { buildDependencies } from '@/config/dependencies';
import { RedisCacheStore } from '@/adapters/cache/RedisCacheStore';
import { MemoryCacheStore } from '@/adapters/cache/MemoryCacheStore';
import { createMailer } from '@/adapters/mail/MailerFactory';
import { CloudinaryAvatarStorage } from '@/adapters/storage/CloudinaryAvatarStorage';

/**
 * Server Entry Point
 * Owns the database pool and the Redis client: created here, closed on shutdown
 */

let server: Server | undefined;
let database: Database | undefined;
let redisClient: RedisClient | undefined;

async function releaseResources(): Promise<void> {
  if (redisClient) {
    try {
      await closeRedis(redisClient);
    } catch (error) {
      logger.error({ error }, 'Error closing Redis client');
    }
  }

  if (database) {
    try {
      await database.close();
    } catch (error) {
      logger.error({ error }, 'Error closing database connections');
    }
  }
}

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    database = new Database();

    logger.info('Testing database connection...');
    const dbConnected = await database.testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      await releaseResources();
      process.exit(1);
    }

    let cache: ICacheStore;
    let rateLimitStore: Store | undefined;
    if (env.CACHE_TYPE === 'redis') {
      const client = await connectRedis();
      redisClient = client;
      cache = new RedisCacheStore(client);
      rateLimitStore = new RedisStore({
        sendCommand: (...args: string[]) => client.sendCommand(args),
        prefix: RATE_LIMITS.KEY_PREFIX,
      });
    } else {
      logger.warn('CACHE_TYPE=memory: user cache and rate limits are local to this process');
      cache = new MemoryCacheStore();
    }

    const app = createApp(
      buildDependencies({
        db: database,
        cache,
        mailer: createMailer(env.MAILER_TYPE),
        avatarStorage: new CloudinaryAvatarStorage(),
        rateLimitStore,
      })
    );

    server = app.listen(env.PORT, () => {
      logger.info({ port: env.PORT, env: env.NODE_ENV }, `Server running on http://localhost:${env.PORT}`);
      logger.info(`API docs available at http://localhost:${env.PORT}/api-docs`);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${env.PORT} is already in use`);
      } else {
        logger.error({ error }, 'Server error');
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    await releaseResources();
    process.exit(1);
  }
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    void releaseResources().finally(() => process.exit(0));
    return;
  }

  server.close(() => {
    logger.info('HTTP server closed');
    void releaseResources().finally(() => {
      logger.info('Graceful shutdown complete');
      process.exit(0);
    });
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught Exception');
  process.exit(1);
});

void startServer();
