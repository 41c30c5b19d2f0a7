import { createClient } from 'redis';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Create and connect the Redis client shared by the user cache and the rate limiter.
 * Called once at startup; the handle is passed to the components that need it
 * and released with closeRedis() during shutdown.
 */
export async function connectRedis(url: string = env.REDIS_URL): Promise<RedisClient> {
  const client = createClient({ url });

  client.on('error', (err: unknown) => {
    logger.error({ err }, 'Redis client error');
  });

  await client.connect();
  logger.info('Redis client connected');

  return client;
}

export async function closeRedis(client: RedisClient): Promise<void> {
  await client.quit();
  logger.info('Redis client disconnected');
}
