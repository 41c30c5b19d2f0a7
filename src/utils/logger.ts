import pino from 'pino';
import { env } from '@/config/env';
import { consoleTransport } from '@/adapters/logging/ConsoleLogger';

/**
 * Raw pino instance for pino-http
 * Application code logs through LoggerFactory; pino-http needs the pino instance itself.
 */
export const httpLogger = pino({
  name: 'http',
  level: env.LOG_LEVEL,
  transport: consoleTransport(env.NODE_ENV, env.LOG_PRETTY),
  timestamp: pino.stdTimeFunctions.isoTime,
});
