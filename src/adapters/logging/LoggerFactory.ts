/**
 * Logger Factory
 *
 * - LOGGER_TYPE=json → JsonLogger (log shippers)
 * - LOGGER_TYPE=console or unset → ConsoleLogger (pretty in development)
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';
import { JsonLogger } from './JsonLogger';

export type LoggerType = 'console' | 'json';

export function loggerTypeFromEnv(value: string | undefined = process.env.LOGGER_TYPE): LoggerType {
  return value?.toLowerCase() === 'json' ? 'json' : 'console';
}

export class LoggerFactory implements ILoggerFactory {
  constructor(private readonly loggerType: LoggerType = loggerTypeFromEnv()) {}

  createLogger(context?: string): ILogger {
    return this.loggerType === 'json' ? new JsonLogger(context) : new ConsoleLogger(context);
  }
}

const factory = new LoggerFactory();

export const logger = factory.createLogger('app');

/**
 * Named logger, e.g. createLogger('AuthService')
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
