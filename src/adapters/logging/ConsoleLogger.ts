/**
 * Console Logger Adapter
 *
 * pino to stdout. Pretty-printed in development unless LOG_PRETTY=false, plain JSON elsewhere.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

/**
 * pino-pretty transport, or none for line-delimited JSON
 * Shared with the pino-http instance so both follow the same switch.
 */
export function consoleTransport(nodeEnv: string, pretty: boolean): pino.TransportSingleOptions | undefined {
  if (nodeEnv !== 'development' || !pretty) {
    return undefined;
  }
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export class ConsoleLogger extends PinoLogger {
  constructor(context?: string) {
    super(
      pino({
        name: context || 'app',
        level: env.LOG_LEVEL,
        transport: consoleTransport(env.NODE_ENV, env.LOG_PRETTY),
      })
    );
  }
}
