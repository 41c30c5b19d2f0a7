/**
 * JSON Logger Adapter
 *
 * Structured stdout for log shippers.
 * Upper-case level labels and service metadata on every line so entries can be
 * filtered without parsing the message.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export class JsonLogger extends PinoLogger {
  constructor(context?: string) {
    super(
      pino({
        name: context || 'app',
        level: env.LOG_LEVEL,
        formatters: {
          level: (label) => ({ level: label.toUpperCase() }),
        },
        base: {
          env: env.NODE_ENV,
          service: 'contacts-api',
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      })
    );
  }
}
