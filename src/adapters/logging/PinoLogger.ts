import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

type Level = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * ILogger over a pino instance
 * Subclasses only decide how the pino instance is configured.
 */
export abstract class PinoLogger implements ILogger {
  protected constructor(private readonly logger: pino.Logger) {}

  private write(level: Level, messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }
}
