/**
 * Logger Interface
 *
 * Application code depends on this interface; adapters in
 * src/adapters/logging implement it and LoggerFactory picks one from LOGGER_TYPE.
 */

/**
 * Structured data attached to a log entry
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /** Diagnostic detail: cache hits, executed queries */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /** Normal operations: user created, session issued */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /** Recoverable problems: rejected logins, rate limit hits, unreadable cache entries */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /** Failed operations that need attention */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /** Unrecoverable errors before shutdown */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - logger name, e.g. "AuthService"
   */
  createLogger(context?: string): ILogger;
}
