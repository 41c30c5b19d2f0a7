import { cleanEnv, str, num, bool, url } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean, url)
 * - Enforces choices for enums
 * - Secrets only have devDefault, so production must set them explicitly
 * - Fails fast on startup if required vars are missing
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, CORS)',
  }),
  PORT: num({
    default: 8000,
    desc: 'HTTP server port',
  }),
  PUBLIC_BASE_URL: url({
    default: 'http://localhost:8000/',
    desc: 'Public URL of the API, used in confirmation links sent by email',
  }),

  // ==========================================
  // Database Configuration
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'contacts',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    devDefault: 'postgres',
    desc: 'PostgreSQL password (REQUIRED in production)',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS (cloud databases)',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),

  // ==========================================
  // Cache & Rate Limiter Store
  // ==========================================
  CACHE_TYPE: str({
    choices: ['redis', 'memory'],
    default: 'redis',
    desc: 'Backing store for the user cache and rate limiter counters',
  }),
  REDIS_URL: str({
    default: 'redis://localhost:6379',
    desc: 'Redis connection string',
  }),
  TRUST_PROXY: str({
    default: '',
    desc: 'Reverse proxies in front of the API: a hop count or comma-separated addresses/subnets (empty trusts none)',
  }),
  RATE_LIMIT_REQUESTS_PER_MINUTE: num({
    default: 10,
    desc: 'Requests allowed per client, per route, per minute',
  }),

  // ==========================================
  // Tokens
  // ==========================================
  JWT_SECRET_KEY: str({
    devDefault: 'dev-access-secret',
    desc: 'Secret used to sign access and refresh tokens',
  }),
  JWT_ALGORITHM: str({
    choices: ['HS256', 'HS384', 'HS512'],
    default: 'HS256',
    desc: 'Signing algorithm for access and refresh tokens',
  }),
  ACCESS_TOKEN_EXPIRES_IN_SECONDS: num({
    default: 15 * 60,
    desc: 'Access token lifetime',
  }),
  REFRESH_TOKEN_EXPIRES_IN_SECONDS: num({
    default: 7 * 24 * 60 * 60,
    desc: 'Refresh token lifetime',
  }),
  EMAIL_TOKEN_SECRET_KEY: str({
    devDefault: 'dev-email-secret',
    desc: 'Secret used to sign email confirmation tokens',
  }),
  EMAIL_TOKEN_ALGORITHM: str({
    choices: ['HS256', 'HS384', 'HS512'],
    default: 'HS256',
    desc: 'Signing algorithm for email confirmation tokens',
  }),

  // ==========================================
  // Mail
  // ==========================================
  MAILER_TYPE: str({
    choices: ['smtp', 'noop'],
    default: 'noop',
    desc: 'Mail transport (noop logs the confirmation link instead of sending)',
  }),
  MAIL_SERVER: str({
    default: 'localhost',
    desc: 'SMTP host',
  }),
  MAIL_PORT: num({
    default: 465,
    desc: 'SMTP port',
  }),
  MAIL_USERNAME: str({
    default: '',
    desc: 'SMTP username',
  }),
  MAIL_PASSWORD: str({
    default: '',
    desc: 'SMTP password',
  }),
  MAIL_FROM: str({
    default: 'no-reply@contacts.local',
    desc: 'Sender address for outgoing mail',
  }),

  // ==========================================
  // Avatar Storage (Cloudinary)
  // ==========================================
  CLOUDINARY_NAME: str({
    default: '',
    desc: 'Cloudinary cloud name',
  }),
  CLOUDINARY_API_KEY: str({
    default: '',
    desc: 'Cloudinary API key',
  }),
  CLOUDINARY_API_SECRET: str({
    default: '',
    desc: 'Cloudinary API secret',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs (false for production JSON logs)',
  }),
  LOGGER_TYPE: str({
    choices: ['console', 'json'],
    default: 'console',
    desc: 'Logger adapter: console (pretty in development) or json (log shippers)',
  }),
});

export type Env = typeof env;
