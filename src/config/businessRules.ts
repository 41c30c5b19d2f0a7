/**
 * Business Rules Configuration
 *
 * Centralized configuration for limits, lifetimes and windows.
 * These values can be adjusted without touching validation schemas or service logic.
 */

import { env } from './env';

/**
 * Rate Limiting Configuration
 *
 * One tunable (requests per minute per route), taken from the environment.
 * Counters are kept per client IP and per route, over a rolling one-minute window.
 */
export const RATE_LIMITS = {
  WINDOW_MS: 60_000, // 1 minute
  MAX_REQUESTS_PER_ROUTE: env.RATE_LIMIT_REQUESTS_PER_MINUTE,
  KEY_PREFIX: 'rate_limit:',
} as const;

/**
 * Cache & TTL Configuration
 */
export const TTL_CONFIG = {
  /**
   * How long a cached user record is trusted (15 minutes)
   * Every authenticated request resolves its caller by email, so this is the hottest read.
   * Mutations other than email confirmation may be invisible for up to this long.
   */
  USER_CACHE_TTL_SECONDS: 900,

  /**
   * Email confirmation link validity (7 days)
   */
  EMAIL_TOKEN_TTL_SECONDS: 7 * 24 * 60 * 60,
} as const;

/**
 * Cache key layout
 */
export const CACHE_KEYS = {
  user: (email: string): string => `user:${email}`,
} as const;

/**
 * Row id range (PostgreSQL INTEGER / SERIAL)
 * Larger path or body ids would fail in the driver instead of matching nothing.
 */
export const ID_LIMITS = {
  MAX_ID: 2_147_483_647,
} as const;

/**
 * Credential Limits
 */
export const CREDENTIAL_LIMITS = {
  MAX_EMAIL_LENGTH: 250,
  MIN_PASSWORD_LENGTH: 6,
  MAX_PASSWORD_LENGTH: 10,
} as const;

/**
 * Contact field limits (match column sizes in 001_initial_schema.sql)
 */
export const CONTACT_LIMITS = {
  MAX_NAME_LENGTH: 50,
  MAX_PERSUASION_LENGTH: 50,
  GENDER_LENGTH: 1,
  MAX_CHANNEL_VALUE_LENGTH: 250,
  MAX_BIRTHDAY_DAYS_FORWARD: 365,
} as const;

/**
 * Search & Pagination Limits
 */
export const PAGINATION_LIMITS = {
  DEFAULT_SKIP: 0,
  DEFAULT_PAGE_SIZE: 100,
  MAX_PAGE_SIZE: 100,
} as const;

/**
 * Avatar upload limits
 */
export const AVATAR_LIMITS = {
  MAX_FILE_SIZE_BYTES: 5 * 1024 * 1024,
  SIZE_PX: 250,
  PUBLIC_ID_PREFIX: 'ContactsApp',
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (10 seconds)
   * Kills runaway queries before they starve the pool
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /**
   * Slow query threshold for logging (1 second)
   */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

export type RateLimits = typeof RATE_LIMITS;
export type TTLConfig = typeof TTL_CONFIG;
export type PaginationLimits = typeof PAGINATION_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
