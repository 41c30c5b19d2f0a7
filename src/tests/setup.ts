/**
 * Jest setup (runs before each test file, before any module reads the environment)
 * No database, Redis, SMTP or Cloudinary: everything external is faked in-process.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOGGER_TYPE = 'console';
process.env.CACHE_TYPE = 'memory';
process.env.MAILER_TYPE = 'noop';
process.env.JWT_SECRET_KEY = 'test-secret';
process.env.EMAIL_TOKEN_SECRET_KEY = 'test-email-secret';
process.env.DB_PASSWORD = 'test-password';
process.env.PUBLIC_BASE_URL = 'http://localhost:8000/';
