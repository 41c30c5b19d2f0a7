import { randomUUID } from 'node:crypto';
import pinoHttp from 'pino-http';
// pino-http needs the pino instance itself, not the ILogger adapter
import { httpLogger } from '@/utils/logger';

/**
 * Request logger middleware
 * One line per request; bodies and headers other than the user agent are never logged
 */
export const requestLogger = pinoHttp({
  logger: httpLogger,
  // Reuse the proxy's request id when there is one, and echo it back
  genReqId: (req, res) => {
    const incoming = req.headers['x-request-id'];
    const id = typeof incoming === 'string' && incoming !== '' ? incoming : randomUUID();
    res.setHeader('X-Request-Id', id);
    return id;
  },
  autoLogging: {
    ignore: (req) => req.url === '/api/health' || req.url === '/api/metrics',
  },
  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) {
      return 'error';
    }
    if (res.statusCode >= 400) {
      return 'warn';
    }
    return 'info';
  },
  customSuccessMessage: (req, res) => {
    return `${req.method} ${req.url} - ${res.statusCode}`;
  },
  customErrorMessage: (req, res, err) => {
    return `${req.method} ${req.url} - ${res.statusCode} - ${err.message}`;
  },
  serializers: {
    req: (req) => ({
      id: req.id,
      method: req.method,
      url: req.url,
      userAgent: req.headers['user-agent'],
      ip: req.raw.socket.remoteAddress,
    }),
    res: (res) => ({
      statusCode: res.statusCode,
    }),
  },
});
