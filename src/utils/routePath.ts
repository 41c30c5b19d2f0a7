import { Request } from 'express';

/**
 * Route template of the matched handler, e.g. "/api/contacts/:contactId"
 *
 * Falls back to the raw path when no route matched (404s, middleware-only responses).
 */
export function routePath(req: Request): string {
  const template: unknown = req.route?.path;
  if (typeof template === 'string') {
    return `${req.baseUrl}${template}`;
  }
  return req.originalUrl.split('?')[0] || req.path;
}
