import type { Context } from 'hono';
import { ApiError } from './errors.js';
import { logger, toError } from './logger.js';

const isProduction = () => process.env.NODE_ENV === 'production';

/**
 * Message safe to hand to an API client. ApiError messages are written for
 * clients; anything else is replaced by the default in production.
 */
export function sanitizeErrorMessage(error: unknown, defaultMessage = 'An error occurred'): string {
  if (error instanceof ApiError) {
    return error.message;
  }
  if (isProduction()) {
    return defaultMessage;
  }
  return toError(error).message;
}

export function getErrorStatusCode(error: unknown): 400 | 404 | 500 | 503 {
  return error instanceof ApiError ? error.status : 500;
}

export function logError(error: unknown, context?: Record<string, unknown>): void {
  logger.error('Request error', toError(error), context);
}

/**
 * `app.onError` handler: log server-side, answer `{ error }` with the mapped
 * status.
 */
export function handleError(error: unknown, c: Context): Response {
  const status = getErrorStatusCode(error);
  if (status >= 500) {
    logError(error, { path: c.req.path, method: c.req.method, status });
  } else {
    logger.debug('Request rejected', { path: c.req.path, status, reason: toError(error).message });
  }
  return c.json({ error: sanitizeErrorMessage(error) }, status);
}
