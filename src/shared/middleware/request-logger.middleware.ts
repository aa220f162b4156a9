/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One line per finished request. Bodies and headers are never logged;
 * credential-like query parameters are masked.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password'];

export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const lower = key.toLowerCase();
    masked[key] = SENSITIVE_PARAMS.some(param => lower.includes(param)) ? '[MASKED]' : value;
  }

  return masked;
}

/**
 * Pattern of the handler that answered (`/:bidId/accept`), relative to its
 * router
 */
function matchedRoute(req: Request): string | undefined {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? routePath : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const logData = {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      route: matchedRoute(req),
      status: res.statusCode,
      durationMs: Date.now() - startTime,
      requestId: res.getHeader('X-Request-ID'),
      userId: req.user?.userId,
      ...(Object.keys(req.query).length > 0 && { query: maskQueryParams(req.query) })
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request rejected', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}
