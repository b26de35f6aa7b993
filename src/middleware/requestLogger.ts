/**
 * Request Logger Middleware
 *
 * Assigns or propagates a correlation ID per request and logs each
 * completed response with its status and duration.
 *
 * @module middleware/requestLogger
 */

import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';

export const CORRELATION_HEADER = 'x-correlation-id';

function getOrCreateCorrelationId(req: Request): string {
  const existing = req.headers[CORRELATION_HEADER];
  if (typeof existing === 'string' && existing.length > 0) return existing;
  return randomUUID();
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getOrCreateCorrelationId(req);
    res.setHeader(CORRELATION_HEADER, correlationId);

    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl;
    const child = logger.child({ correlationId, component: 'http' });

    res.on('finish', () => {
      const metadata = { method, url, statusCode: res.statusCode, durationMs: Date.now() - start };
      if (res.statusCode >= 500) {
        child.warn('request failed', metadata);
      } else {
        child.info('request completed', metadata);
      }
    });

    next();
  };
}
