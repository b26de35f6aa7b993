/**
 * Express application factory with dependency injection.
 *
 * Wires, in order:
 * 1. Request logging with correlation IDs
 * 2. GET /metrics
 * 3. Empty 404 for every other method and path
 * 4. Global error handler (empty 500)
 *
 * No body parser is mounted: the exporter never reads request bodies.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { Logger } from './logging/logger.js';
import { toError } from './errors.js';
import { createMetricsEndpoint } from './metrics/metricsEndpoint.js';
import { requestLogger } from './middleware/requestLogger.js';
import type { MeasurementGate } from './sensor/measurementGate.js';

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  /** Serialized access to the sensor and registry. */
  gate: MeasurementGate;
  logger: Logger;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.disable('etag');
  app.enable('strict routing');
  app.enable('case sensitive routing');

  app.use(requestLogger(deps.logger));
  app.use(createMetricsEndpoint({ gate: deps.gate, logger: deps.logger }));

  // ── Not Found ─────────────────────────────────────────────────────────

  app.use((_req: Request, res: Response) => {
    res.status(404).end();
  });

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error('Unhandled error', toError(err));
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).end();
  });

  return app;
}
