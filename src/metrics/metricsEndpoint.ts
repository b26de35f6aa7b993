/**
 * Prometheus Metrics Endpoint
 *
 * Serves GET /metrics: one sensor read per scrape through the measurement
 * gate, answered with the Prometheus text exposition. Failures answer
 * with an empty 5xx so a scraper never mistakes stale gauges for a fresh
 * reading.
 *
 * @module metrics/metricsEndpoint
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { MeasurementGate } from '../sensor/measurementGate.js';
import { getHttpStatusForError } from '../utils/responses.js';

/** Content type for Prometheus text exposition format. */
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export const METRICS_PATH = '/metrics';

export interface MetricsEndpointDependencies {
  gate: MeasurementGate;
  logger: Logger;
}

/**
 * Creates a Router serving GET /metrics. Matching is exact: case-sensitive
 * and without trailing-slash normalization. Every other method on the path
 * (HEAD and OPTIONS included) falls through to the not-found handler.
 */
export function createMetricsEndpoint(deps: MetricsEndpointDependencies): Router {
  const router = Router({ strict: true, caseSensitive: true });
  const logger = deps.logger.child({ component: 'metrics-endpoint' });

  // `all` rather than `get`: Express would otherwise answer HEAD with the GET
  // handler and OPTIONS with an automatic Allow response
  router.all(METRICS_PATH, async (req: Request, res: Response, next: NextFunction) => {
    if (req.method !== 'GET') {
      next();
      return;
    }

    try {
      const output = await deps.gate.scrape();
      res.set('Content-Type', PROMETHEUS_CONTENT_TYPE);
      res.status(200).send(output);
    } catch (err) {
      const status = getHttpStatusForError(err);
      logger.error('scrape failed', toError(err), {
        status,
        cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
      });
      res.status(status).end();
    }
  });

  return router;
}
