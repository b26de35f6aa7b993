#!/usr/bin/env node
/**
 * Exporter launcher: config, logger, I2C bus, HTTP server and signal
 * handling. Any startup failure is fatal and sets a non-zero exit code.
 *
 * @module main
 */

import { loadExporterConfig } from './config.js';
import { toError } from './errors.js';
import { createLogger } from './logging/logger.js';
import { openBme280 } from './sensor/i2c.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const config = loadExporterConfig();
  const logger = createLogger({ service: config.serviceName, level: config.logLevel });

  try {
    const driver = await openBme280(config.sensor);
    const running = await startServer({
      host: config.host,
      port: config.port,
      driver,
      logger,
      scrapeTimeoutMs: config.scrapeTimeoutMs,
      defaultLabels: config.defaultLabels,
    });

    logger.info(`Listening on http://${config.host}:${running.address.port}`, {
      bus: config.sensor.busNumber,
      address: `0x${config.sensor.address.toString(16)}`,
    });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info('shutting down', { signal });
      running.close().then(
        () => {
          process.exitCode = 0;
        },
        (err: unknown) => {
          logger.error('shutdown failed', toError(err));
          process.exitCode = 1;
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (err) {
    logger.fatal('startup failed', toError(err));
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  // config errors happen before a logger exists
  process.stderr.write(`${toError(err).message}\n`);
  process.exitCode = 1;
});
