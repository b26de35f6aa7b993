/**
 * HTTP server lifecycle.
 *
 * Initializes the sensor before anything is bound: an init failure
 * releases the sensor and rejects with InitError; no listener is opened.
 * Node's HTTP server handles each connection independently; the sensor
 * read inside a request only awaits I/O and never blocks the accept loop.
 *
 * @module server
 */

import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import { createApp } from './app.js';
import { InitError, toError } from './errors.js';
import type { Logger } from './logging/logger.js';
import { createMeterRegistry } from './metrics/meterRegistry.js';
import { createMeasurementGate } from './sensor/measurementGate.js';
import type { SensorDriver } from './sensor/types.js';

export interface ServerOptions {
  host: string;
  port: number;
  driver: SensorDriver;
  logger: Logger;
  /** Scrape timeout in ms; 0 disables it. */
  scrapeTimeoutMs?: number;
  defaultLabels?: Record<string, string>;
}

export interface RunningServer {
  server: Server;
  address: AddressInfo;
  /** Stop accepting connections and release the sensor. */
  close(): Promise<void>;
}

function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise<AddressInfo>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not bound to a TCP address'));
        return;
      }
      resolve(address);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Initialize the sensor, build the app and start listening.
 *
 * @throws InitError when the sensor rejects its initialization sequence
 */
export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const { driver } = options;
  const logger = options.logger.child({ component: 'server' });

  try {
    await driver.init();
  } catch (err) {
    await driver.close().catch((closeErr: unknown) => {
      logger.warn('failed to release sensor after init failure', { error: toError(closeErr).message });
    });
    throw new InitError('Sensor initialization failed', err);
  }
  logger.info('sensor initialized');

  const registry = createMeterRegistry({ defaultLabels: options.defaultLabels });
  const gate = createMeasurementGate({
    driver,
    registry,
    logger: options.logger,
    timeoutMs: options.scrapeTimeoutMs,
  });
  const app = createApp({ gate, logger: options.logger });

  const server = createServer(app);

  server.on('clientError', (err, socket) => {
    logger.warn('Failed to serve connection', { error: err.message });
    socket.destroy();
  });

  let address: AddressInfo;
  try {
    address = await listen(server, options.port, options.host);
  } catch (err) {
    await driver.close();
    throw err;
  }

  let closing: Promise<void> | null = null;

  return {
    server,
    address,
    close(): Promise<void> {
      if (!closing) {
        closing = (async () => {
          try {
            await closeServer(server);
          } finally {
            await driver.close();
          }
          logger.info('server stopped');
        })();
      }
      return closing;
    },
  };
}
