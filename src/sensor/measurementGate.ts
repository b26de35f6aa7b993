/**
 * Measurement Gate
 *
 * Serializes access to the single sensor handle. Each scrape holds the
 * lock for one hardware transaction, the three gauge writes and (for
 * `scrape()`) the encode, so a response always carries its own reading
 * and gauges are never observed half-updated.
 *
 * Driver failures surface as SensorError; the gauges keep their last
 * good values and the lock is released for the next caller.
 *
 * @module sensor/measurementGate
 */

import { SensorError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { MeterRegistry } from '../metrics/meterRegistry.js';
import { ExclusiveLock } from '../utils/exclusiveLock.js';
import type { Measurement, SensorDriver } from './types.js';

export interface MeasurementGate {
  /** Read the sensor once and record the values. */
  measure(): Promise<Measurement>;
  /** Read the sensor once, record the values and return the exposition text. */
  scrape(): Promise<string>;
}

export interface MeasurementGateOptions {
  driver: SensorDriver;
  registry: MeterRegistry;
  logger: Logger;
  /**
   * Reject callers whose scrape has not settled after this many ms
   * (including time spent queued). 0 disables the timeout. The lock is
   * still held until the hardware transaction itself finishes; callers
   * that timed out while queued skip their read.
   */
  timeoutMs?: number;
  /** Lock shared with other users of the same sensor handle. */
  lock?: ExclusiveLock;
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new SensorError(`Sensor read timed out after ${ms}ms`));
    }, ms);
    promise.then(
      (val) => {
        clearTimeout(timer);
        resolve(val);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

export function createMeasurementGate(options: MeasurementGateOptions): MeasurementGate {
  const { driver, registry } = options;
  const logger = options.logger.child({ component: 'measurement-gate' });
  const timeoutMs = options.timeoutMs ?? 0;
  const lock = options.lock ?? new ExclusiveLock();

  /** Must only run while holding the lock. */
  async function readAndRecord(): Promise<Measurement> {
    const start = Date.now();
    let measurement: Measurement;
    try {
      measurement = await driver.measure();
    } catch (err) {
      throw new SensorError('Sensor read failed', err);
    }

    registry.record(measurement);
    logger.debug('sensor read', {
      durationMs: Date.now() - start,
      temperature: measurement.temperature,
      pressure: measurement.pressure,
      humidity: measurement.humidity,
    });
    return measurement;
  }

  function guarded<T>(work: () => Promise<T>): Promise<T> {
    if (timeoutMs <= 0) return lock.run(work);

    // a caller that timed out while queued gives up its turn without a read
    let abandoned = false;
    const task = lock.run(async () => {
      if (abandoned) throw new SensorError('Scrape abandoned before the sensor was read');
      return work();
    });
    return withTimeout(task, timeoutMs, () => {
      abandoned = true;
    });
  }

  return {
    measure(): Promise<Measurement> {
      return guarded(readAndRecord);
    },

    scrape(): Promise<string> {
      return guarded(async () => {
        await readAndRecord();
        return registry.encode();
      });
    },
  };
}
