/**
 * Opens the Linux I2C bus device and wires a BME280 driver to it.
 *
 * Kept apart from the driver so that only the launcher loads the native
 * i2c-bus binding; tests drive `Bme280Driver` through a fake bus.
 *
 * @module sensor/i2c
 */

import i2c from 'i2c-bus';
import type { SensorConfig } from '../config.js';
import { InitError } from '../errors.js';
import { Bme280Driver } from './bme280.js';

/** Open `/dev/i2c-<busNumber>` and return an uninitialized BME280 driver. */
export async function openBme280(config: SensorConfig): Promise<Bme280Driver> {
  try {
    const bus = await i2c.openPromisified(config.busNumber);
    return new Bme280Driver({
      bus,
      address: config.address,
      measurementDelayMs: config.measurementDelayMs,
    });
  } catch (err) {
    throw new InitError(`Failed to open I2C bus /dev/i2c-${config.busNumber}`, err);
  }
}
