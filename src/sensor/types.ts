/**
 * Sensor types shared by the driver, the measurement gate and the
 * metrics registry.
 *
 * @module sensor/types
 */

/** One reading. Temperature in °C, pressure in Pa, humidity in %RH. */
export interface Measurement {
  readonly temperature: number;
  readonly pressure: number;
  readonly humidity: number;
}

/**
 * Capability exposed by a physical sensor. Implementations own the bus
 * handle; callers never touch the bus directly.
 */
export interface SensorDriver {
  /** Run the sensor's initialization sequence. */
  init(): Promise<void>;
  /** Perform one hardware transaction and return the compensated reading. */
  measure(): Promise<Measurement>;
  /** Release the bus. */
  close(): Promise<void>;
}
