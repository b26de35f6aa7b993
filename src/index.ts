/**
 * meter-exporter – library entry point
 *
 * Re-exports the building blocks so the exporter can be embedded or
 * driven with a different sensor driver.
 *
 * @module meter-exporter
 */

export { createApp, type AppDependencies } from './app.js';
export {
  BME280_PRIMARY_ADDRESS,
  BME280_SECONDARY_ADDRESS,
  loadExporterConfig,
  parseLabelPairs,
  type ExporterConfig,
  type SensorConfig,
} from './config.js';
export {
  ConfigError,
  EncodingError,
  ERROR_CODES,
  InitError,
  SensorError,
  type ErrorCode,
} from './errors.js';
export {
  createLogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogMetadata,
  type LogOutput,
  type Logger,
  type LoggerOptions,
} from './logging/logger.js';
export {
  createMeterRegistry,
  METER_DEFINITIONS,
  type MeterName,
  type MeterRegistry,
  type MeterRegistryOptions,
} from './metrics/meterRegistry.js';
export { createMetricsEndpoint, METRICS_PATH, PROMETHEUS_CONTENT_TYPE } from './metrics/metricsEndpoint.js';
export { Bme280Driver, compensate, parseCalibration, parseRawReading, type Bme280Bus } from './sensor/bme280.js';
export {
  createMeasurementGate,
  type MeasurementGate,
  type MeasurementGateOptions,
} from './sensor/measurementGate.js';
export type { Measurement, SensorDriver } from './sensor/types.js';
export { startServer, type RunningServer, type ServerOptions } from './server.js';
