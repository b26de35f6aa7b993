/**
 * Typed errors for the exporter.
 *
 * Every error carries a stable `code` and the underlying `cause`, so the
 * request boundary can map failures to HTTP statuses and the logger can
 * record the original driver or encoder failure.
 *
 * @module errors
 */

export const ERROR_CODES = {
  SENSOR_INIT_ERROR: 'SENSOR_INIT_ERROR',
  SENSOR_READ_ERROR: 'SENSOR_READ_ERROR',
  METRICS_ENCODING_ERROR: 'METRICS_ENCODING_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * The bus could not be opened or the sensor rejected its initialization
 * sequence. Fatal at startup: the exporter never begins serving.
 */
export class InitError extends Error {
  public readonly code = ERROR_CODES.SENSOR_INIT_ERROR;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InitError';
  }
}

/**
 * A single scrape's hardware transaction failed (bus fault, timeout,
 * malformed reading). Recovered at the request boundary as a 5xx.
 */
export class SensorError extends Error {
  public readonly code = ERROR_CODES.SENSOR_READ_ERROR;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SensorError';
  }
}

/** Serializing the registry into the exposition format failed. */
export class EncodingError extends Error {
  public readonly code = ERROR_CODES.METRICS_ENCODING_ERROR;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'EncodingError';
  }
}

/** An environment variable holds a value the exporter cannot use. */
export class ConfigError extends Error {
  public readonly code = ERROR_CODES.CONFIG_INVALID;

  constructor(
    message: string,
    public readonly variable: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Normalize an unknown thrown value into an Error for logging. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
