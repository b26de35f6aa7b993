/**
 * Maps exporter errors to HTTP statuses for the request boundary.
 *
 * @module utils/responses
 */

import { ERROR_CODES, type ErrorCode } from '../errors.js';

const ERROR_STATUS_MAP: Record<ErrorCode, number> = {
  SENSOR_READ_ERROR: 503,
  SENSOR_INIT_ERROR: 503,
  METRICS_ENCODING_ERROR: 500,
  CONFIG_INVALID: 500,
};

/** Default HTTP status for errors without a known code. */
const DEFAULT_ERROR_STATUS = 500;

function isErrorCode(value: unknown): value is ErrorCode {
  return Object.values<unknown>(ERROR_CODES).includes(value);
}

/**
 * HTTP status for a failure caught while serving a request: 503 when the
 * sensor could not be read, 500 for everything else.
 */
export function getHttpStatusForError(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'code' in err && isErrorCode(err.code)) {
    return ERROR_STATUS_MAP[err.code];
  }
  return DEFAULT_ERROR_STATUS;
}
