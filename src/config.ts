/**
 * Exporter Configuration
 *
 * Reads bind address, sensor bus settings, logging and metric labels from
 * environment variables. Defaults match a Raspberry Pi with a BME280 on
 * I2C bus 1 at the primary address.
 *
 * @module config
 */

import { ConfigError } from './errors.js';
import type { LogLevel } from './logging/logger.js';

export const BME280_PRIMARY_ADDRESS = 0x76;
export const BME280_SECONDARY_ADDRESS = 0x77;

export interface SensorConfig {
  /** I2C bus number, e.g. 1 for /dev/i2c-1. */
  busNumber: number;
  /** 7-bit device address (0x76 or 0x77). */
  address: number;
  /** Wait after triggering a forced-mode conversion, in ms. */
  measurementDelayMs: number;
}

export interface ExporterConfig {
  host: string;
  port: number;
  sensor: SensorConfig;
  /** Scrape timeout in ms; 0 disables it. */
  scrapeTimeoutMs: number;
  logLevel: LogLevel;
  serviceName: string;
  defaultLabels: Record<string, string>;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

// ─── Parsers ─────────────────────────────────────────────────────────────────

function readInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = /^0x[0-9a-f]+$/i.test(raw) ? parseInt(raw.slice(2), 16) : Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`, name);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env['LOG_LEVEL']?.trim().toLowerCase();
  if (!raw) return 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`, 'LOG_LEVEL');
  }
  return level;
}

const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Parse `key=value,key2=value2` from METRICS_DEFAULT_LABELS. Values may
 * contain `=`; keys must be valid Prometheus label names.
 */
export function parseLabelPairs(raw: string): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    if (!pair.trim()) continue;

    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair.trim() : pair.slice(0, eq).trim();
    const value = eq === -1 ? '' : pair.slice(eq + 1).trim();
    if (!LABEL_NAME.test(key) || !value) {
      throw new ConfigError(
        `METRICS_DEFAULT_LABELS entries must be name=value with a valid label name, got "${pair.trim()}"`,
        'METRICS_DEFAULT_LABELS',
      );
    }
    labels[key] = value;
  }
  return labels;
}

// ─── Loader ──────────────────────────────────────────────────────────────────

export function loadExporterConfig(env: Env = process.env): ExporterConfig {
  const address = readInteger(env, 'SENSOR_I2C_ADDRESS', BME280_PRIMARY_ADDRESS, 0, 0x7f);
  if (address !== BME280_PRIMARY_ADDRESS && address !== BME280_SECONDARY_ADDRESS) {
    throw new ConfigError(
      `SENSOR_I2C_ADDRESS must be 0x76 or 0x77, got 0x${address.toString(16)}`,
      'SENSOR_I2C_ADDRESS',
    );
  }

  return {
    host: env['HOST']?.trim() || '0.0.0.0',
    port: readInteger(env, 'PORT', 3002, 0, 65535),
    sensor: {
      busNumber: readInteger(env, 'SENSOR_I2C_BUS', 1, 0, 255),
      address,
      measurementDelayMs: readInteger(env, 'SENSOR_MEASUREMENT_DELAY_MS', 40, 0, 10000),
    },
    scrapeTimeoutMs: readInteger(env, 'SCRAPE_TIMEOUT_MS', 0, 0, 600000),
    logLevel: readLogLevel(env),
    serviceName: env['SERVICE_NAME']?.trim() || 'meter-exporter',
    defaultLabels: parseLabelPairs(env['METRICS_DEFAULT_LABELS'] ?? ''),
  };
}
