import { describe, it, expect } from 'vitest';
import { loadExporterConfig, parseLabelPairs } from './config.js';
import { ConfigError } from './errors.js';

describe('loadExporterConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadExporterConfig({})).toEqual({
      host: '0.0.0.0',
      port: 3002,
      sensor: { busNumber: 1, address: 0x76, measurementDelayMs: 40 },
      scrapeTimeoutMs: 0,
      logLevel: 'info',
      serviceName: 'meter-exporter',
      defaultLabels: {},
    });
  });

  it('reads every variable', () => {
    const config = loadExporterConfig({
      HOST: '127.0.0.1',
      PORT: '9101',
      SENSOR_I2C_BUS: '3',
      SENSOR_I2C_ADDRESS: '0x77',
      SENSOR_MEASUREMENT_DELAY_MS: '15',
      SCRAPE_TIMEOUT_MS: '2000',
      LOG_LEVEL: 'DEBUG',
      SERVICE_NAME: 'attic-meter',
      METRICS_DEFAULT_LABELS: 'location=attic,floor=3',
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 9101,
      sensor: { busNumber: 3, address: 0x77, measurementDelayMs: 15 },
      scrapeTimeoutMs: 2000,
      logLevel: 'debug',
      serviceName: 'attic-meter',
      defaultLabels: { location: 'attic', floor: '3' },
    });
  });

  it('accepts a decimal sensor address', () => {
    expect(loadExporterConfig({ SENSOR_I2C_ADDRESS: '119' }).sensor.address).toBe(0x77);
  });

  it('treats blank values as unset', () => {
    expect(loadExporterConfig({ PORT: '  ', HOST: '' }).port).toBe(3002);
    expect(loadExporterConfig({ HOST: '' }).host).toBe('0.0.0.0');
  });

  it.each([
    ['PORT', 'abc'],
    ['PORT', '70000'],
    ['PORT', '-1'],
    ['PORT', '80.5'],
    ['SENSOR_I2C_BUS', 'one'],
    ['SCRAPE_TIMEOUT_MS', '-5'],
  ])('rejects %s=%s', (variable, value) => {
    const err = (() => {
      try {
        loadExporterConfig({ [variable]: value });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ConfigError);
    expect((err as ConfigError).variable).toBe(variable);
  });

  it('rejects an address that is not a BME280 address', () => {
    expect(() => loadExporterConfig({ SENSOR_I2C_ADDRESS: '0x40' })).toThrow(
      'SENSOR_I2C_ADDRESS must be 0x76 or 0x77, got 0x40',
    );
  });

  it('reports invalid default labels against their variable', () => {
    let caught: unknown;
    try {
      loadExporterConfig({ METRICS_DEFAULT_LABELS: '1x=y' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toHaveProperty('variable', 'METRICS_DEFAULT_LABELS');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadExporterConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, fatal, got "verbose"',
    );
  });
});

describe('parseLabelPairs', () => {
  it('parses trimmed pairs', () => {
    expect(parseLabelPairs(' room = kitchen , site=home')).toEqual({ room: 'kitchen', site: 'home' });
  });

  it('splits on the first = only', () => {
    expect(parseLabelPairs('query=a=b=c')).toEqual({ query: 'a=b=c' });
  });

  it('ignores empty entries', () => {
    expect(parseLabelPairs('site=home,, ')).toEqual({ site: 'home' });
  });

  it.each(['1x=y', 'bad-name=y', '=nokey', 'novalue=', 'plain'])('rejects %s', (pair) => {
    expect(() => parseLabelPairs(`ok=1,${pair}`)).toThrow(ConfigError);
    expect(() => parseLabelPairs(`ok=1,${pair}`)).toThrow(
      `METRICS_DEFAULT_LABELS entries must be name=value with a valid label name, got "${pair}"`,
    );
  });

  it('returns an empty object for an empty string', () => {
    expect(parseLabelPairs('')).toEqual({});
  });
});
