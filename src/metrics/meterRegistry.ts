/**
 * Meter Registry
 *
 * Owns the three environmental gauges and serializes them into the
 * Prometheus text exposition format. Each instance wraps its own
 * prom-client Registry, so nothing leaks into the prom-client global
 * registry and tests stay isolated.
 *
 * @module metrics/meterRegistry
 */

import { Gauge, Registry } from 'prom-client';
import { EncodingError } from '../errors.js';
import type { Measurement } from '../sensor/types.js';

export type MeterName = 'temperature' | 'pressure' | 'humidity';

export interface MeterDefinition {
  name: string;
  help: string;
}

export const METER_DEFINITIONS: Readonly<Record<MeterName, MeterDefinition>> = {
  temperature: {
    name: 'meter_temperature_celsius',
    help: 'Ambient temperature in Celsius',
  },
  pressure: {
    name: 'meter_pressure_pascals',
    help: 'Atmospheric pressure in Pascals',
  },
  humidity: {
    name: 'meter_humidity_percent',
    help: 'Relative humidity in %',
  },
};

export interface MeterRegistry {
  set(name: MeterName, value: number): void;
  /** Write all three values of a measurement. */
  record(measurement: Measurement): void;
  /** Serialize every gauge. Rejects with EncodingError. */
  encode(): Promise<string>;
}

export interface MeterRegistryOptions {
  /** Labels added to every gauge sample. */
  defaultLabels?: Record<string, string>;
  /** Registry to register gauges on. Defaults to a fresh one. */
  registry?: Registry;
}

export function createMeterRegistry(options: MeterRegistryOptions = {}): MeterRegistry {
  const registry = options.registry ?? new Registry();
  if (options.defaultLabels && Object.keys(options.defaultLabels).length > 0) {
    registry.setDefaultLabels(options.defaultLabels);
  }

  const gauges: Record<MeterName, Gauge> = {
    temperature: new Gauge({ ...METER_DEFINITIONS.temperature, registers: [registry] }),
    pressure: new Gauge({ ...METER_DEFINITIONS.pressure, registers: [registry] }),
    humidity: new Gauge({ ...METER_DEFINITIONS.humidity, registers: [registry] }),
  };

  return {
    set(name: MeterName, value: number): void {
      gauges[name].set(value);
    },

    record(measurement: Measurement): void {
      gauges.temperature.set(measurement.temperature);
      gauges.pressure.set(measurement.pressure);
      gauges.humidity.set(measurement.humidity);
    },

    async encode(): Promise<string> {
      try {
        return await registry.metrics();
      } catch (err) {
        throw new EncodingError('Failed to encode metrics', err);
      }
    },
  };
}
