/**
 * BME280 Driver
 *
 * Reads temperature, pressure and humidity from a Bosch BME280 over I2C
 * using forced mode: every `measure()` triggers one conversion, waits for
 * it, burst-reads the data registers and applies the datasheet's
 * double-precision compensation formulas.
 *
 * Bus I/O goes through i2c-bus's promisified API, which runs each
 * transfer on the libuv thread pool instead of the event loop.
 *
 * @module sensor/bme280
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { PromisifiedBus } from 'i2c-bus';
import type { Measurement, SensorDriver } from './types.js';

// ─── Register Map ────────────────────────────────────────────────────────────

export const BME280_REGISTERS = {
  chipId: 0xd0,
  reset: 0xe0,
  ctrlHum: 0xf2,
  ctrlMeas: 0xf4,
  config: 0xf5,
  data: 0xf7,
  calib00: 0x88,
  calib26: 0xe1,
} as const;

export const BME280_CHIP_ID = 0x60;
export const BME280_SOFT_RESET = 0xb6;

const CALIB00_LENGTH = 26;
const CALIB26_LENGTH = 7;
const DATA_LENGTH = 8;

/** osrs_h = x1 */
const CTRL_HUM_VALUE = 0x01;
/** osrs_t = x1, osrs_p = x1, mode = sleep */
const CTRL_MEAS_SLEEP = 0x24;
/** osrs_t = x1, osrs_p = x1, mode = forced */
const CTRL_MEAS_FORCED = 0x25;
/** standby 0.5 ms, filter off */
const CONFIG_VALUE = 0x00;

const RESET_DELAY_MS = 2;

/** ADC values the chip reports when a conversion was skipped. */
const SKIPPED_20BIT = 0x80000;
const SKIPPED_16BIT = 0x8000;

// ─── Types ───────────────────────────────────────────────────────────────────

/** The slice of i2c-bus's PromisifiedBus the driver uses. */
export type Bme280Bus = Pick<PromisifiedBus, 'readByte' | 'writeByte' | 'readI2cBlock' | 'close'>;

export interface Bme280Calibration {
  T1: number;
  T2: number;
  T3: number;
  P1: number;
  P2: number;
  P3: number;
  P4: number;
  P5: number;
  P6: number;
  P7: number;
  P8: number;
  P9: number;
  H1: number;
  H2: number;
  H3: number;
  H4: number;
  H5: number;
  H6: number;
}

export interface RawReading {
  adcT: number;
  adcP: number;
  adcH: number;
}

export interface Bme280Options {
  bus: Bme280Bus;
  /** 0x76 (primary) or 0x77 (secondary). */
  address: number;
  /** Wait between the forced-mode trigger and the data read. Defaults to 40 ms. */
  measurementDelayMs?: number;
  /** Exposed for deterministic testing. */
  sleep?: (ms: number) => Promise<void>;
}

// ─── Decoding ────────────────────────────────────────────────────────────────

/** Parse the 0x88..0xA1 and 0xE1..0xE7 calibration blocks. */
export function parseCalibration(calib00: Buffer, calib26: Buffer): Bme280Calibration {
  if (calib00.length < CALIB00_LENGTH || calib26.length < CALIB26_LENGTH) {
    throw new Error('Calibration data is truncated');
  }

  const e4 = calib26.readInt8(3);
  const e5 = calib26.readUInt8(4);
  const e6 = calib26.readInt8(5);

  return {
    T1: calib00.readUInt16LE(0),
    T2: calib00.readInt16LE(2),
    T3: calib00.readInt16LE(4),
    P1: calib00.readUInt16LE(6),
    P2: calib00.readInt16LE(8),
    P3: calib00.readInt16LE(10),
    P4: calib00.readInt16LE(12),
    P5: calib00.readInt16LE(14),
    P6: calib00.readInt16LE(16),
    P7: calib00.readInt16LE(18),
    P8: calib00.readInt16LE(20),
    P9: calib00.readInt16LE(22),
    H1: calib00.readUInt8(25),
    H2: calib26.readInt16LE(0),
    H3: calib26.readUInt8(2),
    H4: e4 * 16 + (e5 & 0x0f),
    H5: e6 * 16 + (e5 >> 4),
    H6: calib26.readInt8(6),
  };
}

/** Split the 8-byte burst read starting at 0xF7 into ADC values. */
export function parseRawReading(data: Buffer): RawReading {
  if (data.length < DATA_LENGTH) {
    throw new Error(`Expected ${DATA_LENGTH} data bytes, got ${data.length}`);
  }
  const read20 = (offset: number): number =>
    (data.readUInt8(offset) << 12) | (data.readUInt8(offset + 1) << 4) | (data.readUInt8(offset + 2) >> 4);

  return {
    adcP: read20(0),
    adcT: read20(3),
    adcH: data.readUInt16BE(6),
  };
}

/** Datasheet 8.1 floating-point compensation. Pressure in Pa, humidity clamped to 0..100. */
export function compensate(raw: RawReading, cal: Bme280Calibration): Measurement {
  if (raw.adcT === SKIPPED_20BIT || raw.adcP === SKIPPED_20BIT || raw.adcH === SKIPPED_16BIT) {
    throw new Error('Sensor returned a skipped conversion');
  }

  // Temperature
  let var1 = (raw.adcT / 16384.0 - cal.T1 / 1024.0) * cal.T2;
  let var2 =
    (raw.adcT / 131072.0 - cal.T1 / 8192.0) * (raw.adcT / 131072.0 - cal.T1 / 8192.0) * cal.T3;
  const tFine = var1 + var2;
  const temperature = tFine / 5120.0;

  // Pressure
  var1 = tFine / 2.0 - 64000.0;
  var2 = (var1 * var1 * cal.P6) / 32768.0;
  var2 = var2 + var1 * cal.P5 * 2.0;
  var2 = var2 / 4.0 + cal.P4 * 65536.0;
  var1 = ((cal.P3 * var1 * var1) / 524288.0 + cal.P2 * var1) / 524288.0;
  var1 = (1.0 + var1 / 32768.0) * cal.P1;
  if (var1 === 0) {
    throw new Error('Pressure compensation divisor is zero');
  }
  let pressure = 1048576.0 - raw.adcP;
  pressure = ((pressure - var2 / 4096.0) * 6250.0) / var1;
  var1 = (cal.P9 * pressure * pressure) / 2147483648.0;
  var2 = (pressure * cal.P8) / 32768.0;
  pressure = pressure + (var1 + var2 + cal.P7) / 16.0;

  // Humidity
  let humidity = tFine - 76800.0;
  humidity =
    (raw.adcH - (cal.H4 * 64.0 + (cal.H5 / 16384.0) * humidity)) *
    ((cal.H2 / 65536.0) *
      (1.0 + (cal.H6 / 67108864.0) * humidity * (1.0 + (cal.H3 / 67108864.0) * humidity)));
  humidity = humidity * (1.0 - (cal.H1 * humidity) / 524288.0);
  humidity = Math.min(100, Math.max(0, humidity));

  return Object.freeze({ temperature, pressure, humidity });
}

// ─── Driver ──────────────────────────────────────────────────────────────────

export class Bme280Driver implements SensorDriver {
  private readonly bus: Bme280Bus;
  private readonly address: number;
  private readonly measurementDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private calibration: Bme280Calibration | null = null;

  constructor(options: Bme280Options) {
    this.bus = options.bus;
    this.address = options.address;
    this.measurementDelayMs = options.measurementDelayMs ?? 40;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  async init(): Promise<void> {
    const chipId = await this.bus.readByte(this.address, BME280_REGISTERS.chipId);
    if (chipId !== BME280_CHIP_ID) {
      throw new Error(
        `Unexpected chip id 0x${chipId.toString(16)} at address 0x${this.address.toString(16)} ` +
          `(expected 0x${BME280_CHIP_ID.toString(16)})`,
      );
    }

    await this.bus.writeByte(this.address, BME280_REGISTERS.reset, BME280_SOFT_RESET);
    await this.sleep(RESET_DELAY_MS);

    const calib00 = await this.readBlock(BME280_REGISTERS.calib00, CALIB00_LENGTH);
    const calib26 = await this.readBlock(BME280_REGISTERS.calib26, CALIB26_LENGTH);
    this.calibration = parseCalibration(calib00, calib26);

    // ctrl_hum only takes effect after a write to ctrl_meas
    await this.bus.writeByte(this.address, BME280_REGISTERS.ctrlHum, CTRL_HUM_VALUE);
    await this.bus.writeByte(this.address, BME280_REGISTERS.config, CONFIG_VALUE);
    await this.bus.writeByte(this.address, BME280_REGISTERS.ctrlMeas, CTRL_MEAS_SLEEP);
  }

  async measure(): Promise<Measurement> {
    const calibration = this.calibration;
    if (!calibration) {
      throw new Error('BME280 is not initialized');
    }

    await this.bus.writeByte(this.address, BME280_REGISTERS.ctrlMeas, CTRL_MEAS_FORCED);
    await this.sleep(this.measurementDelayMs);
    const data = await this.readBlock(BME280_REGISTERS.data, DATA_LENGTH);

    return compensate(parseRawReading(data), calibration);
  }

  async close(): Promise<void> {
    this.calibration = null;
    await this.bus.close();
  }

  private async readBlock(register: number, length: number): Promise<Buffer> {
    const { bytesRead, buffer } = await this.bus.readI2cBlock(
      this.address,
      register,
      length,
      Buffer.alloc(length),
    );
    if (bytesRead !== length) {
      throw new Error(
        `Short read from register 0x${register.toString(16)}: ${bytesRead} of ${length} bytes`,
      );
    }
    return buffer;
  }
}
