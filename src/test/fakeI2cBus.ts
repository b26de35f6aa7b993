/**
 * In-memory I2C bus holding one device's register map.
 *
 * Block reads copy consecutive registers; writes are recorded in order so
 * tests can assert the exact initialization and trigger sequence.
 *
 * @module test/fakeI2cBus
 */

import type { Bme280Bus } from '../sensor/bme280.js';

export interface RegisterWrite {
  register: number;
  value: number;
}

export class FakeI2cBus implements Bme280Bus {
  readonly registers = new Map<number, number>();
  readonly writes: RegisterWrite[] = [];
  closed = false;
  /** Error thrown by the next bus call, then cleared. */
  failNext: Error | null = null;
  /** Cap the number of bytes a block read reports. */
  shortRead: number | null = null;

  constructor(readonly address: number) {}

  load(start: number, bytes: readonly number[]): void {
    bytes.forEach((byte, i) => this.registers.set(start + i, byte));
  }

  async readByte(address: number, command: number): Promise<number> {
    this.check(address);
    return this.registers.get(command) ?? 0;
  }

  async writeByte(address: number, command: number, byte: number): Promise<void> {
    this.check(address);
    this.writes.push({ register: command, value: byte });
    this.registers.set(command, byte);
  }

  async readI2cBlock(
    address: number,
    command: number,
    length: number,
    buffer: Buffer,
  ): Promise<{ bytesRead: number; buffer: Buffer }> {
    this.check(address);
    const bytesRead = Math.min(length, this.shortRead ?? length);
    for (let i = 0; i < bytesRead; i++) {
      buffer[i] = this.registers.get(command + i) ?? 0;
    }
    return { bytesRead, buffer };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private check(address: number): void {
    if (this.failNext) {
      const err = this.failNext;
      this.failNext = null;
      throw err;
    }
    if (this.closed) throw new Error('Bus is closed');
    if (address !== this.address) throw new Error(`No device at 0x${address.toString(16)}`);
  }
}
