/**
 * Property-based tests for sensor access serialization
 *
 * **Property: Mutual Exclusion**
 * For any batch of concurrent scrapes, with any mix of successful and
 * failing reads of any duration, at most one hardware transaction SHALL
 * be in flight, every caller SHALL settle, and the lock SHALL be free
 * afterwards.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createMeasurementGate } from './measurementGate.js';
import { createMeterRegistry } from '../metrics/meterRegistry.js';
import { createLogger } from '../logging/logger.js';
import { ExclusiveLock } from '../utils/exclusiveLock.js';
import { FakeSensor, reading, type ScriptStep } from '../test/fakeSensor.js';

// ─── Generators ──────────────────────────────────────────────────────────────

const stepArb: fc.Arbitrary<ScriptStep> = fc.oneof(
  fc
    .record({
      temperature: fc.integer({ min: -40, max: 85 }),
      pressure: fc.integer({ min: 30000, max: 110000 }),
      humidity: fc.integer({ min: 0, max: 100 }),
      delayMs: fc.integer({ min: 0, max: 3 }),
    })
    .map((r) => reading(r.temperature, r.pressure, r.humidity, r.delayMs)),
  fc.constant<ScriptStep>({ kind: 'error', error: new Error('bus fault') }),
);

const callArb = fc.constantFrom('measure', 'scrape');

// ─── Properties ──────────────────────────────────────────────────────────────

describe('Property: Mutual Exclusion', () => {
  it('never overlaps hardware transactions and always releases the lock', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.tuple(stepArb, callArb), { minLength: 1, maxLength: 8 }),
        async (calls) => {
          const sensor = new FakeSensor();
          const lock = new ExclusiveLock();
          const gate = createMeasurementGate({
            driver: sensor,
            registry: createMeterRegistry(),
            logger: createLogger({ output: () => undefined }),
            lock,
          });
          sensor.enqueue(...calls.map(([step]) => step));

          const results = await Promise.allSettled(
            calls.map(([, call]) => (call === 'measure' ? gate.measure() : gate.scrape())),
          );

          const failures = calls.filter(([step]) => step.kind === 'error').length;
          expect(results.filter((r) => r.status === 'rejected')).toHaveLength(failures);
          expect(sensor.measureCalls).toBe(calls.length);
          expect(sensor.maxInFlight).toBe(1);
          expect(lock.isLocked).toBe(false);
        },
      ),
      { numRuns: 40 },
    );
  });
});
