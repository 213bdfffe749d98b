/**
 * Property-based tests for log context propagation and level filtering.
 *
 * @module logging/logger.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createLogger, type LogEntry, type LogLevel, type LogOutput } from './logger.js';

// ─── Arbitraries ─────────────────────────────────────────────────────────────

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const logLevelArb = fc.constantFrom(...LEVELS);

const hexIdArb = (length: number) =>
  fc.stringOf(fc.constantFrom(...'0123456789abcdef'.split('')), {
    minLength: length,
    maxLength: length,
  });

// ─── Helpers ─────────────────────────────────────────────────────────────────

function createCapture(): { entries: LogEntry[]; output: LogOutput } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  return { entries, output };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('Property: trace context propagation', () => {
  it('stamps the trace and span IDs of a child logger on every entry it emits', () => {
    fc.assert(
      fc.property(
        hexIdArb(32),
        hexIdArb(16),
        fc.array(logLevelArb, { minLength: 1, maxLength: 10 }),
        (traceId, spanId, levels) => {
          const { entries, output } = createCapture();
          const logger = createLogger({ output, level: 'debug' }).child({ traceId, spanId });

          for (const level of levels) logger[level]('event');

          expect(entries).toHaveLength(levels.length);
          for (const entry of entries) {
            expect(entry.traceId).toBe(traceId);
            expect(entry.spanId).toBe(spanId);
          }
        },
      ),
    );
  });
});

describe('Property: level filtering', () => {
  it('emits exactly the entries at or above the minimum level', () => {
    fc.assert(
      fc.property(logLevelArb, fc.array(logLevelArb, { maxLength: 20 }), (minLevel, levels) => {
        const { entries, output } = createCapture();
        const logger = createLogger({ output, level: minLevel });

        for (const level of levels) logger[level](level);

        const expected = levels.filter((level) => LEVELS.indexOf(level) >= LEVELS.indexOf(minLevel));
        expect(entries.map((e) => e.level)).toEqual(expected);
      }),
    );
  });
});
