/**
 * Hand-built trace snapshots for export and store tests.
 *
 * @module test/fixtures
 */

import type { SpanSnapshot, TraceSnapshot } from '../types/index.js';

export function makeSnapshot(traceId: string, overrides: Partial<SpanSnapshot> = {}): TraceSnapshot {
  const root: SpanSnapshot = {
    spanId: `${traceId}-root`,
    traceId,
    name: 'root',
    startTime: 1000,
    endTime: 1500,
    status: 'ok',
    attributes: {},
    ...overrides,
  };
  return {
    info: {
      traceId,
      rootSpanId: root.spanId,
      state: root.status === 'error' ? 'error' : 'ok',
      createdAt: root.startTime,
      endedAt: root.endTime,
      executionTimeMs: root.endTime - root.startTime,
      tags: {},
      timedOut: false,
    },
    spans: [root],
  };
}

export interface Deferred {
  promise: Promise<void>;
  resolve(): void;
}

export function deferred(): Deferred {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}
