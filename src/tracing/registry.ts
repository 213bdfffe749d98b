/**
 * In-Progress Trace Registry
 *
 * The set of traces that are still open, keyed by trace ID, plus an index
 * from span ID to owning trace for explicit parent lookups. Shared by the
 * tracer (producers) and the timeout supervisor. Finished traces are
 * removed as soon as they leave the in_progress state.
 *
 * @module tracing/registry
 */

import type { SpanRecord, TraceRecord } from './model.js';

export interface TraceRegistry {
  register(trace: TraceRecord): void;
  get(traceId: string): TraceRecord | undefined;
  /** Record that a span now belongs to a registered trace. */
  indexSpan(span: SpanRecord): void;
  findBySpanId(spanId: string): TraceRecord | undefined;
  remove(traceId: string): boolean;
  inProgress(): TraceRecord[];
  size(): number;
}

export function createTraceRegistry(): TraceRegistry {
  const traces = new Map<string, TraceRecord>();
  const spanOwners = new Map<string, string>();

  return {
    register(trace: TraceRecord): void {
      traces.set(trace.traceId, trace);
      for (const span of trace.getSpans()) {
        spanOwners.set(span.spanId, trace.traceId);
      }
    },

    get(traceId: string): TraceRecord | undefined {
      return traces.get(traceId);
    },

    indexSpan(span: SpanRecord): void {
      if (traces.has(span.traceId)) {
        spanOwners.set(span.spanId, span.traceId);
      }
    },

    findBySpanId(spanId: string): TraceRecord | undefined {
      const traceId = spanOwners.get(spanId);
      return traceId === undefined ? undefined : traces.get(traceId);
    },

    remove(traceId: string): boolean {
      const trace = traces.get(traceId);
      if (!trace) return false;
      for (const span of trace.getSpans()) {
        spanOwners.delete(span.spanId);
      }
      return traces.delete(traceId);
    },

    inProgress(): TraceRecord[] {
      return [...traces.values()].filter((trace) => trace.isInProgress());
    },

    size(): number {
      return traces.size;
    },
  };
}
