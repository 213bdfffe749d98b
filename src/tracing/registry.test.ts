import { describe, it, expect } from 'vitest';
import { SpanRecord, TraceRecord, generateTraceId } from './model.js';
import { createTraceRegistry } from './registry.js';

function makeTrace(): TraceRecord {
  return new TraceRecord(new SpanRecord({ traceId: generateTraceId(), name: 'root', startTime: 0 }));
}

describe('TraceRegistry', () => {
  it('finds registered traces by trace ID and by span ID', () => {
    const registry = createTraceRegistry();
    const trace = makeTrace();
    registry.register(trace);

    const child = new SpanRecord({
      traceId: trace.traceId,
      parentId: trace.rootSpanId,
      name: 'child',
      startTime: 1,
    });
    trace.addSpan(child);
    registry.indexSpan(child);

    expect(registry.get(trace.traceId)).toBe(trace);
    expect(registry.findBySpanId(trace.rootSpanId)).toBe(trace);
    expect(registry.findBySpanId(child.spanId)).toBe(trace);
  });

  it('ignores spans of unregistered traces', () => {
    const registry = createTraceRegistry();
    const span = new SpanRecord({ traceId: 'unknown', name: 'x', startTime: 0 });
    registry.indexSpan(span);
    expect(registry.findBySpanId(span.spanId)).toBeUndefined();
  });

  it('drops the span index together with the trace', () => {
    const registry = createTraceRegistry();
    const trace = makeTrace();
    registry.register(trace);

    expect(registry.remove(trace.traceId)).toBe(true);
    expect(registry.remove(trace.traceId)).toBe(false);
    expect(registry.findBySpanId(trace.rootSpanId)).toBeUndefined();
    expect(registry.size()).toBe(0);
  });

  it('lists only traces still in progress', () => {
    const registry = createTraceRegistry();
    const open = makeTrace();
    const done = makeTrace();
    registry.register(open);
    registry.register(done);
    done.transition('ok', 10);

    expect(registry.inProgress()).toEqual([open]);
  });
});
