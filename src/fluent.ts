/**
 * Module-level tracing API over a lazily created default service.
 *
 * Convenient for applications that want one tracing pipeline per process.
 * `configure()` replaces the default service; anything that needs several
 * independent pipelines should call createTracingService directly.
 *
 * @module fluent
 */

import type { Assessment, TraceTags } from './types/index.js';
import type {
  LogExpectationParams,
  LogFeedbackParams,
  UpdateExpectationParams,
  UpdateFeedbackParams,
} from './assessments/assessment.js';
import { createTracingService } from './service.js';
import type { TracingService, TracingServiceOptions, TracingStats } from './service.js';
import type { ContextHandle } from './tracing/context.js';
import type { EndSpanOptions, SpanHandle, StartSpanOptions, TraceView } from './tracing/tracer.js';

let defaultService: TracingService | null = null;

/** The process-wide service, created from the environment on first use. */
export function getTracingService(): TracingService {
  defaultService ??= createTracingService();
  return defaultService;
}

/**
 * Replace the default service. The previous one is shut down first so its
 * pending traces are flushed rather than lost.
 */
export async function configure(options: TracingServiceOptions = {}): Promise<TracingService> {
  const previous = defaultService;
  defaultService = null;
  if (previous) await previous.shutdown();
  defaultService = createTracingService(options);
  return defaultService;
}

// ─── Spans & Traces ──────────────────────────────────────────────────────────

export function startSpan(name: string, options?: StartSpanOptions): SpanHandle {
  return getTracingService().tracer.startSpan(name, options);
}

export function endSpan(spanId: string, options?: EndSpanOptions): void {
  getTracingService().tracer.endSpan(spanId, options);
}

export function withSpan<T>(
  name: string,
  fn: (span: SpanHandle) => T,
  options?: StartSpanOptions,
): T {
  return getTracingService().tracer.withSpan(name, fn, options);
}

export function withSpanAsync<T>(
  name: string,
  fn: (span: SpanHandle) => Promise<T>,
  options?: StartSpanOptions,
): Promise<T> {
  return getTracingService().tracer.withSpanAsync(name, fn, options);
}

export function getCurrentTrace(): TraceView | null {
  return getTracingService().tracer.currentTrace();
}

export function getCurrentSpan(): SpanHandle | null {
  return getTracingService().tracer.currentSpan();
}

export function updateCurrentTrace(tags: TraceTags): void {
  getTracingService().tracer.updateCurrentTrace(tags);
}

export function runInNewContext<T>(fn: (handle: ContextHandle) => T): T {
  return getTracingService().tracer.runInNewContext(fn);
}

export function setTraceTag(traceId: string, key: string, value: string): Promise<void> {
  return getTracingService().setTraceTag(traceId, key, value);
}

export function deleteTraceTag(traceId: string, key: string): Promise<void> {
  return getTracingService().deleteTraceTag(traceId, key);
}

// ─── Switch, Flush & Stats ───────────────────────────────────────────────────

export function enable(): void {
  getTracingService().enable();
}

export function disable(): void {
  getTracingService().disable();
}

export function isEnabled(): boolean {
  return getTracingService().isEnabled();
}

export function flush(timeoutMs?: number): Promise<boolean> {
  return getTracingService().flush(timeoutMs);
}

export function getStats(): TracingStats {
  return getTracingService().getStats();
}

// ─── Assessments ─────────────────────────────────────────────────────────────

export function logExpectation(params: LogExpectationParams): Promise<Assessment> {
  return getTracingService().assessments.logExpectation(params);
}

export function logFeedback(params: LogFeedbackParams): Promise<Assessment> {
  return getTracingService().assessments.logFeedback(params);
}

export function updateExpectation(params: UpdateExpectationParams): Promise<Assessment> {
  return getTracingService().assessments.updateExpectation(params);
}

export function updateFeedback(params: UpdateFeedbackParams): Promise<Assessment> {
  return getTracingService().assessments.updateFeedback(params);
}

export function deleteExpectation(params: { traceId: string; assessmentId: string }): Promise<void> {
  return getTracingService().assessments.deleteExpectation(params);
}

export function deleteFeedback(params: { traceId: string; assessmentId: string }): Promise<void> {
  return getTracingService().assessments.deleteFeedback(params);
}
