/**
 * Tracing Module
 *
 * Span and trace records, execution contexts, the tracer, and the timeout
 * supervisor that force-closes traces which never finish.
 *
 * @module tracing
 */

export {
  type SpanRef,
  type ContextManager,
  ContextHandle,
  createContextManager,
} from './context.js';

export {
  SpanStateError,
  TraceTimeoutError,
  ExportError,
  HttpExportError,
  AssessmentValidationError,
  ResourceNotFoundError,
  isRetryableError,
  isRetryableStatus,
  toError,
} from './errors.js';

export {
  type SpanInit,
  SpanRecord,
  TraceRecord,
  generateSpanId,
  generateTraceId,
} from './model.js';

export { type TraceRegistry, createTraceRegistry } from './registry.js';

export {
  type EndSpanOptions,
  type SpanHandle,
  type StartSpanOptions,
  type TraceView,
  type Tracer,
  type TracerConfig,
  DISABLED_SPAN_ID,
  DISABLED_TRACE_ID,
  createTracer,
} from './tracer.js';

export {
  type TimeoutSupervisor,
  type TimeoutSupervisorConfig,
  createTimeoutSupervisor,
} from './timeoutSupervisor.js';

export {
  type TraceBackend,
  type TracingConfig,
  DEFAULT_TRACING_CONFIG,
  loadTracingConfig,
} from './tracingConfig.js';

export { type TracedOptions, traced, tracedAsync } from './spanHelpers.js';
