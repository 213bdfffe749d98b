/**
 * Tracer
 *
 * Opens and closes spans against the calling execution context, builds
 * traces from them, and hands each finished trace to the export sink as a
 * frozen snapshot. Ending the root span is the only natural trigger for
 * export; the timeout supervisor is the only other one, through
 * `expireTrace`. Both go through the same compare-and-set on the trace
 * state, so a trace is submitted at most once.
 *
 * @module tracing/tracer
 */

import type {
  SpanAttributes,
  SpanStatus,
  TraceSnapshot,
  TraceState,
  TraceTags,
} from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { ContextHandle, createContextManager } from './context.js';
import type { ContextManager, SpanRef } from './context.js';
import { SpanStateError, TraceTimeoutError, toError } from './errors.js';
import { SpanRecord, TraceRecord, generateSpanId, generateTraceId } from './model.js';
import type { TraceRegistry } from './registry.js';

// ─── Public Types ────────────────────────────────────────────────────────────

export interface StartSpanOptions {
  /** Parent span ID. Defaults to the innermost open span of the context. */
  parentId?: string;
  attributes?: SpanAttributes;
  inputs?: unknown;
  /** Run to associate with the trace; only used when the span starts a new trace. */
  runId?: string;
  /** Context to record the span in. Defaults to the current one. */
  context?: ContextHandle;
}

export interface EndSpanOptions {
  /** Defaults to the status already set on the span, or 'ok'. */
  status?: SpanStatus;
  statusMessage?: string;
  outputs?: unknown;
  attributes?: SpanAttributes;
  context?: ContextHandle;
}

export interface SpanHandle {
  readonly spanId: string;
  readonly traceId: string;
  readonly name: string;
  /** False when tracing is disabled or the trace was already closed. */
  readonly isRecording: boolean;
  setAttributes(attributes: SpanAttributes): void;
  setInputs(inputs: unknown): void;
  setOutputs(outputs: unknown): void;
  setStatus(status: SpanStatus, message?: string): void;
  /** End the span in the context it was started in. */
  end(options?: Omit<EndSpanOptions, 'context'>): void;
  isEnded(): boolean;
}

/** Read-only view of an in-progress trace. */
export interface TraceView {
  traceId: string;
  rootSpanId: string;
  state: TraceState;
  createdAt: number;
  runId?: string;
  tags: Readonly<TraceTags>;
  spanCount: number;
}

export interface TracerConfig {
  registry: TraceRegistry;
  /** Receives each finished trace exactly once. Must not block. */
  submit: (snapshot: TraceSnapshot) => void;
  contexts?: ContextManager;
  /** Called after a new trace is registered. */
  onTraceStarted?: (trace: TraceRecord) => void;
  /** Global switch; while it returns false span creation records nothing. */
  isEnabled?: () => boolean;
  now?: () => number;
  logger?: Logger;
}

export interface Tracer {
  startSpan(name: string, options?: StartSpanOptions): SpanHandle;
  endSpan(spanId: string, options?: EndSpanOptions): void;
  currentTrace(): TraceView | null;
  currentSpan(): SpanHandle | null;
  updateCurrentTrace(tags: TraceTags): void;
  withSpan<T>(name: string, fn: (span: SpanHandle) => T, options?: StartSpanOptions): T;
  withSpanAsync<T>(
    name: string,
    fn: (span: SpanHandle) => Promise<T>,
    options?: StartSpanOptions,
  ): Promise<T>;
  /**
   * Force-close a trace that outlived its timeout: every open span ends with
   * status 'error' at `at`. Returns false if the trace had already finished.
   */
  expireTrace(traceId: string, at: number, reason: TraceTimeoutError): boolean;
  runInNewContext<T>(fn: (handle: ContextHandle) => T): T;
  runWithContext<T>(handle: ContextHandle, fn: () => T): T;
  captureContext(): ContextHandle;
}

// ─── Implementation ──────────────────────────────────────────────────────────

/** IDs carried by every span handed out while tracing is disabled. */
export const DISABLED_TRACE_ID = '0'.repeat(32);
export const DISABLED_SPAN_ID = '0'.repeat(16);

/** Force-closed traces remembered so their leftover stack entries keep reading as closed. */
const EXPIRED_TRACE_MEMORY = 1024;

export function createTracer(config: TracerConfig): Tracer {
  const registry = config.registry;
  const contexts = config.contexts ?? createContextManager();
  const now = config.now ?? Date.now;
  const isEnabled = config.isEnabled ?? (() => true);
  const logger = (config.logger ?? createSilentLogger()).child({ component: 'tracer' });
  const handles = new Map<string, { handle: SpanHandle; markEnded: () => void }>();
  // traceId -> root span ID of traces the supervisor closed
  const expiredRoots = new Map<string, string>();

  function markExpired(trace: TraceRecord): void {
    expiredRoots.set(trace.traceId, trace.rootSpanId);
    if (expiredRoots.size > EXPIRED_TRACE_MEMORY) {
      const oldest = expiredRoots.keys().next();
      if (!oldest.done) expiredRoots.delete(oldest.value);
    }
  }

  /** The application ended the root of a force-closed trace; stop remembering it. */
  function settle(ref: SpanRef): void {
    if (expiredRoots.get(ref.traceId) === ref.spanId) expiredRoots.delete(ref.traceId);
  }

  function submit(trace: TraceRecord): void {
    try {
      config.submit(trace.snapshot());
    } catch (error) {
      logger.error('Failed to submit finished trace for export', toError(error), {
        traceId: trace.traceId,
      });
    }
  }

  function release(trace: TraceRecord): void {
    registry.remove(trace.traceId);
    for (const span of trace.getSpans()) {
      handles.delete(span.spanId);
    }
  }

  function finalize(trace: TraceRecord, at: number, context: ContextHandle): void {
    for (const span of trace.getOpenSpans()) {
      span.close(at);
    }
    const state = trace.hasErrorSpan() ? 'error' : 'ok';
    if (!trace.transition(state, at)) return;
    release(trace);
    // Children the root closed must not parent the next trace in this context.
    context.removeTrace(trace.traceId);
    logger.debug('Trace finished', { traceId: trace.traceId, state });
    submit(trace);
  }

  function makeHandle(
    record: SpanRecord | null,
    ref: SpanRef,
    name: string,
    owner: ContextHandle | null,
  ): SpanHandle {
    let ended = false;
    const handle: SpanHandle = {
      spanId: ref.spanId,
      traceId: ref.traceId,
      name,
      isRecording: ref.recording,
      setAttributes(attributes: SpanAttributes): void {
        record?.setAttributes(attributes);
      },
      setInputs(inputs: unknown): void {
        record?.setInputs(inputs);
      },
      setOutputs(outputs: unknown): void {
        record?.setOutputs(outputs);
      },
      setStatus(status: SpanStatus, message?: string): void {
        record?.setStatus(status, message);
      },
      end(options?: Omit<EndSpanOptions, 'context'>): void {
        if (ended) {
          throw new SpanStateError(`Span ${ref.spanId} has already ended`, ref.spanId);
        }
        ended = true;
        if (owner === null) return;
        if (record && !record.isOpen()) {
          // Closed along with its trace; only the stack entry can be left.
          owner.remove(ref.spanId);
          settle(ref);
          return;
        }
        endSpanIn(owner, ref.spanId, options ?? {});
      },
      isEnded(): boolean {
        return ended;
      },
    };
    if (record) {
      handles.set(ref.spanId, {
        handle,
        markEnded: () => {
          ended = true;
        },
      });
    }
    return handle;
  }

  /** Placeholder span; pushed onto the stack so its own children stay placeholders too. */
  function nonRecording(name: string, context: ContextHandle, traceId = ''): SpanHandle {
    const ref: SpanRef = { traceId, spanId: generateSpanId(), recording: false };
    context.push(ref);
    return makeHandle(null, ref, name, context);
  }

  function disabledSpan(name: string): SpanHandle {
    const ref: SpanRef = { traceId: DISABLED_TRACE_ID, spanId: DISABLED_SPAN_ID, recording: false };
    return makeHandle(null, ref, name, null);
  }

  function resolveParent(
    context: ContextHandle,
    parentId: string | undefined,
  ): { trace: TraceRecord; parentId: string } | 'none' | 'closed' {
    if (parentId !== undefined) {
      const trace = registry.findBySpanId(parentId);
      return trace && trace.isInProgress() ? { trace, parentId } : 'closed';
    }
    for (;;) {
      const top = context.top();
      if (!top) return 'none';
      if (!top.recording) return 'closed';
      const trace = registry.get(top.traceId);
      if (trace) return trace.isInProgress() ? { trace, parentId: top.spanId } : 'closed';
      if (expiredRoots.has(top.traceId)) return 'closed';
      // Left behind by a trace that finished from another context.
      context.removeTrace(top.traceId);
    }
  }

  function startSpan(name: string, options: StartSpanOptions = {}): SpanHandle {
    if (!isEnabled()) {
      return disabledSpan(name);
    }

    const context = options.context ?? contexts.current();
    const parent = resolveParent(context, options.parentId);

    if (parent === 'closed') {
      logger.debug('Parent trace is no longer recording; span will not be recorded', {
        spanName: name,
      });
      return nonRecording(name, context, context.top()?.traceId);
    }

    const startTime = now();

    if (parent === 'none') {
      const root = new SpanRecord({
        traceId: generateTraceId(),
        name,
        startTime,
        attributes: options.attributes,
        inputs: options.inputs,
      });
      const trace = new TraceRecord(root, options.runId);
      registry.register(trace);
      const ref: SpanRef = { traceId: trace.traceId, spanId: root.spanId, recording: true };
      context.push(ref);
      config.onTraceStarted?.(trace);
      return makeHandle(root, ref, name, context);
    }

    const span = new SpanRecord({
      traceId: parent.trace.traceId,
      parentId: parent.parentId,
      name,
      startTime,
      attributes: options.attributes,
      inputs: options.inputs,
    });
    parent.trace.addSpan(span);
    registry.indexSpan(span);
    const ref: SpanRef = { traceId: span.traceId, spanId: span.spanId, recording: true };
    context.push(ref);
    return makeHandle(span, ref, name, context);
  }

  function endSpanIn(context: ContextHandle, spanId: string, options: EndSpanOptions): void {
    if (spanId === DISABLED_SPAN_ID) return;
    const ref = context.remove(spanId);
    if (!ref) {
      throw new SpanStateError(
        `Span ${spanId} is not open in the current execution context`,
        spanId,
      );
    }
    const entry = handles.get(spanId);
    if (entry) {
      entry.markEnded();
      handles.delete(spanId);
    }
    if (!ref.recording) return;
    settle(ref);

    const trace = registry.get(ref.traceId);
    // Trace already force-closed by the supervisor: nothing left to record.
    if (!trace || !trace.isInProgress()) return;

    const span = trace.getSpan(spanId);
    if (!span || !span.isOpen()) return;

    if (options.attributes) span.setAttributes(options.attributes);
    if (options.outputs !== undefined) span.setOutputs(options.outputs);
    const status = options.status ?? (span.status === 'unset' ? 'ok' : span.status);
    const message = options.status !== undefined ? options.statusMessage : span.statusMessage;
    const at = now();
    span.close(at, status, message);

    if (span.spanId === trace.rootSpanId) {
      finalize(trace, at, context);
    }
  }

  function endSpan(spanId: string, options: EndSpanOptions = {}): void {
    endSpanIn(options.context ?? contexts.current(), spanId, options);
  }

  function currentRecord(): TraceRecord | undefined {
    const top = contexts.current().top();
    if (!top || !top.recording) return undefined;
    const trace = registry.get(top.traceId);
    return trace && trace.isInProgress() ? trace : undefined;
  }

  function currentTrace(): TraceView | null {
    const trace = currentRecord();
    if (!trace) return null;
    const view: TraceView = {
      traceId: trace.traceId,
      rootSpanId: trace.rootSpanId,
      state: trace.state,
      createdAt: trace.createdAt,
      tags: trace.getTags(),
      spanCount: trace.getSpans().length,
    };
    if (trace.runId !== undefined) view.runId = trace.runId;
    return view;
  }

  function currentSpan(): SpanHandle | null {
    const top = contexts.current().top();
    if (!top) return null;
    return handles.get(top.spanId)?.handle ?? null;
  }

  function updateCurrentTrace(tags: TraceTags): void {
    const trace = currentRecord();
    if (!trace) {
      logger.debug('No active trace in this context; tags ignored', { keys: Object.keys(tags) });
      return;
    }
    trace.setTags(tags);
  }

  function finishWithError(span: SpanHandle, error: unknown): void {
    if (span.isEnded()) return;
    const err = toError(error);
    span.end({ status: 'error', statusMessage: `${err.name}: ${err.message}` });
  }

  /**
   * `fn` runs in a fork of the calling context that holds the new span, so
   * siblings started concurrently each parent under the caller's span.
   */
  function withSpan<T>(name: string, fn: (span: SpanHandle) => T, options?: StartSpanOptions): T {
    const context = (options?.context ?? contexts.current()).fork();
    const span = startSpan(name, { ...options, context });
    return contexts.runWithContext(context, () => {
      let result: T;
      try {
        result = fn(span);
      } catch (error) {
        finishWithError(span, error);
        throw error;
      }
      if (!span.isEnded()) span.end({ outputs: result });
      return result;
    });
  }

  async function withSpanAsync<T>(
    name: string,
    fn: (span: SpanHandle) => Promise<T>,
    options?: StartSpanOptions,
  ): Promise<T> {
    const context = (options?.context ?? contexts.current()).fork();
    const span = startSpan(name, { ...options, context });
    return contexts.runWithContext(context, async () => {
      let result: T;
      try {
        result = await fn(span);
      } catch (error) {
        finishWithError(span, error);
        throw error;
      }
      if (!span.isEnded()) span.end({ outputs: result });
      return result;
    });
  }

  function expireTrace(traceId: string, at: number, reason: TraceTimeoutError): boolean {
    const trace = registry.get(traceId);
    if (!trace || !trace.transition('error', at, { timedOut: true })) return false;
    for (const span of trace.getOpenSpans()) {
      span.close(at, 'error', reason.message);
    }
    release(trace);
    markExpired(trace);
    logger.warn('Trace exceeded its timeout and was force-closed', {
      traceId,
      timeoutMs: reason.timeoutMs,
    });
    submit(trace);
    return true;
  }

  return {
    startSpan,
    endSpan,
    currentTrace,
    currentSpan,
    updateCurrentTrace,
    withSpan,
    withSpanAsync,
    expireTrace,
    runInNewContext: (fn) => contexts.runInNewContext(fn),
    runWithContext: (handle, fn) => contexts.runWithContext(handle, fn),
    captureContext: () => contexts.current(),
  };
}
