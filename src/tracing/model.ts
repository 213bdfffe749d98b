/**
 * Span & Trace Records
 *
 * Mutable in-process records for traces that are still being built, and
 * the frozen snapshots they turn into once finished. A trace owns its
 * spans outright; parent/child links are span IDs, never object references.
 *
 * @module tracing/model
 */

import { randomBytes } from 'node:crypto';
import type {
  SpanAttributes,
  SpanSnapshot,
  SpanStatus,
  TerminalTraceState,
  TraceSnapshot,
  TraceState,
  TraceTags,
} from '../types/index.js';

// ─── Identifiers ─────────────────────────────────────────────────────────────

function generateHexId(byteLength: number): string {
  return randomBytes(byteLength).toString('hex');
}

/** 32-character hex trace ID (16 bytes). */
export function generateTraceId(): string {
  return generateHexId(16);
}

/** 16-character hex span ID (8 bytes). */
export function generateSpanId(): string {
  return generateHexId(8);
}

// ─── Snapshot Helpers ────────────────────────────────────────────────────────

/**
 * Copy a user payload so later mutation by the application cannot leak into
 * an exported snapshot. Values the structured clone algorithm rejects
 * (functions, class instances holding sockets, ...) are stored as strings.
 */
export function clonePayload(value: unknown): unknown {
  if (value === undefined || value === null || typeof value !== 'object') {
    return typeof value === 'function' ? String(value) : value;
  }
  try {
    return structuredClone(value);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.name : 'Error'}] ${String(value)}`;
  }
}

export function cloneAttributes(attributes: Readonly<SpanAttributes>): SpanAttributes {
  return Object.fromEntries(
    Object.entries(attributes).map(([key, value]) => [key, clonePayload(value)]),
  );
}

/** Freeze a snapshot in place. Binary views (Buffer, TypedArray) cannot be frozen and are left as is. */
export function deepFreeze<T>(value: T): T {
  if (ArrayBuffer.isView(value)) return value;
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const nested: unknown[] = Object.values(value);
    for (const child of nested) {
      deepFreeze(child);
    }
  }
  return value;
}

// ─── SpanRecord ──────────────────────────────────────────────────────────────

export interface SpanInit {
  spanId?: string;
  traceId: string;
  parentId?: string;
  name: string;
  startTime: number;
  attributes?: SpanAttributes;
  inputs?: unknown;
}

export class SpanRecord {
  readonly spanId: string;
  readonly traceId: string;
  readonly parentId?: string;
  readonly name: string;
  readonly startTime: number;

  private _endTime?: number;
  private _status: SpanStatus = 'unset';
  private _statusMessage?: string;
  private readonly _attributes: SpanAttributes;
  private _inputs?: unknown;
  private _outputs?: unknown;

  constructor(init: SpanInit) {
    this.spanId = init.spanId ?? generateSpanId();
    this.traceId = init.traceId;
    this.parentId = init.parentId;
    this.name = init.name;
    this.startTime = init.startTime;
    this._attributes = { ...init.attributes };
    this._inputs = init.inputs;
  }

  get endTime(): number | undefined {
    return this._endTime;
  }

  get status(): SpanStatus {
    return this._status;
  }

  get statusMessage(): string | undefined {
    return this._statusMessage;
  }

  get attributes(): Readonly<SpanAttributes> {
    return this._attributes;
  }

  isOpen(): boolean {
    return this._endTime === undefined;
  }

  setAttributes(attributes: SpanAttributes): void {
    if (!this.isOpen()) return;
    Object.assign(this._attributes, attributes);
  }

  setInputs(inputs: unknown): void {
    if (!this.isOpen()) return;
    this._inputs = inputs;
  }

  setOutputs(outputs: unknown): void {
    if (!this.isOpen()) return;
    this._outputs = outputs;
  }

  setStatus(status: SpanStatus, message?: string): void {
    if (!this.isOpen()) return;
    this._status = status;
    this._statusMessage = message;
  }

  /**
   * Close the span. The end time is clamped to the start time so a
   * backwards clock step never yields a negative duration.
   * Returns false if the span was already closed.
   */
  close(endTime: number, status?: SpanStatus, message?: string): boolean {
    if (!this.isOpen()) return false;
    if (status !== undefined) {
      this._status = status;
      this._statusMessage = message;
    }
    this._endTime = Math.max(endTime, this.startTime);
    return true;
  }

  toSnapshot(): SpanSnapshot {
    const snapshot: {
      -readonly [K in keyof SpanSnapshot]: SpanSnapshot[K];
    } = {
      spanId: this.spanId,
      traceId: this.traceId,
      name: this.name,
      startTime: this.startTime,
      endTime: this._endTime ?? this.startTime,
      status: this._status,
      attributes: cloneAttributes(this._attributes),
    };
    if (this.parentId !== undefined) snapshot.parentId = this.parentId;
    if (this._statusMessage !== undefined) snapshot.statusMessage = this._statusMessage;
    if (this._inputs !== undefined) snapshot.inputs = clonePayload(this._inputs);
    if (this._outputs !== undefined) snapshot.outputs = clonePayload(this._outputs);
    return snapshot;
  }
}

// ─── TraceRecord ─────────────────────────────────────────────────────────────

export class TraceRecord {
  readonly traceId: string;
  readonly rootSpanId: string;
  readonly createdAt: number;
  readonly runId?: string;

  private _state: TraceState = 'in_progress';
  private _endedAt?: number;
  private _timedOut = false;
  private readonly spans = new Map<string, SpanRecord>();
  private readonly tags: TraceTags = {};

  constructor(root: SpanRecord, runId?: string) {
    this.traceId = root.traceId;
    this.rootSpanId = root.spanId;
    this.createdAt = root.startTime;
    this.runId = runId;
    this.spans.set(root.spanId, root);
  }

  get state(): TraceState {
    return this._state;
  }

  get endedAt(): number | undefined {
    return this._endedAt;
  }

  get timedOut(): boolean {
    return this._timedOut;
  }

  isInProgress(): boolean {
    return this._state === 'in_progress';
  }

  get root(): SpanRecord {
    const root = this.spans.get(this.rootSpanId);
    if (!root) {
      throw new Error(`Trace ${this.traceId} lost its root span`);
    }
    return root;
  }

  addSpan(span: SpanRecord): void {
    if (span.traceId !== this.traceId) {
      throw new Error(`Span ${span.spanId} belongs to trace ${span.traceId}, not ${this.traceId}`);
    }
    this.spans.set(span.spanId, span);
  }

  getSpan(spanId: string): SpanRecord | undefined {
    return this.spans.get(spanId);
  }

  getSpans(): SpanRecord[] {
    return [...this.spans.values()];
  }

  getOpenSpans(): SpanRecord[] {
    return this.getSpans().filter((span) => span.isOpen());
  }

  getChildren(parentId: string): SpanRecord[] {
    return this.getSpans().filter((span) => span.parentId === parentId);
  }

  hasErrorSpan(): boolean {
    return this.getSpans().some((span) => span.status === 'error');
  }

  /** Tags stay writable after the trace finishes; snapshots already taken are unaffected. */
  setTags(tags: TraceTags): void {
    Object.assign(this.tags, tags);
  }

  deleteTag(key: string): void {
    delete this.tags[key];
  }

  getTags(): Readonly<TraceTags> {
    return { ...this.tags };
  }

  /**
   * Compare-and-set from in_progress to a terminal state. Exactly one caller
   * wins; every later call returns false and changes nothing.
   */
  transition(to: TerminalTraceState, endedAt: number, options?: { timedOut?: boolean }): boolean {
    if (this._state !== 'in_progress') return false;
    this._state = to;
    this._endedAt = Math.max(endedAt, this.createdAt);
    this._timedOut = options?.timedOut ?? false;
    return true;
  }

  /** Frozen copy of the finished trace. Only valid after transition(). */
  snapshot(): TraceSnapshot {
    if (this._state === 'in_progress' || this._endedAt === undefined) {
      throw new Error(`Trace ${this.traceId} is still in progress`);
    }
    const info = {
      traceId: this.traceId,
      rootSpanId: this.rootSpanId,
      state: this._state,
      createdAt: this.createdAt,
      endedAt: this._endedAt,
      executionTimeMs: this._endedAt - this.createdAt,
      tags: { ...this.tags },
      timedOut: this._timedOut,
      ...(this.runId !== undefined && { runId: this.runId }),
    };
    return deepFreeze({
      info,
      spans: this.getSpans().map((span) => span.toSnapshot()),
    });
  }
}
