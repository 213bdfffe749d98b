/**
 * Core type definitions shared by the tracing, export, store and
 * assessment modules.
 *
 * @module types
 */

// ─── Span & Trace ────────────────────────────────────────────────────────────

export type SpanStatus = 'unset' | 'ok' | 'error';

/** Lifecycle state of a trace. Moves once, from in_progress to a terminal state. */
export type TraceState = 'in_progress' | 'ok' | 'error';

export type TerminalTraceState = Exclude<TraceState, 'in_progress'>;

export type SpanAttributes = Record<string, unknown>;

export type TraceTags = Record<string, string>;

/** Frozen copy of a span as it was when its trace was finalized. */
export interface SpanSnapshot {
  readonly spanId: string;
  readonly parentId?: string;
  readonly traceId: string;
  readonly name: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly status: SpanStatus;
  readonly statusMessage?: string;
  readonly attributes: Readonly<SpanAttributes>;
  readonly inputs?: unknown;
  readonly outputs?: unknown;
}

export interface TraceInfo {
  readonly traceId: string;
  readonly rootSpanId: string;
  readonly state: TerminalTraceState;
  readonly createdAt: number;
  readonly endedAt: number;
  readonly executionTimeMs: number;
  readonly runId?: string;
  readonly tags: Readonly<TraceTags>;
  /** True when the timeout supervisor closed the trace. */
  readonly timedOut: boolean;
}

/** The unit of export: one finished trace and its whole span tree. */
export interface TraceSnapshot {
  readonly info: TraceInfo;
  readonly spans: ReadonlyArray<SpanSnapshot>;
}

// ─── Assessments ─────────────────────────────────────────────────────────────

export type AssessmentSourceType = 'human' | 'llm_judge' | 'code';

export interface AssessmentSource {
  sourceType: AssessmentSourceType;
  sourceId: string;
}

export interface AssessmentError {
  errorCode: string;
  errorMessage?: string;
}

export interface Expectation {
  value: unknown;
}

export interface Feedback {
  value?: unknown;
  error?: AssessmentError;
}

export interface Assessment {
  assessmentId?: string;
  traceId: string;
  spanId?: string;
  name: string;
  source: AssessmentSource;
  createTimeMs: number;
  lastUpdateTimeMs: number;
  expectation?: Expectation;
  feedback?: Feedback;
  rationale?: string;
  metadata?: Record<string, string>;
}

/** Partial update. Fields left null are not changed by the store. */
export interface AssessmentUpdate {
  traceId: string;
  assessmentId: string;
  name: string | null;
  expectation: Expectation | null;
  feedback: Feedback | null;
  rationale: string | null;
  metadata: Record<string, string> | null;
}
