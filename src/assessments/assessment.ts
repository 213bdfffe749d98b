/**
 * Assessment Validation & Construction
 *
 * Expectations are ground-truth labels for a trace; feedback is a
 * judgement of it, either a value or the error that prevented one.
 * Parameters arrive from untyped callers too, so every check runs at
 * runtime and fails with an AssessmentValidationError.
 *
 * @module assessments/assessment
 */

import type {
  Assessment,
  AssessmentError,
  AssessmentSource,
  AssessmentSourceType,
  AssessmentUpdate,
} from '../types/index.js';
import { AssessmentValidationError } from '../tracing/errors.js';

export const ASSESSMENT_SOURCE_TYPES: ReadonlyArray<AssessmentSourceType> = [
  'human',
  'llm_judge',
  'code',
];

// ─── Parameter Types ─────────────────────────────────────────────────────────

interface AssessmentTarget {
  traceId: string;
  name: string;
  source: AssessmentSource;
  spanId?: string;
  metadata?: Record<string, string>;
}

export interface LogExpectationParams extends AssessmentTarget {
  value: unknown;
}

export interface LogFeedbackParams extends AssessmentTarget {
  value?: unknown;
  error?: AssessmentError;
  rationale?: string;
}

export interface UpdateExpectationParams {
  traceId: string;
  assessmentId: string;
  value: unknown;
  name?: string;
  metadata?: Record<string, string>;
}

export interface UpdateFeedbackParams {
  traceId: string;
  assessmentId: string;
  value?: unknown;
  error?: AssessmentError;
  name?: string;
  rationale?: string;
  metadata?: Record<string, string>;
}

// ─── Validation ──────────────────────────────────────────────────────────────

export function isAssessmentSource(value: unknown): value is AssessmentSource {
  if (typeof value !== 'object' || value === null) return false;
  const sourceType: unknown = Reflect.get(value, 'sourceType');
  const sourceId: unknown = Reflect.get(value, 'sourceId');
  return (
    ASSESSMENT_SOURCE_TYPES.some((type) => type === sourceType) &&
    typeof sourceId === 'string' &&
    sourceId.length > 0
  );
}

function requireNonEmpty(value: unknown, field: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new AssessmentValidationError(`\`${field}\` must be a non-empty string.`);
  }
}

function requireSource(source: unknown): void {
  if (!isAssessmentSource(source)) {
    throw new AssessmentValidationError(
      '`source` must be an AssessmentSource with a sourceType of ' +
        `${ASSESSMENT_SOURCE_TYPES.join(', ')} and a non-empty sourceId.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function requireValueOrError(value: unknown, error: unknown): void {
  if (!isPresent(value) && !isPresent(error)) {
    throw new AssessmentValidationError('Either `value` or `error` must be provided.');
  }
}

// ─── Builders ────────────────────────────────────────────────────────────────

function baseAssessment(params: AssessmentTarget, now: number): Assessment {
  const assessment: Assessment = {
    traceId: params.traceId,
    name: params.name,
    source: { sourceType: params.source.sourceType, sourceId: params.source.sourceId },
    createTimeMs: now,
    lastUpdateTimeMs: now,
  };
  if (params.spanId !== undefined) assessment.spanId = params.spanId;
  if (params.metadata !== undefined) assessment.metadata = { ...params.metadata };
  return assessment;
}

export function buildExpectation(params: LogExpectationParams, now: number): Assessment {
  requireNonEmpty(params.traceId, 'traceId');
  requireNonEmpty(params.name, 'name');
  if (!isPresent(params.value)) {
    throw new AssessmentValidationError('Expectation value cannot be null.');
  }
  requireSource(params.source);
  return { ...baseAssessment(params, now), expectation: { value: params.value } };
}

export function buildFeedback(params: LogFeedbackParams, now: number): Assessment {
  requireNonEmpty(params.traceId, 'traceId');
  requireNonEmpty(params.name, 'name');
  requireValueOrError(params.value, params.error);
  requireSource(params.source);

  const assessment = baseAssessment(params, now);
  assessment.feedback = {
    ...(isPresent(params.value) && { value: params.value }),
    ...(params.error && { error: { ...params.error } }),
  };
  if (params.rationale !== undefined) assessment.rationale = params.rationale;
  return assessment;
}

/** Only the fields the caller passed are sent; the rest stay null and unchanged. */
export function buildExpectationUpdate(params: UpdateExpectationParams): AssessmentUpdate {
  requireNonEmpty(params.traceId, 'traceId');
  requireNonEmpty(params.assessmentId, 'assessmentId');
  if (!isPresent(params.value)) {
    throw new AssessmentValidationError('Expectation value cannot be null.');
  }
  return {
    traceId: params.traceId,
    assessmentId: params.assessmentId,
    name: params.name ?? null,
    expectation: { value: params.value },
    feedback: null,
    rationale: null,
    metadata: params.metadata ?? null,
  };
}

export function buildFeedbackUpdate(params: UpdateFeedbackParams): AssessmentUpdate {
  requireNonEmpty(params.traceId, 'traceId');
  requireNonEmpty(params.assessmentId, 'assessmentId');
  requireValueOrError(params.value, params.error);
  return {
    traceId: params.traceId,
    assessmentId: params.assessmentId,
    name: params.name ?? null,
    expectation: null,
    feedback: {
      ...(isPresent(params.value) && { value: params.value }),
      ...(params.error && { error: { ...params.error } }),
    },
    rationale: params.rationale ?? null,
    metadata: params.metadata ?? null,
  };
}
