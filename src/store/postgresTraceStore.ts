/**
 * Postgres trace store for the traces, trace_spans, trace_tags and
 * trace_assessments tables.
 *
 * A trace is written with one statement, so it lands completely or not at
 * all, and a retried write of an already stored trace is a no-op. Handles
 * snake_case ↔ camelCase mapping between the schema and the TypeScript
 * types. Timestamps are epoch milliseconds in BIGINT columns, which the
 * driver returns as strings.
 *
 * @module store/postgresTraceStore
 */

import { randomUUID } from 'node:crypto';
import type {
  Assessment,
  AssessmentUpdate,
  Expectation,
  Feedback,
  TraceSnapshot,
} from '../types/index.js';
import { ExportError, ResourceNotFoundError } from '../tracing/errors.js';
import type { Queryable, QueryRow } from '../utils/db.js';
import { sqlStateOf } from '../utils/db.js';
import type { TraceStore } from './traceStore.js';

// ─── SQL ─────────────────────────────────────────────────────────────────────

export const INSERT_TRACE_SQL = `
WITH inserted AS (
  INSERT INTO traces (trace_id, root_span_id, run_id, state, created_at_ms, ended_at_ms, execution_time_ms, timed_out)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (trace_id) DO NOTHING
  RETURNING trace_id
), spans AS (
  INSERT INTO trace_spans (span_id, trace_id, parent_id, name, start_time_ms, end_time_ms, status, status_message, attributes, inputs, outputs)
  SELECT s.span_id, i.trace_id, s.parent_id, s.name, s.start_time_ms, s.end_time_ms, s.status, s.status_message, s.attributes, s.inputs, s.outputs
  FROM inserted i,
    jsonb_to_recordset($9::jsonb) AS s(span_id text, parent_id text, name text, start_time_ms bigint, end_time_ms bigint,
                                       status text, status_message text, attributes jsonb, inputs jsonb, outputs jsonb)
  RETURNING span_id
)
INSERT INTO trace_tags (trace_id, key, value)
SELECT i.trace_id, t.key, t.value
FROM inserted i, jsonb_each_text($10::jsonb) AS t(key, value)`;

export const UPSERT_TAG_SQL = `INSERT INTO trace_tags (trace_id, key, value) VALUES ($1, $2, $3)
ON CONFLICT (trace_id, key) DO UPDATE SET value = EXCLUDED.value`;

export const DELETE_TAG_SQL = 'DELETE FROM trace_tags WHERE trace_id = $1 AND key = $2';

export const INSERT_ASSESSMENT_SQL = `INSERT INTO trace_assessments
  (assessment_id, trace_id, span_id, name, source_type, source_id, expectation, feedback, rationale, metadata, create_time_ms, last_update_time_ms)
VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9, $10::jsonb, $11, $12)
RETURNING *`;

export const UPDATE_ASSESSMENT_SQL = `UPDATE trace_assessments SET
  name = COALESCE($3, name),
  expectation = COALESCE($4::jsonb, expectation),
  feedback = COALESCE($5::jsonb, feedback),
  rationale = COALESCE($6, rationale),
  metadata = CASE WHEN $7::jsonb IS NULL THEN metadata ELSE COALESCE(metadata, '{}'::jsonb) || $7::jsonb END,
  last_update_time_ms = $8
WHERE trace_id = $1 AND assessment_id = $2
RETURNING *`;

export const DELETE_ASSESSMENT_SQL =
  'DELETE FROM trace_assessments WHERE trace_id = $1 AND assessment_id = $2';

// ─── Error Classification ────────────────────────────────────────────────────

/**
 * SQLSTATE classes that fail the same way on every attempt: data exceptions
 * (22), integrity violations (23), invalid authorization (28) and syntax or
 * access rule violations (42).
 */
const PERMANENT_SQLSTATE_CLASSES = new Set(['22', '23', '28', '42']);

export function classifyDatabaseError(error: unknown): ExportError {
  if (error instanceof ExportError) return error;
  const code = sqlStateOf(error);
  const message = error instanceof Error ? error.message : String(error);
  const retryable = code === undefined || !PERMANENT_SQLSTATE_CLASSES.has(code.slice(0, 2));
  return new ExportError(`Failed to persist trace: ${message}`, { retryable, cause: error });
}

// ─── Row Mapping ─────────────────────────────────────────────────────────────

function toJson(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  try {
    return JSON.stringify(value);
  } catch (error) {
    throw new ExportError('Failed to serialize value for storage', { retryable: false, cause: error });
  }
}

function toMillis(value: unknown): number {
  const millis = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(millis)) {
    throw new Error(`Invalid millisecond timestamp in trace_assessments row: ${String(value)}`);
  }
  return millis;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapExpectation(value: unknown): Expectation | undefined {
  return isRecord(value) && 'value' in value ? { value: value['value'] } : undefined;
}

function mapFeedback(value: unknown): Feedback | undefined {
  if (!isRecord(value)) return undefined;
  const feedback: Feedback = {};
  if ('value' in value) feedback.value = value['value'];
  const error = value['error'];
  if (isRecord(error) && typeof error['errorCode'] === 'string') {
    feedback.error = {
      errorCode: error['errorCode'],
      ...(typeof error['errorMessage'] === 'string' && { errorMessage: error['errorMessage'] }),
    };
  }
  return feedback;
}

function mapMetadata(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
}

/** Convert a trace_assessments row (snake_case) to an Assessment (camelCase). */
export function rowToAssessment(row: QueryRow): Assessment {
  const sourceType = row['source_type'];
  if (sourceType !== 'human' && sourceType !== 'llm_judge' && sourceType !== 'code') {
    throw new Error(`Unknown assessment source type in row: ${String(sourceType)}`);
  }
  const assessment: Assessment = {
    assessmentId: String(row['assessment_id']),
    traceId: String(row['trace_id']),
    name: String(row['name']),
    source: { sourceType, sourceId: String(row['source_id']) },
    createTimeMs: toMillis(row['create_time_ms']),
    lastUpdateTimeMs: toMillis(row['last_update_time_ms']),
  };
  if (typeof row['span_id'] === 'string') assessment.spanId = row['span_id'];
  if (typeof row['rationale'] === 'string') assessment.rationale = row['rationale'];
  const expectation = mapExpectation(row['expectation']);
  if (expectation) assessment.expectation = expectation;
  const feedback = mapFeedback(row['feedback']);
  if (feedback) assessment.feedback = feedback;
  const metadata = mapMetadata(row['metadata']);
  if (metadata) assessment.metadata = metadata;
  return assessment;
}

/** Positional parameters for INSERT_TRACE_SQL. */
export function traceParams(snapshot: TraceSnapshot): unknown[] {
  const { info } = snapshot;
  const spans = snapshot.spans.map((span) => ({
    span_id: span.spanId,
    parent_id: span.parentId ?? null,
    name: span.name,
    start_time_ms: span.startTime,
    end_time_ms: span.endTime,
    status: span.status,
    status_message: span.statusMessage ?? null,
    attributes: span.attributes,
    inputs: span.inputs ?? null,
    outputs: span.outputs ?? null,
  }));
  return [
    info.traceId,
    info.rootSpanId,
    info.runId ?? null,
    info.state,
    info.createdAt,
    info.endedAt,
    info.executionTimeMs,
    info.timedOut,
    toJson(spans),
    toJson(info.tags),
  ];
}

// ─── Store ───────────────────────────────────────────────────────────────────

export interface PostgresTraceStoreOptions {
  now?: () => number;
  /** Runs on close(); pass `() => pool.end()` when the store owns its pool. */
  onClose?: () => Promise<void>;
}

export function createPostgresTraceStore(
  db: Queryable,
  options: PostgresTraceStoreOptions = {},
): TraceStore {
  const now = options.now ?? Date.now;

  return {
    async persistTrace(snapshot: TraceSnapshot): Promise<void> {
      const params = traceParams(snapshot);
      try {
        await db.query(INSERT_TRACE_SQL, params);
      } catch (error) {
        throw classifyDatabaseError(error);
      }
    },

    async setTraceTag(traceId: string, key: string, value: string): Promise<void> {
      try {
        await db.query(UPSERT_TAG_SQL, [traceId, key, value]);
      } catch (error) {
        // foreign_key_violation: the trace has not been stored (yet)
        if (sqlStateOf(error) === '23503') {
          throw new ResourceNotFoundError(`Trace ${traceId} not found`);
        }
        throw error;
      }
    },

    async deleteTraceTag(traceId: string, key: string): Promise<void> {
      const result = await db.query(DELETE_TAG_SQL, [traceId, key]);
      if (!result.rowCount) {
        throw new ResourceNotFoundError(`Tag '${key}' not found on trace ${traceId}`);
      }
    },

    async createAssessment(assessment: Assessment): Promise<Assessment> {
      const result = await db.query(INSERT_ASSESSMENT_SQL, [
        randomUUID(),
        assessment.traceId,
        assessment.spanId ?? null,
        assessment.name,
        assessment.source.sourceType,
        assessment.source.sourceId,
        toJson(assessment.expectation),
        toJson(assessment.feedback),
        assessment.rationale ?? null,
        toJson(assessment.metadata),
        assessment.createTimeMs,
        assessment.lastUpdateTimeMs,
      ]);
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT INTO trace_assessments returned no row');
      }
      return rowToAssessment(row);
    },

    async updateAssessment(update: AssessmentUpdate): Promise<Assessment> {
      const result = await db.query(UPDATE_ASSESSMENT_SQL, [
        update.traceId,
        update.assessmentId,
        update.name,
        toJson(update.expectation),
        toJson(update.feedback),
        update.rationale,
        toJson(update.metadata),
        now(),
      ]);
      const row = result.rows[0];
      if (!row) {
        throw new ResourceNotFoundError(
          `Assessment ${update.assessmentId} not found on trace ${update.traceId}`,
        );
      }
      return rowToAssessment(row);
    },

    async deleteAssessment(traceId: string, assessmentId: string): Promise<void> {
      const result = await db.query(DELETE_ASSESSMENT_SQL, [traceId, assessmentId]);
      if (!result.rowCount) {
        throw new ResourceNotFoundError(`Assessment ${assessmentId} not found on trace ${traceId}`);
      }
    },

    async close(): Promise<void> {
      await options.onClose?.();
    },
  };
}
