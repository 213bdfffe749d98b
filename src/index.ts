/**
 * Trace Pipeline – Entry Point
 *
 * Span and trace recording, timeout supervision, and asynchronous export
 * of finished traces to a trace store.
 *
 * @module trace-pipeline
 */

// ─── Core Types ───
export type {
  Assessment,
  AssessmentError,
  AssessmentSource,
  AssessmentSourceType,
  AssessmentUpdate,
  Expectation,
  Feedback,
  SpanAttributes,
  SpanSnapshot,
  SpanStatus,
  TerminalTraceState,
  TraceInfo,
  TraceSnapshot,
  TraceState,
  TraceTags,
} from './types/index.js';

// ─── Tracing ───
export * from './tracing/index.js';

// ─── Export Pipeline ───
export * from './export/index.js';

// ─── Stores ───
export * from './store/index.js';

// ─── Assessments ───
export * from './assessments/index.js';

// ─── Logging ───
export * from './logging/index.js';

// ─── Database ───
export { type DbConfig, type Queryable, createPool, getDbConfig } from './utils/db.js';
export { getMigrationFiles, runMigrations } from './utils/migrationRunner.js';

// ─── Service ───
export {
  type TracingService,
  type TracingServiceOptions,
  type TracingStats,
  createTracingService,
} from './service.js';

// ─── Fluent API ───
export * as fluent from './fluent.js';
