/**
 * Trace Store
 *
 * The backend the export workers write finished traces to, and the target
 * of direct writes (tags on finished traces, assessments). Implementations:
 * HTTP tracking server, Postgres, in-memory and no-op.
 *
 * @module store/traceStore
 */

import { randomUUID } from 'node:crypto';
import type { Assessment, AssessmentUpdate, TraceSnapshot, TraceTags } from '../types/index.js';
import { ResourceNotFoundError } from '../tracing/errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TraceStore {
  /** Persist one finished trace. Must be idempotent per trace ID. */
  persistTrace(snapshot: TraceSnapshot): Promise<void>;
  setTraceTag(traceId: string, key: string, value: string): Promise<void>;
  deleteTraceTag(traceId: string, key: string): Promise<void>;
  /** Store a new assessment and return it with its assigned ID. */
  createAssessment(assessment: Assessment): Promise<Assessment>;
  updateAssessment(update: AssessmentUpdate): Promise<Assessment>;
  deleteAssessment(traceId: string, assessmentId: string): Promise<void>;
  /** Release connections the store holds. Called once, after the final flush. */
  close(): Promise<void>;
}

// ─── In-Memory Store (for testing) ───────────────────────────────────────────

export interface InMemoryTraceStore extends TraceStore {
  /** Snapshots in the order they were persisted. */
  readonly traces: TraceSnapshot[];
  /** Number of persistTrace calls, successful or not. */
  attempts: number;
  /** Errors thrown by the next persistTrace calls, consumed in order. */
  failures: Error[];
  /** When set, persistTrace waits on this before storing. */
  gate: Promise<void> | null;
  getTrace(traceId: string): TraceSnapshot | undefined;
  /** Tags written after export, through setTraceTag/deleteTraceTag. */
  getTags(traceId: string): TraceTags;
  getAssessments(traceId: string): Assessment[];
  readonly closed: boolean;
}

export interface InMemoryTraceStoreOptions {
  now?: () => number;
}

export function createInMemoryTraceStore(
  options: InMemoryTraceStoreOptions = {},
): InMemoryTraceStore {
  const now = options.now ?? Date.now;
  let closed = false;
  const byId = new Map<string, TraceSnapshot>();
  const tags = new Map<string, TraceTags>();
  const assessments = new Map<string, Assessment>();

  function tagsFor(traceId: string): TraceTags {
    let entry = tags.get(traceId);
    if (!entry) {
      entry = {};
      tags.set(traceId, entry);
    }
    return entry;
  }

  function requireAssessment(traceId: string, assessmentId: string): Assessment {
    const existing = assessments.get(assessmentId);
    if (!existing || existing.traceId !== traceId) {
      throw new ResourceNotFoundError(`Assessment ${assessmentId} not found on trace ${traceId}`);
    }
    return existing;
  }

  const store: InMemoryTraceStore = {
    traces: [],
    attempts: 0,
    failures: [],
    gate: null,

    async persistTrace(snapshot: TraceSnapshot): Promise<void> {
      store.attempts++;
      if (store.gate) await store.gate;
      const failure = store.failures.shift();
      if (failure) throw failure;
      if (byId.has(snapshot.info.traceId)) return;
      byId.set(snapshot.info.traceId, snapshot);
      store.traces.push(snapshot);
    },

    async setTraceTag(traceId: string, key: string, value: string): Promise<void> {
      tagsFor(traceId)[key] = value;
    },

    async deleteTraceTag(traceId: string, key: string): Promise<void> {
      const entry = tags.get(traceId);
      if (!entry || !Object.hasOwn(entry, key)) {
        throw new ResourceNotFoundError(`Tag '${key}' not found on trace ${traceId}`);
      }
      delete entry[key];
    },

    async createAssessment(assessment: Assessment): Promise<Assessment> {
      const assessmentId = randomUUID();
      const stored: Assessment = { ...assessment, assessmentId };
      assessments.set(assessmentId, stored);
      return { ...stored };
    },

    async updateAssessment(update: AssessmentUpdate): Promise<Assessment> {
      const existing = requireAssessment(update.traceId, update.assessmentId);
      const updated: Assessment = {
        ...existing,
        lastUpdateTimeMs: now(),
        ...(update.name !== null && { name: update.name }),
        ...(update.expectation !== null && { expectation: update.expectation }),
        ...(update.feedback !== null && { feedback: update.feedback }),
        ...(update.rationale !== null && { rationale: update.rationale }),
        ...(update.metadata !== null && { metadata: { ...existing.metadata, ...update.metadata } }),
      };
      assessments.set(update.assessmentId, updated);
      return { ...updated };
    },

    async deleteAssessment(traceId: string, assessmentId: string): Promise<void> {
      requireAssessment(traceId, assessmentId);
      assessments.delete(assessmentId);
    },

    async close(): Promise<void> {
      closed = true;
    },

    get closed(): boolean {
      return closed;
    },

    getTrace(traceId: string): TraceSnapshot | undefined {
      return byId.get(traceId);
    },

    getTags(traceId: string): TraceTags {
      return { ...tags.get(traceId) };
    },

    getAssessments(traceId: string): Assessment[] {
      return [...assessments.values()].filter((a) => a.traceId === traceId);
    },
  };

  return store;
}

// ─── No-op Store ─────────────────────────────────────────────────────────────

/** Store used when no backend is configured: accepts and discards everything. */
export function createNoopTraceStore(): TraceStore {
  return {
    async persistTrace(): Promise<void> {},
    async setTraceTag(): Promise<void> {},
    async deleteTraceTag(): Promise<void> {},
    async createAssessment(assessment: Assessment): Promise<Assessment> {
      return { ...assessment, assessmentId: randomUUID() };
    },
    async updateAssessment(update: AssessmentUpdate): Promise<Assessment> {
      throw new ResourceNotFoundError(
        `Assessment ${update.assessmentId} not found: no trace backend is configured`,
      );
    },
    async deleteAssessment(): Promise<void> {},
    async close(): Promise<void> {},
  };
}
