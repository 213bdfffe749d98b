/**
 * Tracing Service
 *
 * Root of the tracing subsystem: one explicitly constructed object that
 * wires the tracer, trace registry, timeout supervisor, export queue,
 * worker pool, flush coordinator, store and assessment client together.
 * Background work (supervisor interval, worker loops, exit hook) starts
 * when the first trace does and ends with `shutdown()`.
 *
 * @module service
 */

import type { TraceSnapshot } from './types/index.js';
import type { Logger } from './logging/logger.js';
import { createLogger } from './logging/logger.js';
import { createAssessmentClient } from './assessments/assessmentClient.js';
import type { AssessmentClient } from './assessments/assessmentClient.js';
import { createExportQueue } from './export/exportQueue.js';
import { createFlushCoordinator } from './export/flushCoordinator.js';
import { createRetryPolicy } from './export/retry.js';
import type { RetryPolicyConfig } from './export/retry.js';
import { createExportWorkerPool } from './export/workerPool.js';
import type { ExportStats } from './export/workerPool.js';
import { createTraceStore } from './store/index.js';
import type { HttpTransport } from './store/httpTraceStore.js';
import type { TraceStore } from './store/traceStore.js';
import { createContextManager } from './tracing/context.js';
import { createTraceRegistry } from './tracing/registry.js';
import { createTimeoutSupervisor } from './tracing/timeoutSupervisor.js';
import { createTracer } from './tracing/tracer.js';
import type { Tracer } from './tracing/tracer.js';
import { toError } from './tracing/errors.js';
import { loadTracingConfig } from './tracing/tracingConfig.js';
import type { TracingConfig } from './tracing/tracingConfig.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TracingServiceOptions {
  /** Overrides applied on top of the environment configuration. */
  config?: Partial<TracingConfig>;
  /** Environment to read configuration from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Store to export to. Defaults to the one named by `config.backend`. */
  store?: TraceStore;
  /** Transport for the HTTP store when it is built from configuration. */
  transport?: HttpTransport;
  logger?: Logger;
  now?: () => number;
  /** Retry hooks (sleep, randomness, backoff shape) for tests and tuning. */
  retry?: Omit<RetryPolicyConfig, 'retryTimeoutMs'>;
  /** Register the beforeExit flush hook on first use (default: true). */
  installShutdownHook?: boolean;
}

export interface TracingStats extends ExportStats {
  inProgressTraces: number;
  supervisorRunning: boolean;
}

export interface TracingService {
  readonly config: Readonly<TracingConfig>;
  readonly tracer: Tracer;
  readonly store: TraceStore;
  readonly assessments: AssessmentClient;
  enable(): void;
  disable(): void;
  isEnabled(): boolean;
  /** Wait for pending exports. Defaults to the shutdown flush timeout. */
  flush(timeoutMs?: number): Promise<boolean>;
  /**
   * Flush, then stop the supervisor and workers. When everything drained the
   * store is closed too. Idempotent.
   */
  shutdown(timeoutMs?: number): Promise<boolean>;
  /** Run one timeout scan now. Returns the number of traces force-closed. */
  checkTimeouts(): number;
  getStats(): TracingStats;
  /** Tag a trace that was already exported. Bypasses the export queue. */
  setTraceTag(traceId: string, key: string, value: string): Promise<void>;
  deleteTraceTag(traceId: string, key: string): Promise<void>;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createTracingService(options: TracingServiceOptions = {}): TracingService {
  const config: TracingConfig = { ...loadTracingConfig(options.env), ...options.config };
  const now = options.now ?? Date.now;
  const logger = (options.logger ?? createLogger()).child({ component: 'tracing' });
  const store = options.store ?? createTraceStore(config, { transport: options.transport });

  let enabled = config.enabled;
  let stopped = false;
  let storeClosed: Promise<void> | null = null;

  const registry = createTraceRegistry();
  const queue = createExportQueue<TraceSnapshot>({
    capacity: config.exportMaxQueueSize,
    dropWarningIntervalMs: config.dropWarningIntervalMs,
    logger,
    now,
  });
  const pool = createExportWorkerPool({
    queue,
    store,
    size: config.exportMaxWorkers,
    retry: createRetryPolicy({ ...options.retry, retryTimeoutMs: config.exportRetryTimeoutMs }),
    logger,
  });
  const coordinator = createFlushCoordinator({
    queue,
    pool,
    shutdownFlushTimeoutMs: config.shutdownFlushTimeoutMs,
    logger,
  });

  function startBackground(): void {
    if (stopped) return;
    supervisor.ensureStarted();
    if (!pool.isRunning()) pool.start();
    if (options.installShutdownHook ?? true) coordinator.installShutdownHook();
  }

  const tracer = createTracer({
    registry,
    contexts: createContextManager(),
    submit: (snapshot) => {
      queue.offer(snapshot);
    },
    onTraceStarted: startBackground,
    isEnabled: () => enabled && !stopped,
    now,
    logger,
  });

  const supervisor = createTimeoutSupervisor({
    registry,
    expire: (traceId, at, reason) => tracer.expireTrace(traceId, at, reason),
    timeoutMs: config.timeoutMs,
    checkIntervalMs: config.timeoutCheckIntervalMs,
    idleGraceMs: config.timeoutIdleGraceMs,
    now,
    logger,
  });

  const assessments = createAssessmentClient(store, { now });

  function closeStore(): Promise<void> {
    storeClosed ??= store.close().catch((error: unknown) => {
      logger.error('Failed to close trace store', toError(error));
    });
    return storeClosed;
  }

  return {
    config,
    tracer,
    store,
    assessments,

    enable(): void {
      enabled = true;
    },

    disable(): void {
      enabled = false;
    },

    isEnabled(): boolean {
      return enabled;
    },

    flush(timeoutMs: number = config.shutdownFlushTimeoutMs): Promise<boolean> {
      return coordinator.flush(timeoutMs);
    },

    async shutdown(timeoutMs?: number): Promise<boolean> {
      stopped = true;
      supervisor.stop();
      coordinator.removeShutdownHook();
      const drained = await coordinator.shutdown(timeoutMs);
      // Exports still in flight keep using the store's connections.
      if (drained) await closeStore();
      return drained;
    },

    checkTimeouts(): number {
      return supervisor.check();
    },

    getStats(): TracingStats {
      return {
        ...pool.getStats(),
        inProgressTraces: registry.inProgress().length,
        supervisorRunning: supervisor.isRunning(),
      };
    },

    setTraceTag(traceId: string, key: string, value: string): Promise<void> {
      return store.setTraceTag(traceId, key, value);
    },

    deleteTraceTag(traceId: string, key: string): Promise<void> {
      return store.deleteTraceTag(traceId, key);
    },
  };
}
