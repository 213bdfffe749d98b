/**
 * Export Worker Pool
 *
 * A fixed number of async worker loops draining one export queue. Each
 * worker takes a snapshot, persists it through the retry policy, reports
 * it done, and only then takes the next. Failures end in the worker: they
 * are counted and logged, never rethrown to the producer.
 *
 * @module export/workerPool
 */

import type { TraceSnapshot } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import type { TraceStore } from '../store/traceStore.js';
import { toError } from '../tracing/errors.js';
import type { ExportQueue } from './exportQueue.js';
import { createRetryPolicy } from './retry.js';
import type { RetryPolicy } from './retry.js';

export interface ExportStats {
  exported: number;
  /** Tasks discarded after a non-retryable error or an exhausted retry budget. */
  failed: number;
  /** Individual retry attempts scheduled. */
  retried: number;
  /** Snapshots rejected by a full or closed queue. */
  dropped: number;
  inFlight: number;
  queued: number;
}

export interface ExportWorkerPoolConfig {
  queue: ExportQueue<TraceSnapshot>;
  store: TraceStore;
  /** Number of concurrent workers (default: 10). */
  size?: number;
  retry?: RetryPolicy;
  logger?: Logger;
}

export interface ExportWorkerPool {
  readonly size: number;
  /** Launch the worker loops. Calling it again while running does nothing. */
  start(): void;
  /** Close the queue and wait for every worker loop to exit. */
  stop(options?: { discard?: boolean }): Promise<void>;
  isRunning(): boolean;
  inFlight(): number;
  getStats(): ExportStats;
}

export function createExportWorkerPool(config: ExportWorkerPoolConfig): ExportWorkerPool {
  const size = config.size ?? 10;
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
  }
  const queue = config.queue;
  const retry = config.retry ?? createRetryPolicy();
  const logger = (config.logger ?? createSilentLogger()).child({ component: 'export-worker' });

  let loops: Promise<void>[] = [];
  let active = 0;
  let exported = 0;
  let failed = 0;
  let retried = 0;

  async function exportOne(snapshot: TraceSnapshot): Promise<void> {
    const traceId = snapshot.info.traceId;
    const outcome = await retry.execute(
      () => config.store.persistTrace(snapshot),
      ({ attempt, delayMs, error }) => {
        retried++;
        logger.debug('Trace export failed; retrying', {
          traceId,
          attempt,
          delayMs: Math.round(delayMs),
          error: error.message,
        });
      },
    );

    if (outcome.status === 'succeeded') {
      exported++;
      return;
    }
    failed++;
    logger.error('Trace export discarded', outcome.error, {
      traceId,
      reason: outcome.reason,
      attempts: outcome.attempts,
    });
  }

  async function runWorker(index: number): Promise<void> {
    for (;;) {
      const snapshot = await queue.take();
      if (snapshot === undefined) break;
      active++;
      try {
        await exportOne(snapshot);
      } catch (error) {
        failed++;
        logger.error('Unexpected failure in export worker', toError(error), {
          worker: index,
          traceId: snapshot.info.traceId,
        });
      } finally {
        active--;
        queue.taskDone();
      }
    }
  }

  return {
    size,

    start(): void {
      if (loops.length > 0) return;
      if (queue.isClosed()) {
        throw new Error('Cannot start an export worker pool on a closed queue');
      }
      loops = Array.from({ length: size }, (_, index) => runWorker(index));
      logger.debug('Export workers started', { size });
    },

    async stop(options?: { discard?: boolean }): Promise<void> {
      queue.close(options);
      const running = loops;
      await Promise.all(running);
      loops = [];
    },

    isRunning(): boolean {
      return loops.length > 0;
    },

    inFlight(): number {
      return active;
    },

    getStats(): ExportStats {
      return {
        exported,
        failed,
        retried,
        dropped: queue.droppedCount(),
        inFlight: active,
        queued: queue.size(),
      };
    },
  };
}
