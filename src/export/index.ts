/**
 * Export Pipeline
 *
 * Bounded queue, worker pool, retry policy and flush coordination that
 * move finished traces from producers to a trace store.
 *
 * @module export
 */

export { type ExportQueue, type ExportQueueConfig, createExportQueue } from './exportQueue.js';

export {
  type DiscardReason,
  type RetryInfo,
  type RetryOutcome,
  type RetryPolicy,
  type RetryPolicyConfig,
  createRetryPolicy,
  unrefSleep,
} from './retry.js';

export {
  type ExportStats,
  type ExportWorkerPool,
  type ExportWorkerPoolConfig,
  createExportWorkerPool,
} from './workerPool.js';

export {
  type FlushCoordinator,
  type FlushCoordinatorConfig,
  createFlushCoordinator,
} from './flushCoordinator.js';
