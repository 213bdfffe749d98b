/**
 * Flush & Shutdown Coordinator
 *
 * Bounded waits for the export pipeline to drain. A flush never cancels
 * in-flight exports; it only decides how long the caller is willing to
 * wait for them.
 *
 * @module export/flushCoordinator
 */

import type { TraceSnapshot } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { toError } from '../tracing/errors.js';
import type { ExportQueue } from './exportQueue.js';
import type { ExportWorkerPool } from './workerPool.js';

export interface FlushCoordinatorConfig {
  queue: ExportQueue<TraceSnapshot>;
  pool: ExportWorkerPool;
  /** Deadline used by the exit hook (default: 10000). */
  shutdownFlushTimeoutMs?: number;
  logger?: Logger;
}

export interface FlushCoordinator {
  /**
   * Wait until every accepted snapshot has been exported or discarded.
   * Resolves true when drained, false when `timeoutMs` passed first.
   */
  flush(timeoutMs: number): Promise<boolean>;
  /** Flush with the shutdown deadline, then stop the workers. */
  shutdown(timeoutMs?: number): Promise<boolean>;
  /** Register a one-time `beforeExit` listener that runs shutdown(). */
  installShutdownHook(): void;
  removeShutdownHook(): void;
}

export function createFlushCoordinator(config: FlushCoordinatorConfig): FlushCoordinator {
  const { queue, pool } = config;
  const shutdownFlushTimeoutMs = config.shutdownFlushTimeoutMs ?? 10_000;
  const logger = (config.logger ?? createSilentLogger()).child({ component: 'flush' });
  let hook: (() => void) | null = null;
  let shutdownPromise: Promise<boolean> | null = null;

  async function flush(timeoutMs: number): Promise<boolean> {
    if (queue.unfinished() === 0) return true;
    // Nothing drains the queue until the workers run
    if (!pool.isRunning() && !queue.isClosed()) pool.start();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<false>((resolve) => {
      // Left referenced: at exit this timer holds the process open until the deadline
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });

    try {
      const drained = await Promise.race([queue.onIdle().then((): true => true), deadline]);
      if (!drained) {
        logger.warn('Flush deadline passed with exports still pending', {
          timeoutMs,
          pending: queue.unfinished(),
        });
      }
      return drained;
    } finally {
      clearTimeout(timer);
    }
  }

  async function runShutdown(timeoutMs: number): Promise<boolean> {
    const drained = await flush(timeoutMs);
    const stopping = pool.stop({ discard: true }).catch((error: unknown) => {
      logger.error('Export workers failed to stop', toError(error));
    });
    // Past the deadline, exports still in flight are left to finish or die with the process
    if (drained) await stopping;
    return drained;
  }

  function shutdown(timeoutMs: number = shutdownFlushTimeoutMs): Promise<boolean> {
    shutdownPromise ??= runShutdown(timeoutMs);
    return shutdownPromise;
  }

  return {
    flush,
    shutdown,

    installShutdownHook(): void {
      if (hook) return;
      hook = () => {
        hook = null;
        shutdown().catch((error: unknown) => {
          logger.error('Export shutdown failed', toError(error));
        });
      };
      process.once('beforeExit', hook);
    },

    removeShutdownHook(): void {
      if (!hook) return;
      process.removeListener('beforeExit', hook);
      hook = null;
    },
  };
}
